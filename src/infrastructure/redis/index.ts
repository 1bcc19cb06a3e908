export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export {
  publishRecordBatch,
  createRedisBatchObserver,
  toBatchPayload,
  RECORDS_CHANNEL,
} from './batch-notifier.js';
export type { RecordBatchPayload } from './batch-notifier.js';
