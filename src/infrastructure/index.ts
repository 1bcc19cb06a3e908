export { loadConfig, loadGeneratorConfig, DEFAULT_DEVICE_KEYS } from './config.js';
export type { ServerConfig, GeneratorConfig } from './config.js';
export { dbPlugin, createDbClient, ensureSchema, insertEvent, DrizzleEventStore, libraLogs } from './db/index.js';
export type { Database, SqlClient, LibraLogRow } from './db/index.js';
export { redisPlugin, publishRecordBatch, createRedisBatchObserver, RECORDS_CHANNEL } from './redis/index.js';
export type { RecordBatchPayload } from './redis/index.js';
export { monitorPlugin } from './monitor/index.js';
export { InMemoryEventStore } from './store/index.js';
