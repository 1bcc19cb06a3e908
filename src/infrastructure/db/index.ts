export { libraLogs } from './schema.js';
export type { LibraLogRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { insertEvent } from './event-repository.js';
export {
  findMaxSequence,
  findEventsAfter,
  findEventsForDevice,
  findCurrentStateForDevice,
  findRecentEvents,
} from './event-query-repository.js';
export { DrizzleEventStore } from './drizzle-event-store.js';
export { ensureSchema } from './migrate.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
