import { pgTable, bigserial, varchar, doublePrecision, boolean, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `libra_logs` table.
 *
 * Append-only. `sequence` is assigned by Postgres on insert and is the
 * ordering key every reader relies on; `timestamp` is the device's own
 * clock, stored as sent.
 */
export const libraLogs = pgTable('libra_logs', {
  sequence: bigserial('sequence', { mode: 'number' }).primaryKey(),
  model: varchar('model', { length: 64 }).notNull(),
  device_id: varchar('device_id', { length: 255 }).notNull(),
  timestamp: varchar('timestamp', { length: 64 }).notNull(),
  action: varchar('action', { length: 64 }).notNull(),
  amount: doublePrecision('amount').notNull(),
  location: varchar('location', { length: 255 }).notNull(),
  ingredient: varchar('ingredient', { length: 255 }).notNull(),
  synced: boolean('synced').notNull().default(false),
}, (table) => [
  index('idx_libra_logs_device_sequence').on(table.device_id, table.sequence),
  index('idx_libra_logs_action').on(table.action),
]);

export type LibraLogRow = typeof libraLogs.$inferSelect;
