import { and, eq, gt, asc, desc, max, inArray } from 'drizzle-orm';
import { PRIORITY_ACTIONS } from '../../domain/index.js';
import type { ScaleEvent } from '../../domain/index.js';
import type { Database } from './client.js';
import { libraLogs } from './schema.js';
import type { LibraLogRow } from './schema.js';

function toScaleEvent(row: LibraLogRow): ScaleEvent {
  return {
    sequence: row.sequence,
    device_id: row.device_id,
    model: row.model,
    timestamp: row.timestamp,
    action: row.action,
    amount: row.amount,
    location: row.location,
    ingredient: row.ingredient,
    synced: row.synced,
  };
}

/** Highest sequence in the table, 0 when it is empty. */
export async function findMaxSequence(db: Database): Promise<number> {
  const rows = await db
    .select({ value: max(libraLogs.sequence) })
    .from(libraLogs);

  return Number(rows[0]?.value ?? 0);
}

/** Every row after `sequence`, oldest first. */
export async function findEventsAfter(db: Database, sequence: number): Promise<ScaleEvent[]> {
  const rows = await db
    .select()
    .from(libraLogs)
    .where(gt(libraLogs.sequence, sequence))
    .orderBy(asc(libraLogs.sequence));

  return rows.map(toScaleEvent);
}

/**
 * Rows of one device, newest first.
 * Unbounded when `limit` is omitted.
 */
export async function findEventsForDevice(
  db: Database,
  deviceId: string,
  limit?: number,
): Promise<ScaleEvent[]> {
  const query = db
    .select()
    .from(libraLogs)
    .where(eq(libraLogs.device_id, deviceId))
    .orderBy(desc(libraLogs.sequence));

  const rows = limit === undefined ? await query : await query.limit(limit);
  return rows.map(toScaleEvent);
}

/**
 * The row that represents a device's current state: its newest priority
 * action, otherwise its newest row. Two `LIMIT 1` lookups, both walking
 * `idx_libra_logs_device_sequence` backwards.
 */
export async function findCurrentStateForDevice(db: Database, deviceId: string): Promise<ScaleEvent | null> {
  const [priority] = await db
    .select()
    .from(libraLogs)
    .where(and(eq(libraLogs.device_id, deviceId), inArray(libraLogs.action, [...PRIORITY_ACTIONS])))
    .orderBy(desc(libraLogs.sequence))
    .limit(1);

  if (priority !== undefined) return toScaleEvent(priority);

  const [latest] = await db
    .select()
    .from(libraLogs)
    .where(eq(libraLogs.device_id, deviceId))
    .orderBy(desc(libraLogs.sequence))
    .limit(1);

  return latest === undefined ? null : toScaleEvent(latest);
}

/** Most recent rows across all devices, newest first. */
export async function findRecentEvents(db: Database, limit?: number): Promise<ScaleEvent[]> {
  const query = db
    .select()
    .from(libraLogs)
    .orderBy(desc(libraLogs.sequence));

  const rows = limit === undefined ? await query : await query.limit(limit);
  return rows.map(toScaleEvent);
}
