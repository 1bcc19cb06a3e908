import type { NewScaleEvent } from '../../domain/index.js';
import type { Database } from './client.js';
import { libraLogs } from './schema.js';

/**
 * Appends one reading and returns the sequence Postgres assigned to it.
 *
 * Only the generator writes; the monitor and the HTTP layer never do.
 */
export async function insertEvent(db: Database, event: NewScaleEvent): Promise<number> {
  const rows = await db
    .insert(libraLogs)
    .values({
      model: event.model,
      device_id: event.device_id,
      timestamp: event.timestamp,
      action: event.action,
      amount: event.amount,
      location: event.location,
      ingredient: event.ingredient,
      synced: event.synced,
    })
    .returning({ sequence: libraLogs.sequence });

  const inserted = rows[0];
  if (inserted === undefined) {
    throw new Error('Insert into libra_logs returned no row');
  }
  return inserted.sequence;
}
