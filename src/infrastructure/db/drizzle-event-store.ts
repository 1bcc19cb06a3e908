import type { EventStore, ScaleEvent } from '../../domain/index.js';
import { StoreUnavailableError } from '../../domain/index.js';
import type { Database } from './client.js';
import {
  findMaxSequence,
  findEventsAfter,
  findEventsForDevice,
  findCurrentStateForDevice,
  findRecentEvents,
} from './event-query-repository.js';

/**
 * `EventStore` over the Postgres `libra_logs` table.
 *
 * Any driver or SQL error (connection refused, missing table, timeout) is
 * rethrown as `StoreUnavailableError` naming the operation.
 */
export class DrizzleEventStore implements EventStore {
  constructor(private readonly db: Database) {}

  maxSequence(): Promise<number> {
    return guard('max_sequence', () => findMaxSequence(this.db));
  }

  eventsAfter(after: number): Promise<ScaleEvent[]> {
    return guard('events_after', () => findEventsAfter(this.db, after));
  }

  currentStateForKey(deviceKey: string): Promise<ScaleEvent | null> {
    return guard('current_state_for_key', () => findCurrentStateForDevice(this.db, deviceKey));
  }

  eventsForKey(deviceKey: string, limit?: number): Promise<ScaleEvent[]> {
    return guard('events_for_key', () => findEventsForDevice(this.db, deviceKey, limit));
  }

  recentEvents(limit?: number): Promise<ScaleEvent[]> {
    return guard('recent_events', () => findRecentEvents(this.db, limit));
  }
}

async function guard<T>(operation: string, query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (err: unknown) {
    throw new StoreUnavailableError(operation, err);
  }
}
