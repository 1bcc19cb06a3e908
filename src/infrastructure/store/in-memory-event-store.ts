import type { EventStore, NewScaleEvent, ScaleEvent } from '../../domain/index.js';
import { StoreUnavailableError } from '../../domain/index.js';
import { selectCurrentState } from '../../application/latest-state.js';

/**
 * In-memory event store.
 *
 * Array-backed stand-in for the Postgres table: assigns sequences on
 * append and answers the same queries in the same order. Can be switched
 * unavailable to simulate an outage.
 */
export class InMemoryEventStore implements EventStore {
  private readonly rows: ScaleEvent[] = [];
  private nextSequence: number;
  private available = true;

  /** `startAfter` lets a store begin as if earlier rows had existed. */
  constructor(startAfter = 0) {
    this.nextSequence = startAfter + 1;
  }

  /** Append a reading; returns the stored event with its sequence. */
  append(event: NewScaleEvent): ScaleEvent {
    const stored: ScaleEvent = { ...event, sequence: this.nextSequence++ };
    this.rows.push(stored);
    return stored;
  }

  /** While false, every query rejects with `StoreUnavailableError`. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  get size(): number {
    return this.rows.length;
  }

  async maxSequence(): Promise<number> {
    this.assertAvailable('max_sequence');
    return this.rows.at(-1)?.sequence ?? 0;
  }

  async eventsAfter(after: number): Promise<ScaleEvent[]> {
    this.assertAvailable('events_after');
    return this.rows.filter((row) => row.sequence > after);
  }

  async currentStateForKey(deviceKey: string): Promise<ScaleEvent | null> {
    this.assertAvailable('current_state_for_key');
    return selectCurrentState(this.rows.filter((row) => row.device_id === deviceKey));
  }

  async eventsForKey(deviceKey: string, limit?: number): Promise<ScaleEvent[]> {
    this.assertAvailable('events_for_key');
    return take(newestFirst(this.rows.filter((row) => row.device_id === deviceKey)), limit);
  }

  async recentEvents(limit?: number): Promise<ScaleEvent[]> {
    this.assertAvailable('recent_events');
    return take(newestFirst(this.rows), limit);
  }

  private assertAvailable(operation: string): void {
    if (!this.available) {
      throw new StoreUnavailableError(operation, new Error('in-memory store marked unavailable'));
    }
  }
}

function newestFirst(rows: readonly ScaleEvent[]): ScaleEvent[] {
  return [...rows].reverse();
}

function take(rows: ScaleEvent[], limit: number | undefined): ScaleEvent[] {
  return limit === undefined ? rows : rows.slice(0, Math.max(limit, 0));
}
