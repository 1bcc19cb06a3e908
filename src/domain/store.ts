import type { ScaleEvent } from './event.js';

/**
 * Read-only view of the append-only event log.
 *
 * Every method may reject with `StoreUnavailableError`.
 */
export interface EventStore {
  /** Highest sequence in the store, 0 when empty. */
  maxSequence(): Promise<number>;

  /** Events with `sequence > after`, ascending by sequence. */
  eventsAfter(after: number): Promise<ScaleEvent[]>;

  /**
   * The event that best represents a device's current state: the newest
   * priority action, otherwise the newest event. Null when there is none.
   */
  currentStateForKey(deviceKey: string): Promise<ScaleEvent | null>;

  /** Events of one device, descending by sequence. */
  eventsForKey(deviceKey: string, limit?: number): Promise<ScaleEvent[]>;

  /** Most recent events across all devices, descending by sequence. */
  recentEvents(limit?: number): Promise<ScaleEvent[]>;
}
