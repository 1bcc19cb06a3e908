import type { Log } from './logger.js';
import type { EventStore, ScaleEvent } from '../domain/index.js';
import { isPriorityAction } from '../domain/index.js';

export type DeviceStates = Record<string, ScaleEvent | null>;

/**
 * Orders events by "how well they represent current state":
 * priority actions (Served, Refilled) before ordinary ones, then by
 * sequence descending. Timestamps play no part.
 */
export function compareCurrentState(a: ScaleEvent, b: ScaleEvent): number {
  const pa = isPriorityAction(a.action) ? 0 : 1;
  const pb = isPriorityAction(b.action) ? 0 : 1;
  if (pa !== pb) return pa - pb;
  return b.sequence - a.sequence;
}

/** Returns the event that sorts first under `compareCurrentState`, or null. */
export function selectCurrentState(events: readonly ScaleEvent[]): ScaleEvent | null {
  let best: ScaleEvent | null = null;
  for (const event of events) {
    if (best === null || compareCurrentState(event, best) < 0) {
      best = event;
    }
  }
  return best;
}

/**
 * Resolves the representative reading of each tracked scale.
 *
 * The store answers with the single event `compareCurrentState` ranks
 * first, so only one row per device is read. Reads the store directly on every call; shares nothing with the
 * change monitor.
 */
export class LatestStateResolver {
  constructor(
    private readonly store: EventStore,
    private readonly log: Log,
    readonly deviceKeys: readonly string[],
  ) {}

  /** Null when the device has no events or the store query fails. */
  async latestFor(deviceKey: string): Promise<ScaleEvent | null> {
    try {
      return await this.store.currentStateForKey(deviceKey);
    } catch (err: unknown) {
      this.log.warn({ err, device_id: deviceKey }, 'Failed to resolve latest state');
      return null;
    }
  }

  /** A failing key resolves to null; the others are unaffected. */
  async latestForAll(deviceKeys: readonly string[] = this.deviceKeys): Promise<DeviceStates> {
    const resolved = await Promise.all(
      deviceKeys.map(async (key) => [key, await this.latestFor(key)] as const),
    );

    const states: DeviceStates = {};
    for (const [key, event] of resolved) {
      states[key] = event;
    }
    return states;
  }
}
