import type { EventStore, ScaleEvent } from '../domain/index.js';

export const DEFAULT_RECENT_LIMIT = 100;
export const MAX_RECENT_LIMIT = 1000;

export interface ListRecentParams {
  limit?: number;
  device_id?: string;
}

/**
 * Use case: most recent records, newest first.
 * Clamps limit to [1, maxLimit], defaults to 100.
 * Store failures propagate as `StoreUnavailableError`.
 */
export async function listRecentEvents(
  store: EventStore,
  params: ListRecentParams,
  maxLimit: number = MAX_RECENT_LIMIT,
) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_RECENT_LIMIT, 1), maxLimit);

  const records = params.device_id !== undefined
    ? await store.eventsForKey(params.device_id, limit)
    : await store.recentEvents(limit);

  return {
    records,
    count: records.length,
    limit,
  };
}

/**
 * Use case: the single highest-sequence record.
 * Returns null if the store is empty.
 */
export async function getLatestRecord(store: EventStore): Promise<ScaleEvent | null> {
  const [latest] = await store.recentEvents(1);
  return latest ?? null;
}
