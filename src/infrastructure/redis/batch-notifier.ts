import type { Redis } from 'ioredis';
import type { ScaleEvent } from '../../domain/index.js';
import type { BatchObserver, Log } from '../../application/index.js';

export const RECORDS_CHANNEL = 'libra_records';

export interface RecordBatchPayload {
  count: number;
  first_sequence: number;
  last_sequence: number;
  records: readonly ScaleEvent[];
}

export function toBatchPayload(batch: readonly ScaleEvent[]): RecordBatchPayload {
  return {
    count: batch.length,
    first_sequence: batch[0]?.sequence ?? 0,
    last_sequence: batch.at(-1)?.sequence ?? 0,
    records: batch,
  };
}

/**
 * Publishes a batch of new records to the "libra_records" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged, never thrown, so the monitor's
 * other observers are unaffected.
 */
export async function publishRecordBatch(
  redis: Redis,
  log: Log,
  batch: readonly ScaleEvent[],
): Promise<void> {
  if (batch.length === 0) return;

  const payload = toBatchPayload(batch);
  try {
    const receivers = await redis.publish(RECORDS_CHANNEL, JSON.stringify(payload));
    log.debug(
      { channel: RECORDS_CHANNEL, count: payload.count, last_sequence: payload.last_sequence, receivers },
      'Published record batch',
    );
  } catch (err: unknown) {
    log.warn({ err, last_sequence: payload.last_sequence }, 'Failed to publish record batch');
  }
}

/** Monitor observer that forwards every batch to Redis. */
export function createRedisBatchObserver(redis: Redis, log: Log): BatchObserver {
  return (batch) => publishRecordBatch(redis, log, batch);
}
