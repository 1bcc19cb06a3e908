import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import {
  RECORDS_CHANNEL,
  createRedisBatchObserver,
  publishRecordBatch,
  toBatchPayload,
} from '../../src/infrastructure/redis/batch-notifier.js';
import type { ScaleEvent } from '../../src/domain/index.js';
import { makeReading, fakeLogger } from '../helpers.js';

function fakeRedis() {
  const publish = vi.fn().mockResolvedValue(1);
  return { redis: { publish } as unknown as Redis, publish };
}

const batch: ScaleEvent[] = [
  { ...makeReading({ action: 'Served' }), sequence: 11 },
  { ...makeReading({ action: 'Heartbeat' }), sequence: 12 },
];

describe('toBatchPayload', () => {
  it('summarises the sequence range', () => {
    expect(toBatchPayload(batch)).toEqual({
      count: 2,
      first_sequence: 11,
      last_sequence: 12,
      records: batch,
    });
  });
});

describe('publishRecordBatch', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('publishes the batch as JSON on the records channel', async () => {
    const { redis, publish } = fakeRedis();

    await publishRecordBatch(redis, log, batch);

    expect(publish).toHaveBeenCalledTimes(1);
    const [channel, message] = publish.mock.calls[0]!;
    expect(channel).toBe(RECORDS_CHANNEL);
    expect(JSON.parse(message)).toEqual(toBatchPayload(batch));
  });

  it('skips empty batches', async () => {
    const { redis, publish } = fakeRedis();

    await publishRecordBatch(redis, log, []);

    expect(publish).not.toHaveBeenCalled();
  });

  it('logs and swallows publish failures', async () => {
    const { redis, publish } = fakeRedis();
    publish.mockRejectedValue(new Error('Connection is closed.'));

    await expect(publishRecordBatch(redis, log, batch)).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ last_sequence: 12 }),
      'Failed to publish record batch',
    );
  });
});

describe('createRedisBatchObserver', () => {
  it('forwards each batch to Redis', async () => {
    const { redis, publish } = fakeRedis();
    const observer = createRedisBatchObserver(redis, fakeLogger());

    await observer(batch);

    expect(publish).toHaveBeenCalledWith(RECORDS_CHANNEL, JSON.stringify(toBatchPayload(batch)));
  });
});
