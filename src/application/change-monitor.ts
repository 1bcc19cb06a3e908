import type { Log } from './logger.js';
import type { EventStore, ScaleEvent } from '../domain/index.js';
import { ObserverFailure } from '../domain/index.js';
import { sleep } from './sleep.js';

const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Receives every batch of newly appended events, in sequence order.
 * May be sync or async; a rejection counts as a failure of this observer only.
 */
export type BatchObserver = (batch: readonly ScaleEvent[]) => void | Promise<void>;

export interface ChangeMonitorOptions {
  pollIntervalMs?: number;
}

/**
 * Incremental change detector over the append-only event store.
 *
 * Keeps a high-water mark (`cursor`) of the last delivered sequence and, once
 * per poll interval, fetches everything after it and hands the batch to all
 * registered observers.
 *
 * Delivery rules:
 * - The cursor only moves forward, and only after a batch has been fetched.
 * - A failed fetch leaves the cursor where it was; the next cycle retries.
 * - Observers are awaited one after another, in registration order. A
 *   failing observer is logged and skipped. The cursor is never rolled back,
 *   so no event is redelivered.
 * - `stop()` takes effect between cycles, never during `pollOnce()`.
 *
 * The cursor lives in memory only: a restart starts again from the store's
 * current maximum.
 */
export class ChangeMonitor {
  private lastSeenSequence = 0;
  private initializing: Promise<void> | null = null;
  private readonly observers: BatchObserver[] = [];
  private readonly pollIntervalMs: number;
  private abort: AbortController | null = null;

  constructor(
    private readonly store: EventStore,
    private readonly log: Log,
    options: ChangeMonitorOptions = {},
  ) {
    this.pollIntervalMs = assertPositiveInterval(options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  }

  /** Highest sequence already delivered to observers. */
  get cursor(): number {
    return this.lastSeenSequence;
  }

  get isRunning(): boolean {
    return this.abort !== null;
  }

  get observerCount(): number {
    return this.observers.length;
  }

  /**
   * Positions the cursor at the store's current maximum so history is not
   * replayed. An unreachable store starts the cursor at 0.
   *
   * Only the first call queries the store; later calls share its result,
   * so the cursor never moves backwards or skips undelivered events.
   */
  async initialize(): Promise<number> {
    this.initializing ??= this.positionCursor();
    await this.initializing;
    return this.lastSeenSequence;
  }

  private async positionCursor(): Promise<void> {
    let max = 0;
    try {
      max = await this.store.maxSequence();
    } catch (err: unknown) {
      this.log.error({ err }, 'Could not read max sequence — starting monitor from 0');
    }

    this.lastSeenSequence = Math.max(this.lastSeenSequence, max);
    this.log.info({ cursor: this.lastSeenSequence }, 'Change monitor initialized');
  }

  registerObserver(observer: BatchObserver): void {
    this.observers.push(observer);
  }

  /**
   * Runs one detection cycle and returns the batch it delivered
   * (empty when nothing is new or the store failed).
   */
  async pollOnce(): Promise<readonly ScaleEvent[]> {
    let batch: ScaleEvent[];
    try {
      batch = await this.store.eventsAfter(this.lastSeenSequence);
    } catch (err: unknown) {
      this.log.error({ err, cursor: this.lastSeenSequence }, 'Failed to fetch new records — retrying next cycle');
      return [];
    }

    const last = batch.at(-1);
    if (last === undefined) return [];

    this.lastSeenSequence = last.sequence;
    this.log.info(
      { count: batch.length, cursor: this.lastSeenSequence },
      `Found ${batch.length} new records`,
    );

    await this.dispatch(batch);
    return batch;
  }

  /**
   * Poll loop. Resolves once `stop()` has been called and the current cycle
   * has finished.
   */
  async run(pollIntervalMs: number = this.pollIntervalMs): Promise<void> {
    assertPositiveInterval(pollIntervalMs);
    if (this.abort !== null) {
      throw new Error('Change monitor is already running');
    }

    const ac = new AbortController();
    this.abort = ac;

    try {
      await this.initialize();

      this.log.info({ cursor: this.lastSeenSequence, pollIntervalMs }, 'Change monitor started');

      while (!ac.signal.aborted) {
        await this.pollOnce();
        if (ac.signal.aborted) break;
        await sleep(pollIntervalMs, ac.signal);
      }
    } finally {
      this.abort = null;
      this.log.info({ cursor: this.lastSeenSequence }, 'Change monitor stopped');
    }
  }

  stop(): void {
    this.abort?.abort();
  }

  private async dispatch(batch: readonly ScaleEvent[]): Promise<void> {
    // Snapshot: observers registered mid-dispatch start with the next cycle.
    const observers = [...this.observers];

    for (const [index, observer] of observers.entries()) {
      try {
        await observer(batch);
      } catch (err: unknown) {
        const failure = new ObserverFailure(index, err);
        this.log.error({ err: failure, observer: index }, 'Error in batch observer');
      }
    }
  }
}

function assertPositiveInterval(ms: number): number {
  if (!(ms > 0)) {
    throw new RangeError(`pollIntervalMs must be positive, got ${ms}`);
  }
  return ms;
}
