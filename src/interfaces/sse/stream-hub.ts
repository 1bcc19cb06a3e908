import type { ScaleEvent } from '../../domain/index.js';
import type { BatchObserver, Log } from '../../application/index.js';

/**
 * Server-Sent Events fan-out for new records.
 *
 * - one `connected` message when a client attaches
 * - one `records` message per monitor batch
 * - a `heartbeat` message every `heartbeatMs` to keep proxies from
 *   closing idle connections
 *
 * The hub only writes; clients never send anything back.
 */

/** The part of `http.ServerResponse` the hub writes to. */
export interface SseSink {
  write(chunk: string): boolean;
  end(): void;
  readonly destroyed: boolean;
}

export type StreamMessage =
  | { type: 'connected'; timestamp: string; client_id: number }
  | { type: 'records'; timestamp: string; count: number; records: readonly ScaleEvent[] }
  | { type: 'heartbeat'; timestamp: string };

interface SseClient {
  id: number;
  sink: SseSink;
  closed: boolean;
}

export function formatSseMessage(message: StreamMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}

export class StreamHub {
  private readonly clients: Set<SseClient> = new Set();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private nextClientId = 1;

  constructor(
    private readonly log: Log,
    private readonly heartbeatMs = 30_000,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  start(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatMs);
  }

  close(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    for (const client of this.clients) {
      this.detach(client, 'server_shutdown');
    }
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /* ------------------------------------------------------------------ */
  /*  Clients                                                           */
  /* ------------------------------------------------------------------ */

  /** Registers a sink and greets it. Returns a function that detaches it. */
  attach(sink: SseSink): () => void {
    const client: SseClient = { id: this.nextClientId++, sink, closed: false };
    this.clients.add(client);

    this.log.info({ clientId: client.id, clientCount: this.clients.size }, 'Stream client connected');
    this.send(client, { type: 'connected', timestamp: this.timestamp(), client_id: client.id });

    return () => this.detach(client, 'client_closed');
  }

  /* ------------------------------------------------------------------ */
  /*  Messages                                                          */
  /* ------------------------------------------------------------------ */

  broadcast(records: readonly ScaleEvent[]): number {
    const sent = this.sendAll({
      type: 'records',
      timestamp: this.timestamp(),
      count: records.length,
      records,
    });
    this.log.debug({ clientCount: this.clients.size, sent, count: records.length }, 'Broadcast records to stream clients');
    return sent;
  }

  heartbeat(): number {
    return this.sendAll({ type: 'heartbeat', timestamp: this.timestamp() });
  }

  /** Monitor observer that broadcasts each batch. */
  observer(): BatchObserver {
    return (batch) => {
      this.broadcast(batch);
    };
  }

  /* ------------------------------------------------------------------ */
  /*  Private                                                           */
  /* ------------------------------------------------------------------ */

  private sendAll(message: StreamMessage): number {
    const frame = formatSseMessage(message);
    let sent = 0;
    for (const client of this.clients) {
      if (this.write(client, frame)) sent++;
    }
    return sent;
  }

  private send(client: SseClient, message: StreamMessage): boolean {
    return this.write(client, formatSseMessage(message));
  }

  /**
   * Returns true on success. A failed write drops the client, and so does
   * a full socket buffer: a stalled reader is ended rather than queued for.
   * Browsers' EventSource reconnects on its own.
   */
  private write(client: SseClient, frame: string): boolean {
    if (client.closed || client.sink.destroyed) {
      this.detach(client, 'destroyed');
      return false;
    }
    try {
      if (client.sink.write(frame)) return true;
      this.log.warn({ clientId: client.id }, 'Stream client is not draining, dropping it');
      this.detach(client, 'backpressure');
      return false;
    } catch (err: unknown) {
      this.log.debug({ clientId: client.id, err }, 'Stream write failed');
      this.detach(client, 'write_error');
      return false;
    }
  }

  /** Idempotent. */
  private detach(client: SseClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);

    if (!client.sink.destroyed) {
      try {
        client.sink.end();
      } catch (err: unknown) {
        this.log.debug({ clientId: client.id, err }, 'Stream end failed');
      }
    }

    this.log.info({ clientId: client.id, reason, clientCount: this.clients.size }, 'Stream client disconnected');
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
