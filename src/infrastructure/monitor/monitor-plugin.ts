import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { ChangeMonitor, LatestStateResolver, createLoggingObserver } from '../../application/index.js';
import { StreamHub } from '../../interfaces/sse/stream-hub.js';
import { createRedisBatchObserver } from '../redis/index.js';

export interface MonitorPluginOptions {
  pollIntervalMs: number;
  deviceKeys: readonly string[];
  streamHeartbeatMs: number;
}

/**
 * Fastify plugin that owns the change monitor's background loop.
 *
 * Decorates `fastify.monitor`, `fastify.stateResolver` and `fastify.streamHub`.
 * Observers, in order: log each record, push to stream clients, publish to
 * Redis (when a connection exists).
 *
 * The loop starts once the server is ready. On shutdown the stream clients
 * are ended before the HTTP server closes; the loop is stopped, then
 * awaited, afterwards.
 */
async function monitorPlugin(fastify: FastifyInstance, opts: MonitorPluginOptions): Promise<void> {
  const log = fastify.log.child({ component: 'change-monitor' });

  const monitor = new ChangeMonitor(fastify.eventStore, log, { pollIntervalMs: opts.pollIntervalMs });
  const resolver = new LatestStateResolver(fastify.eventStore, fastify.log, opts.deviceKeys);
  const hub = new StreamHub(fastify.log.child({ component: 'stream' }), opts.streamHeartbeatMs);

  monitor.registerObserver(createLoggingObserver(log));
  monitor.registerObserver(hub.observer());
  if (fastify.redis !== null) {
    monitor.registerObserver(createRedisBatchObserver(fastify.redis, log));
  }

  fastify.decorate('monitor', monitor);
  fastify.decorate('stateResolver', resolver);
  fastify.decorate('streamHub', hub);

  let loop: Promise<void> | null = null;

  fastify.addHook('onReady', async () => {
    hub.start();
    loop = monitor.run().catch((err: unknown) => {
      fastify.log.error({ err }, 'Change monitor loop crashed');
    });
  });

  // Server close waits on open sockets; hijacked SSE replies must end first.
  fastify.addHook('preClose', async () => {
    hub.close();
  });

  fastify.addHook('onClose', async () => {
    monitor.stop();
    if (loop) await loop;
  });
}

export default fp(monitorPlugin, {
  name: 'monitor',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    monitor: ChangeMonitor;
    stateResolver: LatestStateResolver;
    streamHub: StreamHub;
  }
}
