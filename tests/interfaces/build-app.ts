import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import redisPlugin from '../../src/infrastructure/redis/redis-plugin.js';
import monitorPlugin from '../../src/infrastructure/monitor/monitor-plugin.js';
import queryRoutes from '../../src/interfaces/http/query-routes.js';
import healthRoutes from '../../src/interfaces/http/health-routes.js';
import streamRoutes from '../../src/interfaces/http/stream-routes.js';
import type { InMemoryEventStore } from '../../src/infrastructure/store/in-memory-event-store.js';

/** Stands in for the Postgres plugin under the same name. */
const memoryDbPlugin = fp(
  async (fastify: FastifyInstance, opts: { store: InMemoryEventStore }) => {
    fastify.decorate('eventStore', opts.store);
  },
  { name: 'db', fastify: '5.x' },
);

export interface TestAppOptions {
  recentLimitMax?: number;
  /** Extra routes, registered after the real ones. */
  extraRoutes?: (app: FastifyInstance) => void;
}

/** The server's plugin stack over an in-memory store, without Redis. */
export async function buildApp(
  store: InMemoryEventStore,
  opts: TestAppOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(memoryDbPlugin, { store });
  await app.register(redisPlugin, { redisUrl: undefined });
  await app.register(monitorPlugin, {
    pollIntervalMs: 10,
    deviceKeys: ['A', 'B', 'C'],
    streamHeartbeatMs: 30_000,
  });
  await app.register(healthRoutes);
  await app.register(queryRoutes, { recentLimitMax: opts.recentLimitMax });
  await app.register(streamRoutes);
  opts.extraRoutes?.(app);
  await app.ready();
  return app;
}
