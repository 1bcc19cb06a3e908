import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../../domain/index.js';
import { createDbClient } from './client.js';
import { DrizzleEventStore } from './drizzle-event-store.js';

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.eventStore` for use by the monitor and query routes.
 * postgres.js connects lazily, so an unreachable database surfaces as
 * `StoreUnavailableError` on first use rather than at startup.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.databaseUrl);

  fastify.decorate('eventStore', new DrizzleEventStore(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventStore` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventStore: EventStore;
  }
}
