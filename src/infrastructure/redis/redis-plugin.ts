import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string | undefined;
}

/**
 * Fastify plugin that manages the optional ioredis connection.
 *
 * - Without a URL, decorates `fastify.redis` with null and does nothing else.
 * - Otherwise connects on registration and disconnects on close.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  if (opts.redisUrl === undefined) {
    fastify.decorate('redis', null);
    fastify.log.info('REDIS_URL not set, batch publishing disabled');
    return;
  }

  const redis = new Redis(opts.redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  fastify.log.info('Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis | null;
  }
}
