import Fastify from 'fastify';
import { loadConfig, dbPlugin, redisPlugin, monitorPlugin } from './infrastructure/index.js';
import { queryRoutes, healthRoutes, streamRoutes } from './interfaces/http/index.js';
import { ConfigError } from './domain/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins (db, redis)
 * 3) Change monitor (loop starts on ready)
 * 4) HTTP routes
 * 5) Shutdown signals
 * 6) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });
  await fastify.register(redisPlugin, { redisUrl: config.redisUrl });

  await fastify.register(monitorPlugin, {
    pollIntervalMs: config.pollIntervalMs,
    deviceKeys: config.deviceKeys,
    streamHeartbeatMs: config.streamHeartbeatMs,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(queryRoutes, { recentLimitMax: config.recentLimitMax });
  await fastify.register(streamRoutes);

  // --------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  fastify.log.info(
    {
      pollIntervalMs: config.pollIntervalMs,
      deviceKeys: config.deviceKeys,
      redis: config.redisUrl !== undefined,
    },
    '=== Libra Log Monitor Server ===',
  );

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(
      'Fatal: failed to start server',
      err,
    );
  }

  process.exit(1);

});
