import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /health — liveness plus a snapshot of the monitor.
 * Does not touch the store, so it stays green during a database outage.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        monitoring: fastify.monitor.isRunning,
        cursor: fastify.monitor.cursor,
        observers: fastify.monitor.observerCount,
        stream_clients: fastify.streamHub.clientCount,
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['monitor'],
  fastify: '5.x',
});
