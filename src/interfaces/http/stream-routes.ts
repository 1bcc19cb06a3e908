import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/stream — Server-Sent Events feed of new records.
 *
 * The reply is hijacked: Fastify hands the raw response to the stream hub,
 * which owns it until the client goes away or the server shuts down.
 */
async function streamRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/stream',
    (_request: FastifyRequest, reply: FastifyReply) => {
      reply.hijack();

      reply.raw.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        'Connection': 'keep-alive',
        'Access-Control-Allow-Origin': '*',
      });

      const detach = fastify.streamHub.attach(reply.raw);
      reply.raw.on('close', detach);
    },
  );
}

export default fp(streamRoutes, {
  name: 'stream-routes',
  dependencies: ['monitor'],
  fastify: '5.x',
});
