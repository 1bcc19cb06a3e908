import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listRecentEvents, getLatestRecord, MAX_RECENT_LIMIT } from '../../application/index.js';
import { StoreUnavailableError } from '../../domain/index.js';

export interface QueryRoutesOptions {
  recentLimitMax?: number;
}

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for anything non-integral.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/** The 4xx status Fastify attached to a request error, if any. */
function clientErrorStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('statusCode' in err)) return undefined;
  const { statusCode } = err;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}

/**
 * Read-only query API routes.
 *
 * GET /api/v1/records                     — bounded history, newest first
 * GET /api/v1/records/latest              — single newest record
 * GET /api/v1/devices/latest              — current state of every tracked scale
 * GET /api/v1/devices/:device_id/latest   — current state of one scale
 */
async function queryRoutes(fastify: FastifyInstance, opts: QueryRoutesOptions): Promise<void> {
  const maxLimit = opts.recentLimitMax ?? MAX_RECENT_LIMIT;

  // History reads propagate store failures; surface them as 503.
  fastify.setErrorHandler((err, request, reply) => {
    if (err instanceof StoreUnavailableError) {
      request.log.error({ err }, 'Store unavailable');
      return reply.status(503).send({ error: 'Event store unavailable' });
    }
    const status = clientErrorStatus(err);
    if (status === undefined || !(err instanceof Error)) {
      request.log.error({ err }, 'Request failed');
      return reply.status(500).send({ error: 'Internal Server Error' });
    }
    return reply.status(status).send({ error: err.message });
  });

  /**
   * GET /api/v1/records
   *
   * Query params: limit (default 100, clamped to [1, max]), device_id
   */
  fastify.get(
    '/api/v1/records',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          device_id?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;
      const limit = safeInt(q.limit);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const result = await listRecentEvents(
        fastify.eventStore,
        { limit, device_id: q.device_id },
        maxLimit,
      );

      return reply.status(200).send({ ...result, timestamp: new Date().toISOString() });
    },
  );

  /**
   * GET /api/v1/records/latest
   */
  fastify.get(
    '/api/v1/records/latest',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const record = await getLatestRecord(fastify.eventStore);
      const timestamp = new Date().toISOString();

      if (record === null) {
        return reply.status(404).send({ record: null, message: 'No records found', timestamp });
      }

      return reply.status(200).send({ record, timestamp });
    },
  );

  /**
   * GET /api/v1/devices/latest
   *
   * Keys that fail or have no events resolve to null.
   */
  fastify.get(
    '/api/v1/devices/latest',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const devices = await fastify.stateResolver.latestForAll();
      return reply.status(200).send({ devices, timestamp: new Date().toISOString() });
    },
  );

  /**
   * GET /api/v1/devices/:device_id/latest
   */
  fastify.get(
    '/api/v1/devices/:device_id/latest',
    async (
      request: FastifyRequest<{ Params: { device_id: string } }>,
      reply: FastifyReply,
    ) => {
      const record = await fastify.stateResolver.latestFor(request.params.device_id);
      const timestamp = new Date().toISOString();

      if (record === null) {
        return reply.status(404).send({ record: null, message: 'No state for device', timestamp });
      }

      return reply.status(200).send({ record, timestamp });
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['db', 'monitor'],
  fastify: '5.x',
});
