import type { BaseLogger } from 'pino';

/**
 * The slice of a pino logger the core writes to.
 * Fastify's request and instance loggers satisfy it as well.
 */
export type Log = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
