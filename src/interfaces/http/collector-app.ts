import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { agentStorePlugin } from '../../infrastructure/index.js';
import type { LogLevel } from '../../infrastructure/index.js';
import collectorRoutes from './collector-routes.js';

export interface CollectorOptions {
  /** Bearer token the collector accepts. Any token when omitted. */
  apiKey?: string | undefined;
  /** Request logging level; logging is off when omitted. */
  logLevel?: LogLevel | undefined;
}

/**
 * Builds the in-memory collector app without listening, so tests can
 * drive it through `inject()`.
 */
export function buildCollector(options: CollectorOptions = {}): FastifyInstance {
  const fastify = Fastify({
    logger: options.logLevel === undefined ? false : { level: options.logLevel },
  });

  void fastify.register(agentStorePlugin);
  void fastify.register(collectorRoutes, { apiKey: options.apiKey });

  return fastify;
}
