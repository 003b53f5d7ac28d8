/**
 * Fastify server factory: security plugins, error handler and the
 * versioned API routes.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export const API_PREFIX = '/api/v1';

export interface ServerOptions {
  /** Comma-separated origins. Unset allows any origin. */
  corsOrigin?: string;
  /** Requests per minute per client. */
  rateLimitMax: number;
}

export async function createServer(
  deps: RouteDependencies,
  options: ServerOptions,
): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });

  await server.register(cors, {
    origin: options.corsOrigin ? options.corsOrigin.split(',') : true,
  });
  await server.register(helmet);
  await server.register(rateLimit, { max: options.rateLimitMax, timeWindow: '1 minute' });

  registerErrorHandler(server);

  await server.register(
    async (api) => {
      await registerRoutes(api, deps);
    },
    { prefix: API_PREFIX },
  );

  return server;
}
