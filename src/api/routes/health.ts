/**
 * Health route.
 */
import type { FastifyInstance } from 'fastify';
import type { HealthReport, RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

export async function healthRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    const database = deps.isDatabaseReady();
    const report: HealthReport = {
      status: database ? 'healthy' : 'unhealthy',
      version: deps.version,
      database,
      timestamp: new Date().toISOString(),
    };
    return sendSuccess(reply, report, database ? 200 : 503);
  });
}
