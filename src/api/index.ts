// REST endpoints (Fastify)
export type { ApiError, ApiResponse, HealthReport, RouteDependencies } from './types.js';

export { registerErrorHandler, sendSuccess, sendError, sendNotFound } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { API_PREFIX, createServer } from './server.js';
export type { ServerOptions } from './server.js';
