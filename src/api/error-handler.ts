/**
 * Global Fastify error handler and the ApiResponse envelope helpers.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { TriageError } from '@/core/index.js';
import { createLogger } from '@/observability/logger.js';
import type { ApiResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

// ─── Response Helpers ───────────────────────────────────────────

export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

/** `details` is omitted from the body when not given. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Error Mapping ──────────────────────────────────────────────

interface MappedError {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

/** Returns undefined for errors that should surface as a generic 500. */
function mapError(error: unknown): MappedError | undefined {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: {
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    };
  }
  if (error instanceof TriageError) {
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      details: error.context,
    };
  }
  // Fastify built-ins such as malformed JSON bodies
  if (hasStatusCode(error)) {
    return { statusCode: error.statusCode, code: 'REQUEST_ERROR', message: error.message };
  }
  return undefined;
}

// ─── Global Error Handler ───────────────────────────────────────

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error);

    if (!mapped) {
      logger.error('Unhandled error in request', {
        component: 'error-handler',
        method: request.method,
        url: request.url,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
      return;
    }

    if (error instanceof TriageError) {
      logger.warn('Request failed', {
        component: 'error-handler',
        method: request.method,
        url: request.url,
        code: mapped.code,
        statusCode: mapped.statusCode,
      });
    }
    await sendError(reply, mapped.code, mapped.message, mapped.statusCode, mapped.details);
  });
}
