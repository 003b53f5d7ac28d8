import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  NotFoundError,
  PortTimeoutError,
  ProviderError,
  QueueFullError,
  TriageError,
  ValidationError,
} from '@/core/errors.js';
import { registerErrorHandler, sendError, sendNotFound, sendSuccess } from './error-handler.js';

vi.mock('@/observability/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }),
}));

const ratingSchema = z.object({ rating: z.number().int().min(1).max(5) });

describe('error handler', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify();
    registerErrorHandler(app);

    app.get('/ok', async (_request, reply) => sendSuccess(reply, { conversation_id: 'conv_1' }));
    app.get('/created', async (_request, reply) => sendSuccess(reply, null, 201));
    app.get('/plain-error', async (_request, reply) =>
      sendError(reply, 'RATE_LIMITED', 'Slow down', 429, { retryAfter: 60 }),
    );
    app.get('/missing', async (_request, reply) => sendNotFound(reply, 'Webhook', 'wh_gone'));

    app.post('/feedback', async (request, reply) => sendSuccess(reply, ratingSchema.parse(request.body)));
    app.get('/throw/validation', () => {
      throw new ValidationError('Invalid event type: query.deleted', { event: 'query.deleted' });
    });
    app.get('/throw/not-found', () => {
      throw new NotFoundError('Conversation', 'conv_nope');
    });
    app.get('/throw/queue-full', () => {
      throw new QueueFullError('webhook-delivery', 1000);
    });
    app.get('/throw/provider', () => {
      throw new ProviderError('groq', 'rate limited');
    });
    app.get('/throw/timeout', () => {
      throw new PortTimeoutError('classification', 30_000);
    });
    app.get('/throw/custom', () => {
      throw new TriageError({ message: 'Teapot', code: 'TEAPOT', statusCode: 418 });
    });
    app.get('/throw/unexpected', () => {
      throw new Error('database exploded');
    });

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  async function get(url: string): Promise<{ status: number; body: unknown }> {
    const response = await app.inject({ method: 'GET', url });
    return { status: response.statusCode, body: JSON.parse(response.payload) };
  }

  // ─── Response Helpers ────────────────────────────────────────────

  it('wraps data in the success envelope', async () => {
    expect(await get('/ok')).toEqual({
      status: 200,
      body: { success: true, data: { conversation_id: 'conv_1' } },
    });
    expect(await get('/created')).toEqual({ status: 201, body: { success: true, data: null } });
  });

  it('sends errors with optional details', async () => {
    expect(await get('/plain-error')).toEqual({
      status: 429,
      body: { success: false, error: { code: 'RATE_LIMITED', message: 'Slow down', details: { retryAfter: 60 } } },
    });
    expect(await get('/missing')).toEqual({
      status: 404,
      body: { success: false, error: { code: 'NOT_FOUND', message: 'Webhook "wh_gone" not found' } },
    });
  });

  // ─── Error Mapping ───────────────────────────────────────────────

  it('maps a ZodError to 400 with the failing paths', async () => {
    const response = await app.inject({ method: 'POST', url: '/feedback', payload: { rating: 9 } });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.payload)).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: { issues: [{ path: 'rating', message: 'Number must be less than or equal to 5' }] },
      },
    });
  });

  it.each([
    ['/throw/validation', 400, 'VALIDATION_ERROR', 'Invalid event type: query.deleted', { event: 'query.deleted' }],
    ['/throw/not-found', 404, 'NOT_FOUND', 'Conversation "conv_nope" not found', { resource: 'Conversation', id: 'conv_nope' }],
    [
      '/throw/queue-full',
      503,
      'QUEUE_FULL',
      'Queue "webhook-delivery" is full (1000 pending jobs)',
      { queue: 'webhook-delivery', limit: 1000 },
    ],
    ['/throw/provider', 502, 'PROVIDER_ERROR', 'LLM provider "groq" error: rate limited', { provider: 'groq' }],
    [
      '/throw/timeout',
      504,
      'PORT_TIMEOUT',
      'Port "classification" timed out after 30000ms',
      { port: 'classification', timeoutMs: 30_000 },
    ],
  ])('maps %s to its status, code and context', async (url, status, code, message, details) => {
    expect(await get(url)).toEqual({ status, body: { success: false, error: { code, message, details } } });
  });

  it('uses the status and code of a base TriageError', async () => {
    expect(await get('/throw/custom')).toEqual({
      status: 418,
      body: { success: false, error: { code: 'TEAPOT', message: 'Teapot' } },
    });
  });

  it('reports malformed JSON bodies as request errors', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/feedback',
      headers: { 'content-type': 'application/json' },
      payload: '{"rating":',
    });

    expect(response.statusCode).toBe(400);
    expect((JSON.parse(response.payload) as { error: { code: string } }).error.code).toBe('REQUEST_ERROR');
  });

  it('hides the message of unexpected errors', async () => {
    expect(await get('/throw/unexpected')).toEqual({
      status: 500,
      body: { success: false, error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } },
    });
  });
});
