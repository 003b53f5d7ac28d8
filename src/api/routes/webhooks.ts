/**
 * Webhook subscription routes: CRUD, test sends and delivery logs.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { asSubscriptionId } from '@/core/index.js';
import { WEBHOOK_EVENTS } from '@/webhooks/types.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';
import { paginationSchema, toPaginated } from '../pagination.js';
import { serializeDelivery, serializeSubscription, serializeTestResult } from '../serializers.js';

// ─── Zod Schemas ────────────────────────────────────────────────

// Event names are checked by the subscription service so unknown ones
// are reported by name.
const createWebhookSchema = z.object({
  url: z.string().min(1).max(2000),
  events: z.array(z.string()).min(1).max(20),
});

const updateWebhookSchema = z.object({
  url: z.string().min(1).max(2000).optional(),
  events: z.array(z.string()).min(1).max(20).optional(),
  is_active: z.boolean().optional(),
});

const listFiltersSchema = z.object({
  is_active: z.enum(['true', 'false']).optional(),
});

const EVENT_DESCRIPTIONS: Record<(typeof WEBHOOK_EVENTS)[number], string> = {
  'query.created': 'A request was received and processed',
  'query.resolved': 'A request was answered without escalation',
  'query.escalated': 'A request was handed to a human',
  'feedback.received': 'A requester rated an answer',
};

// ─── Route Plugin ───────────────────────────────────────────────

/** Register webhook subscription routes. */
export async function webhookRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { subscriptionService } = deps;

  // GET /webhooks/events: subscribable event types
  fastify.get('/webhooks/events', async (_request, reply) => {
    return sendSuccess(
      reply,
      WEBHOOK_EVENTS.map((event) => ({ event, description: EVENT_DESCRIPTIONS[event] })),
    );
  });

  // GET /webhooks: list with optional active filter and pagination
  fastify.get('/webhooks', async (request, reply) => {
    const { limit, offset, is_active } = paginationSchema.merge(listFiltersSchema).parse(request.query);
    const page = await subscriptionService.list({
      isActive: is_active === undefined ? undefined : is_active === 'true',
      skip: offset,
      limit,
    });
    return sendSuccess(reply, toPaginated(page, limit, offset, serializeSubscription));
  });

  // POST /webhooks
  fastify.post('/webhooks', async (request, reply) => {
    const input = createWebhookSchema.parse(request.body);
    const subscription = await subscriptionService.create(input.url, input.events);
    return sendSuccess(reply, serializeSubscription(subscription), 201);
  });

  // GET /webhooks/:id
  fastify.get<{ Params: { id: string } }>('/webhooks/:id', async (request, reply) => {
    const subscription = await subscriptionService.get(asSubscriptionId(request.params.id));
    return sendSuccess(reply, serializeSubscription(subscription));
  });

  // PUT /webhooks/:id
  fastify.put<{ Params: { id: string } }>('/webhooks/:id', async (request, reply) => {
    const input = updateWebhookSchema.parse(request.body);
    const subscription = await subscriptionService.update(asSubscriptionId(request.params.id), {
      url: input.url,
      events: input.events,
      isActive: input.is_active,
    });
    return sendSuccess(reply, serializeSubscription(subscription));
  });

  // DELETE /webhooks/:id
  fastify.delete<{ Params: { id: string } }>('/webhooks/:id', async (request, reply) => {
    await subscriptionService.delete(asSubscriptionId(request.params.id));
    return sendSuccess(reply, { deleted: true });
  });

  // POST /webhooks/:id/test: single attempt, not logged
  fastify.post<{ Params: { id: string } }>('/webhooks/:id/test', async (request, reply) => {
    const result = await subscriptionService.test(asSubscriptionId(request.params.id));
    return sendSuccess(reply, serializeTestResult(result));
  });

  // GET /webhooks/:id/deliveries: newest first
  fastify.get<{ Params: { id: string } }>('/webhooks/:id/deliveries', async (request, reply) => {
    const { limit, offset } = paginationSchema.parse(request.query);
    const page = await subscriptionService.getDeliveryLogs(asSubscriptionId(request.params.id), {
      skip: offset,
      limit,
    });
    return sendSuccess(reply, toPaginated(page, limit, offset, serializeDelivery));
  });
}
