/**
 * Query routes: request processing, feedback and conversation history.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';
import { serializeConversation, serializeFeedback, serializeQueryResult } from '../serializers.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const queryBodySchema = z.object({
  message: z.string().trim().min(1).max(5000),
  user_id: z.string().min(1).max(200).optional(),
  conversation_id: z.string().min(1).max(100).optional(),
});

const feedbackBodySchema = z.object({
  conversation_id: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(2000).optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register query, feedback and history routes. */
export async function queryRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  const { supportService } = deps;

  // POST /query: run a request through the workflow
  fastify.post('/query', async (request, reply) => {
    const body = queryBodySchema.parse(request.body);
    const result = await supportService.processQuery({
      message: body.message,
      userId: body.user_id,
      conversationId: body.conversation_id,
    });
    return sendSuccess(reply, serializeQueryResult(result, new Date()));
  });

  // POST /feedback
  fastify.post('/feedback', async (request, reply) => {
    const body = feedbackBodySchema.parse(request.body);
    const feedback = await supportService.submitFeedback({
      conversationId: body.conversation_id,
      rating: body.rating,
      comment: body.comment,
    });
    return sendSuccess(reply, serializeFeedback(feedback), 201);
  });

  // GET /conversations/:userId: most recent first
  fastify.get<{ Params: { userId: string } }>('/conversations/:userId', async (request, reply) => {
    const { limit } = historyQuerySchema.parse(request.query);
    const conversations = await supportService.getHistory(request.params.userId, limit);
    return sendSuccess(reply, conversations.map(serializeConversation));
  });
}
