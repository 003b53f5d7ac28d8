/**
 * Support service: runs one employee request through the workflow, stores
 * the exchange and notifies webhook subscribers.
 */
import { customAlphabet } from 'nanoid';
import { NotFoundError } from '@/core/errors.js';
import { asConversationId, asRequesterId } from '@/core/types.js';
import type { RequesterId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import {
  feedbackReceivedData,
  queryCreatedData,
  queryEscalatedData,
  queryResolvedData,
} from '@/webhooks/events.js';
import type { WebhookDispatcher } from '@/webhooks/types.js';
import type { WorkflowEngine } from '@/workflow/engine.js';
import type { HistoryTurn, WorkflowResult } from '@/workflow/types.js';
import type {
  ConversationRepository,
  RequesterRepository,
  SupportService,
} from './types.js';

/** Requester used when the caller does not identify one. */
export const DEFAULT_USER_ID = 'web_user';

const generateSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 12);

export function generateConversationId(): string {
  return `conv_${generateSuffix()}`;
}

export interface SupportServiceDeps {
  engine: WorkflowEngine;
  conversations: ConversationRepository;
  requesters: RequesterRepository;
  dispatcher: WebhookDispatcher;
  logger: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createSupportService(deps: SupportServiceDeps): SupportService {
  const { engine, conversations, requesters, dispatcher } = deps;
  const logger = deps.logger.child({ component: 'support-service' });

  /** VIP flag and prior turns. A storage failure degrades to an anonymous first contact. */
  async function loadRequesterContext(
    requesterId: RequesterId,
  ): Promise<{ isVip: boolean; history: HistoryTurn[] }> {
    try {
      const requester = await requesters.getOrCreate(requesterId);
      const history = await conversations.recentHistory(requesterId);
      return { isVip: requester.isVip, history };
    } catch (error) {
      logger.warn('Failed to load requester context', {
        component: 'support-service',
        requesterId,
        error: describeError(error),
      });
      return { isVip: false, history: [] };
    }
  }

  async function persist(result: WorkflowResult, query: string): Promise<void> {
    try {
      await conversations.save({
        conversationId: result.conversationId,
        requesterId: result.requesterId,
        query,
        category: result.category,
        sentiment: result.sentiment,
        priorityScore: result.priorityScore,
        response: result.responseText,
        responseTimeSeconds: result.processingTimeSeconds,
        status: result.escalated ? 'Escalated' : 'Resolved',
        escalated: result.escalated,
        escalationReason: result.escalationReason,
        metadata: {
          route: result.route,
          knowledgeResults: result.knowledgeSnippets.length,
        },
      });
    } catch (error) {
      logger.error('Failed to persist conversation', {
        component: 'support-service',
        conversationId: result.conversationId,
        error: describeError(error),
      });
    }
  }

  function notify(result: WorkflowResult, query: string): void {
    dispatcher.dispatch(
      'query.created',
      queryCreatedData({
        queryId: result.conversationId,
        userId: result.requesterId,
        category: result.category,
        sentiment: result.sentiment,
        priority: result.priorityScore,
        query,
        metadata: {
          processing_time: result.processingTimeSeconds,
          kb_results_count: result.knowledgeSnippets.length,
        },
      }),
    );

    if (result.escalated) {
      dispatcher.dispatch(
        'query.escalated',
        queryEscalatedData({
          queryId: result.conversationId,
          userId: result.requesterId,
          category: result.category,
          sentiment: result.sentiment,
          priority: result.priorityScore,
          escalationReason: result.escalationReason ?? 'Unknown',
          query,
          metadata: { processing_time: result.processingTimeSeconds },
        }),
      );
    } else {
      dispatcher.dispatch(
        'query.resolved',
        queryResolvedData({
          queryId: result.conversationId,
          userId: result.requesterId,
          category: result.category,
          resolutionTimeSeconds: result.processingTimeSeconds,
          response: result.responseText,
        }),
      );
    }
  }

  return {
    async processQuery(input) {
      const requesterId = asRequesterId(input.userId ?? DEFAULT_USER_ID);
      const conversationId = asConversationId(input.conversationId ?? generateConversationId());

      logger.info('Processing query', { component: 'support-service', requesterId, conversationId });

      const { isVip, history } = await loadRequesterContext(requesterId);
      const result = await engine.run({
        text: input.message,
        requesterId,
        conversationId,
        priorHistory: history,
        requesterFlags: { isVip, isRepeat: false, attemptCount: 1 },
      });

      await persist(result, input.message);
      notify(result, input.message);

      logger.info('Query processed', {
        component: 'support-service',
        conversationId,
        category: result.category,
        escalated: result.escalated,
        processingTimeSeconds: result.processingTimeSeconds,
      });
      return result;
    },

    async submitFeedback(input) {
      const conversationId = asConversationId(input.conversationId);
      const conversation = await conversations.findById(conversationId);
      if (!conversation) throw new NotFoundError('Conversation', input.conversationId);

      const feedback = await conversations.addFeedback({
        conversationId,
        rating: input.rating,
        comment: input.comment,
      });

      dispatcher.dispatch(
        'feedback.received',
        feedbackReceivedData({
          queryId: conversationId,
          userId: conversation.requesterId,
          rating: input.rating,
          feedbackText: input.comment,
          category: conversation.category,
        }),
      );

      logger.info('Feedback received', {
        component: 'support-service',
        conversationId,
        rating: input.rating,
      });
      return feedback;
    },

    getHistory(userId, limit) {
      return conversations.listForRequester(asRequesterId(userId), limit);
    },
  };
}
