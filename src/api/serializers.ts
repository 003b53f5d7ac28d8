/**
 * Wire shapes for API responses. Field names are snake_case.
 */
import type { Conversation, Feedback } from '@/support/types.js';
import type { DeliveryAttempt, DeliveryResult, WebhookSubscription } from '@/webhooks/types.js';
import type { WorkflowResult } from '@/workflow/types.js';

function isoOrNull(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

export function serializeQueryResult(result: WorkflowResult, timestamp: Date) {
  return {
    conversation_id: result.conversationId,
    user_id: result.requesterId,
    response: result.responseText,
    category: result.category,
    sentiment: result.sentiment,
    priority: result.priorityScore,
    timestamp: timestamp.toISOString(),
    metadata: {
      processing_time: result.processingTimeSeconds,
      escalated: result.escalated,
      escalation_reason: result.escalationReason ?? null,
      route: result.route,
      kb_results: result.knowledgeSnippets.map((snippet) => ({
        title: snippet.title,
        content: snippet.content,
        category: snippet.category,
        score: snippet.score,
      })),
    },
  };
}

export function serializeConversation(conversation: Conversation) {
  return {
    conversation_id: conversation.conversationId,
    user_id: conversation.requesterId,
    query: conversation.query,
    category: conversation.category,
    sentiment: conversation.sentiment,
    priority: conversation.priorityScore,
    response: conversation.response,
    response_time_seconds: conversation.responseTimeSeconds,
    status: conversation.status,
    escalated: conversation.escalated,
    escalation_reason: conversation.escalationReason ?? null,
    created_at: conversation.createdAt.toISOString(),
  };
}

export function serializeFeedback(feedback: Feedback) {
  return {
    conversation_id: feedback.conversationId,
    rating: feedback.rating,
    comment: feedback.comment ?? null,
    created_at: feedback.createdAt.toISOString(),
  };
}

export function serializeSubscription(subscription: WebhookSubscription) {
  return {
    id: subscription.id,
    url: subscription.url,
    events: subscription.events,
    secret_key: subscription.secretKey,
    is_active: subscription.isActive,
    delivery_count: subscription.deliveryCount,
    failure_count: subscription.failureCount,
    last_delivery_at: isoOrNull(subscription.lastDeliveryAt),
    last_failure_at: isoOrNull(subscription.lastFailureAt),
    created_at: subscription.createdAt.toISOString(),
    updated_at: subscription.updatedAt.toISOString(),
  };
}

export function serializeDelivery(attempt: DeliveryAttempt) {
  return {
    id: attempt.id,
    webhook_id: attempt.webhookId,
    event_type: attempt.eventType,
    payload: attempt.payload,
    status: attempt.status,
    status_code: attempt.statusCode ?? null,
    response_body: attempt.responseBody ?? null,
    error_message: attempt.errorMessage ?? null,
    attempt_count: attempt.attemptCount,
    created_at: attempt.createdAt.toISOString(),
    delivered_at: isoOrNull(attempt.deliveredAt),
  };
}

export function serializeTestResult(result: DeliveryResult) {
  return {
    success: result.success,
    status_code: result.statusCode,
    response_time_ms: result.responseTimeMs,
    error: result.error,
  };
}
