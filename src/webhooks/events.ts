/**
 * Event payload builders. Field names are snake_case because they are the
 * wire format subscribers parse.
 */
import type { DeliverableEventType, WebhookPayload } from './types.js';

export interface QueryCreatedData {
  queryId: string;
  userId: string;
  category: string;
  sentiment: string;
  priority: number;
  query: string;
  metadata?: Record<string, unknown>;
}

export interface QueryResolvedData {
  queryId: string;
  userId: string;
  category: string;
  resolutionTimeSeconds: number;
  response: string;
  metadata?: Record<string, unknown>;
}

export interface QueryEscalatedData {
  queryId: string;
  userId: string;
  category: string;
  sentiment: string;
  priority: number;
  escalationReason: string;
  query: string;
  metadata?: Record<string, unknown>;
}

export interface FeedbackReceivedData {
  queryId: string;
  userId: string;
  rating: number;
  feedbackText?: string;
  category?: string;
  metadata?: Record<string, unknown>;
}

/** Attach optional fields only when they carry a value. */
function withOptional(
  data: Record<string, unknown>,
  optional: Record<string, unknown>,
): Record<string, unknown> {
  for (const [key, value] of Object.entries(optional)) {
    if (value === undefined || value === null || value === '') continue;
    if (typeof value === 'object' && Object.keys(value).length === 0) continue;
    data[key] = value;
  }
  return data;
}

export function queryCreatedData(input: QueryCreatedData): Record<string, unknown> {
  return withOptional(
    {
      query_id: input.queryId,
      user_id: input.userId,
      category: input.category,
      sentiment: input.sentiment,
      priority: input.priority,
      query: input.query,
    },
    { metadata: input.metadata },
  );
}

export function queryResolvedData(input: QueryResolvedData): Record<string, unknown> {
  return withOptional(
    {
      query_id: input.queryId,
      user_id: input.userId,
      category: input.category,
      resolution_time_seconds: input.resolutionTimeSeconds,
      response: input.response,
    },
    { metadata: input.metadata },
  );
}

export function queryEscalatedData(input: QueryEscalatedData): Record<string, unknown> {
  return withOptional(
    {
      query_id: input.queryId,
      user_id: input.userId,
      category: input.category,
      sentiment: input.sentiment,
      priority: input.priority,
      escalation_reason: input.escalationReason,
      query: input.query,
    },
    { metadata: input.metadata },
  );
}

export function feedbackReceivedData(input: FeedbackReceivedData): Record<string, unknown> {
  return withOptional(
    {
      query_id: input.queryId,
      user_id: input.userId,
      rating: input.rating,
    },
    { feedback_text: input.feedbackText, category: input.category, metadata: input.metadata },
  );
}

/** Wrap event data in the envelope for one subscription. */
export function buildPayload(
  event: DeliverableEventType,
  webhookId: string,
  data: Record<string, unknown>,
  now: Date = new Date(),
): WebhookPayload {
  return {
    event,
    timestamp: now.toISOString(),
    webhook_id: webhookId,
    data,
  };
}
