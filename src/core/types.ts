// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a SubscriptionId where a ConversationId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type ConversationId = Brand<string, 'ConversationId'>;
export type RequesterId = Brand<string, 'RequesterId'>;
export type SubscriptionId = Brand<string, 'SubscriptionId'>;
export type DeliveryId = Brand<string, 'DeliveryId'>;
export type KnowledgeEntryId = Brand<string, 'KnowledgeEntryId'>;

/** Brand a raw string received from the outside (HTTP params, DB rows). */
export function asConversationId(raw: string): ConversationId {
  return raw as ConversationId;
}

export function asRequesterId(raw: string): RequesterId {
  return raw as RequesterId;
}

export function asSubscriptionId(raw: string): SubscriptionId {
  return raw as SubscriptionId;
}

export function asDeliveryId(raw: string): DeliveryId {
  return raw as DeliveryId;
}

export function asKnowledgeEntryId(raw: string): KnowledgeEntryId {
  return raw as KnowledgeEntryId;
}

// ─── Domain Vocabulary ───────────────────────────────────────────

/** HR categories a request can be classified into. `General` is the default. */
export const CATEGORIES = [
  'Recruitment',
  'Payroll',
  'Benefits',
  'Policy',
  'LeaveManagement',
  'Performance',
  'General',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const SENTIMENTS = ['Positive', 'Neutral', 'Negative', 'Angry'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function isSentiment(value: string): value is Sentiment {
  return (SENTIMENTS as readonly string[]).includes(value);
}
