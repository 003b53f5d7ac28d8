import type { DeliveryId, SubscriptionId } from '@/core/types.js';

// ─── Events ─────────────────────────────────────────────────────

/** Event types a subscription may listen to. */
export const WEBHOOK_EVENTS = [
  'query.created',
  'query.resolved',
  'query.escalated',
  'feedback.received',
] as const;

export type WebhookEventType = (typeof WEBHOOK_EVENTS)[number];

/** Sent only by test deliveries; never subscribable. */
export const TEST_EVENT = 'webhook.test';

export type DeliverableEventType = WebhookEventType | typeof TEST_EVENT;

export function isWebhookEventType(value: string): value is WebhookEventType {
  return (WEBHOOK_EVENTS as readonly string[]).includes(value);
}

/** Envelope posted to subscribers. Field names are part of the wire format. */
export interface WebhookPayload {
  event: DeliverableEventType;
  timestamp: string;
  webhook_id: string;
  data: Record<string, unknown>;
}

// ─── Subscription ───────────────────────────────────────────────

export interface WebhookSubscription {
  id: SubscriptionId;
  url: string;
  events: WebhookEventType[];
  secretKey: string;
  isActive: boolean;
  deliveryCount: number;
  failureCount: number;
  lastDeliveryAt?: Date;
  lastFailureAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateSubscriptionInput {
  url: string;
  events: WebhookEventType[];
  secretKey: string;
}

export interface UpdateSubscriptionInput {
  url?: string;
  events?: WebhookEventType[];
  isActive?: boolean;
}

export interface ListSubscriptionsParams {
  isActive?: boolean;
  skip: number;
  limit: number;
}

export interface PageParams {
  skip: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}

// ─── Delivery Log ───────────────────────────────────────────────

export type DeliveryStatus = 'success' | 'failed' | 'pending';

export interface DeliveryAttempt {
  id: DeliveryId;
  webhookId: SubscriptionId;
  eventType: DeliverableEventType;
  payload: WebhookPayload;
  status: DeliveryStatus;
  statusCode?: number;
  /** Truncated to 1 000 characters. */
  responseBody?: string;
  errorMessage?: string;
  attemptCount: number;
  createdAt: Date;
  deliveredAt?: Date;
}

/** Outcome of one `deliverWebhook` call. */
export interface DeliveryResult {
  success: boolean;
  statusCode: number | null;
  responseBody: string | null;
  error: string | null;
  attempts: number;
  responseTimeMs: number;
  /** Backoff delays requested between attempts, in ms. */
  delays: number[];
}

export interface RecordDeliveryInput {
  webhookId: SubscriptionId;
  payload: WebhookPayload;
  result: Pick<DeliveryResult, 'success' | 'statusCode' | 'responseBody' | 'error' | 'attempts'>;
}

// ─── Repository Interface ───────────────────────────────────────

export interface WebhookRepository {
  create(input: CreateSubscriptionInput): Promise<WebhookSubscription>;
  findById(id: SubscriptionId): Promise<WebhookSubscription | null>;
  /** Returns null when the subscription does not exist. */
  update(id: SubscriptionId, input: UpdateSubscriptionInput): Promise<WebhookSubscription | null>;
  /** Returns false when the subscription does not exist. */
  delete(id: SubscriptionId): Promise<boolean>;
  list(params: ListSubscriptionsParams): Promise<Page<WebhookSubscription>>;
  findActiveForEvent(event: WebhookEventType): Promise<WebhookSubscription[]>;
  /** Bump the subscription's counters and append a log row in one transaction. */
  recordDelivery(input: RecordDeliveryInput): Promise<DeliveryAttempt>;
  /** Newest first. */
  listDeliveries(id: SubscriptionId, params: PageParams): Promise<Page<DeliveryAttempt>>;
}

// ─── Queue ──────────────────────────────────────────────────────

/** Serializable unit of fan-out work: one payload for one subscription. */
export interface DeliveryJob {
  subscriptionId: SubscriptionId;
  payload: WebhookPayload;
}

export type DeliveryJobHandler = (job: DeliveryJob) => Promise<void>;

export interface DeliveryQueue {
  /** Begin consuming jobs with the given handler. */
  start(handler: DeliveryJobHandler): Promise<void>;
  /** Accept a job. Rejects with `QueueFullError` when the queue is saturated. */
  enqueue(job: DeliveryJob): Promise<void>;
  /** Resolves once no job is pending or running. */
  idle(): Promise<void>;
  /** Stop accepting jobs and wait for in-flight ones. */
  stop(): Promise<void>;
}

// ─── Dispatcher ─────────────────────────────────────────────────

export interface WebhookDispatcher {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Fire-and-forget fan-out to every active subscriber of the event. */
  dispatch(event: WebhookEventType, data: Record<string, unknown>): void;
  /** Single immediate delivery, not logged. Used for test sends. */
  deliverNow(subscription: WebhookSubscription, payload: WebhookPayload): Promise<DeliveryResult>;
  /** Resolves once every dispatched event has been looked up and delivered. */
  idle(): Promise<void>;
}
