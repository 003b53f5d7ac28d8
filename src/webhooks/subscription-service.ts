/**
 * Subscription management: validated CRUD over the webhook repository plus
 * test sends and delivery-log reads.
 */
import { z } from 'zod';
import { NotFoundError, ValidationError } from '@/core/errors.js';
import type { SubscriptionId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { buildPayload } from './events.js';
import { generateSecretKey } from './signing.js';
import { isWebhookEventType, TEST_EVENT, WEBHOOK_EVENTS } from './types.js';
import type {
  DeliveryAttempt,
  DeliveryResult,
  ListSubscriptionsParams,
  Page,
  PageParams,
  WebhookDispatcher,
  WebhookEventType,
  WebhookRepository,
  WebhookSubscription,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface SubscriptionServiceDeps {
  repository: WebhookRepository;
  dispatcher: WebhookDispatcher;
  logger: Logger;
}

/** Event names arrive as plain strings and are validated here. */
export interface UpdateSubscriptionRequest {
  url?: string;
  events?: readonly string[];
  isActive?: boolean;
}

export interface SubscriptionService {
  create(url: string, events: readonly string[]): Promise<WebhookSubscription>;
  list(params: ListSubscriptionsParams): Promise<Page<WebhookSubscription>>;
  get(id: SubscriptionId): Promise<WebhookSubscription>;
  update(id: SubscriptionId, input: UpdateSubscriptionRequest): Promise<WebhookSubscription>;
  delete(id: SubscriptionId): Promise<void>;
  /** Send one `webhook.test` payload, single attempt, not written to the delivery log. */
  test(id: SubscriptionId): Promise<DeliveryResult>;
  getDeliveryLogs(id: SubscriptionId, params: PageParams): Promise<Page<DeliveryAttempt>>;
}

// ─── Validation ─────────────────────────────────────────────────

const urlSchema = z.string().url();

function validateUrl(url: string): void {
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    throw new ValidationError('URL must start with http:// or https://', { url });
  }
  if (!urlSchema.safeParse(url).success) {
    throw new ValidationError('URL is not valid', { url });
  }
}

function validateEvents(events: readonly string[]): WebhookEventType[] {
  if (events.length === 0) {
    throw new ValidationError('At least one event type is required');
  }

  const valid: WebhookEventType[] = [];
  for (const event of events) {
    if (!isWebhookEventType(event)) {
      throw new ValidationError(`Invalid event type: ${event}`, {
        event,
        validEvents: [...WEBHOOK_EVENTS],
      });
    }
    if (!valid.includes(event)) valid.push(event);
  }
  return valid;
}

// ─── Factory ────────────────────────────────────────────────────

export function createSubscriptionService(deps: SubscriptionServiceDeps): SubscriptionService {
  const { repository, dispatcher, logger } = deps;

  async function getOrThrow(id: SubscriptionId): Promise<WebhookSubscription> {
    const subscription = await repository.findById(id);
    if (!subscription) throw new NotFoundError('Webhook', id);
    return subscription;
  }

  return {
    async create(url, events) {
      validateUrl(url);
      const validEvents = validateEvents(events);

      const subscription = await repository.create({
        url,
        events: validEvents,
        secretKey: generateSecretKey(),
      });

      logger.info('Webhook created', {
        component: 'subscription-service',
        subscriptionId: subscription.id,
        url,
        events: validEvents,
      });
      return subscription;
    },

    list(params) {
      return repository.list(params);
    },

    get(id) {
      return getOrThrow(id);
    },

    async update(id, input) {
      if (input.url !== undefined) validateUrl(input.url);
      const events = input.events !== undefined ? validateEvents(input.events) : undefined;

      const updated = await repository.update(id, {
        url: input.url,
        events,
        isActive: input.isActive,
      });
      if (!updated) throw new NotFoundError('Webhook', id);

      logger.info('Webhook updated', { component: 'subscription-service', subscriptionId: id });
      return updated;
    },

    async delete(id) {
      const deleted = await repository.delete(id);
      if (!deleted) throw new NotFoundError('Webhook', id);
      logger.info('Webhook deleted', { component: 'subscription-service', subscriptionId: id });
    },

    async test(id) {
      const subscription = await getOrThrow(id);
      const payload = buildPayload(TEST_EVENT, subscription.id, {
        message: 'This is a test webhook delivery',
        test: true,
      });

      const result = await dispatcher.deliverNow(subscription, payload);
      logger.info('Test webhook sent', {
        component: 'subscription-service',
        subscriptionId: id,
        success: result.success,
        statusCode: result.statusCode,
      });
      return result;
    },

    async getDeliveryLogs(id, params) {
      await getOrThrow(id);
      return repository.listDeliveries(id, params);
    },
  };
}
