/**
 * Webhook dispatcher: fans events out to subscribers through a DeliveryQueue
 * and records the outcome of every delivery.
 *
 * `dispatch` never blocks or throws: the subscriber lookup happens in the
 * background and every failure is logged.
 */
import type { Logger } from '@/observability/logger.js';
import type { DeliverFn, DeliveryOptions } from './delivery.js';
import { buildPayload } from './events.js';
import type {
  DeliveryJob,
  DeliveryQueue,
  DeliveryResult,
  WebhookDispatcher,
  WebhookEventType,
  WebhookPayload,
  WebhookRepository,
  WebhookSubscription,
} from './types.js';

export interface WebhookDispatcherDeps {
  repository: WebhookRepository;
  queue: DeliveryQueue;
  deliver: DeliverFn;
  logger: Logger;
  /** Passed to every `deliver` call. */
  deliveryOptions?: Partial<DeliveryOptions>;
  now?: () => Date;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createWebhookDispatcher(deps: WebhookDispatcherDeps): WebhookDispatcher {
  const { repository, queue, deliver, logger } = deps;
  const deliveryOptions: Partial<DeliveryOptions> = { logger, ...deps.deliveryOptions };
  const now = deps.now ?? (() => new Date());
  const lookups = new Set<Promise<void>>();

  async function handleJob(job: DeliveryJob): Promise<void> {
    const subscription = await repository.findById(job.subscriptionId);
    if (!subscription?.isActive) {
      logger.debug('Skipping delivery to removed or paused subscription', {
        component: 'webhook-dispatcher',
        subscriptionId: job.subscriptionId,
      });
      return;
    }

    let result: DeliveryResult;
    try {
      result = await deliver(subscription, job.payload, deliveryOptions);
    } catch (error) {
      result = {
        success: false,
        statusCode: null,
        responseBody: null,
        error: `Unexpected error: ${describeError(error)}`,
        attempts: 1,
        responseTimeMs: 0,
        delays: [],
      };
    }

    await repository.recordDelivery({ webhookId: subscription.id, payload: job.payload, result });

    if (result.success) {
      logger.info('Webhook event delivered', {
        component: 'webhook-dispatcher',
        subscriptionId: subscription.id,
        event: job.payload.event,
        attempts: result.attempts,
      });
    } else {
      logger.error('Webhook event delivery failed', {
        component: 'webhook-dispatcher',
        subscriptionId: subscription.id,
        event: job.payload.event,
        attempts: result.attempts,
        error: result.error,
      });
    }
  }

  async function fanOut(event: WebhookEventType, data: Record<string, unknown>): Promise<void> {
    const subscriptions = await repository.findActiveForEvent(event);
    if (subscriptions.length === 0) {
      logger.debug('No active webhooks for event', { component: 'webhook-dispatcher', event });
      return;
    }

    logger.info('Dispatching webhook event', {
      component: 'webhook-dispatcher',
      event,
      subscribers: subscriptions.length,
    });

    const timestamp = now();
    for (const subscription of subscriptions) {
      try {
        await queue.enqueue({
          subscriptionId: subscription.id,
          payload: buildPayload(event, subscription.id, data, timestamp),
        });
      } catch (error) {
        logger.error('Failed to enqueue webhook delivery', {
          component: 'webhook-dispatcher',
          subscriptionId: subscription.id,
          event,
          error: describeError(error),
        });
      }
    }
  }

  return {
    async start(): Promise<void> {
      await queue.start(handleJob);
    },

    async stop(): Promise<void> {
      await Promise.all(lookups);
      await queue.stop();
    },

    dispatch(event: WebhookEventType, data: Record<string, unknown>): void {
      const lookup = fanOut(event, data)
        .catch((error: unknown) => {
          logger.error('Webhook dispatch failed', {
            component: 'webhook-dispatcher',
            event,
            error: describeError(error),
          });
        })
        .finally(() => {
          lookups.delete(lookup);
        });
      lookups.add(lookup);
    },

    async deliverNow(
      subscription: WebhookSubscription,
      payload: WebhookPayload,
    ): Promise<DeliveryResult> {
      return deliver(subscription, payload, { ...deliveryOptions, maxAttempts: 1 });
    },

    async idle(): Promise<void> {
      await Promise.all(lookups);
      await queue.idle();
    },
  };
}
