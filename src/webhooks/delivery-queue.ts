/**
 * In-process delivery queue: a bounded worker pool used when no Redis is
 * configured. Jobs live only in memory and are lost on a crash.
 */
import { QueueFullError, TriageError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { DeliveryJob, DeliveryJobHandler, DeliveryQueue } from './types.js';

const QUEUE_NAME = 'webhook-delivery';

export interface InProcessDeliveryQueueOptions {
  /** Jobs running at once. */
  concurrency: number;
  /** Jobs waiting for a worker before new ones are refused. */
  maxQueueSize: number;
  logger: Logger;
}

export function createInProcessDeliveryQueue(options: InProcessDeliveryQueueOptions): DeliveryQueue {
  const { logger } = options;
  const concurrency = Math.max(1, options.concurrency);
  const pending: DeliveryJob[] = [];
  let running = 0;
  let accepting = true;
  let handler: DeliveryJobHandler | null = null;
  let idleWaiters: Array<() => void> = [];

  function settleIdle(): void {
    if (running > 0 || pending.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  async function run(job: DeliveryJob, work: DeliveryJobHandler): Promise<void> {
    try {
      await work(job);
    } catch (error) {
      logger.error('Delivery job failed', {
        component: 'delivery-queue',
        subscriptionId: job.subscriptionId,
        event: job.payload.event,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      running--;
      pump();
    }
  }

  function idle(): Promise<void> {
    if (running === 0 && pending.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      idleWaiters.push(resolve);
    });
  }

  function pump(): void {
    while (handler && running < concurrency) {
      const job = pending.shift();
      if (!job) break;
      running++;
      void run(job, handler);
    }
    settleIdle();
  }

  return {
    async start(jobHandler: DeliveryJobHandler): Promise<void> {
      handler = jobHandler;
      accepting = true;
      logger.info('Delivery queue started', {
        component: 'delivery-queue',
        concurrency,
        maxQueueSize: options.maxQueueSize,
      });
      pump();
    },

    async enqueue(job: DeliveryJob): Promise<void> {
      if (!accepting) {
        throw new TriageError({
          message: `Queue "${QUEUE_NAME}" is stopped`,
          code: 'QUEUE_STOPPED',
          statusCode: 503,
          context: { queue: QUEUE_NAME },
        });
      }
      if (pending.length >= options.maxQueueSize) {
        throw new QueueFullError(QUEUE_NAME, options.maxQueueSize);
      }
      pending.push(job);
      pump();
    },

    idle,

    async stop(): Promise<void> {
      accepting = false;
      if (!handler && pending.length > 0) {
        logger.warn('Delivery queue stopped before start, dropping jobs', {
          component: 'delivery-queue',
          dropped: pending.length,
        });
        pending.length = 0;
        settleIdle();
      }
      await idle();
      handler = null;
      logger.info('Delivery queue stopped', { component: 'delivery-queue' });
    },
  };
}
