/**
 * Redis-backed delivery queue using BullMQ. Used when REDIS_URL is set.
 *
 * BullMQ retries are disabled (one attempt per job): `deliverWebhook`
 * owns the retry and backoff policy.
 */
import { Queue, Worker } from 'bullmq';
import type { Logger } from '@/observability/logger.js';
import { defaultSleep } from '@/workflow/port-guard.js';
import type { Sleep } from '@/workflow/port-guard.js';
import type { DeliveryJob, DeliveryJobHandler, DeliveryQueue } from './types.js';

const QUEUE_NAME = 'webhook-delivery';
const IDLE_POLL_MS = 250;

export interface BullMQDeliveryQueueOptions {
  redisUrl: string;
  concurrency: number;
  logger: Logger;
  sleep?: Sleep;
}

/** Parse Redis URL into host/port/password for BullMQ connection. */
export function parseRedisUrl(url: string): { host: string; port: number; password?: string } {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };
}

export function createBullMQDeliveryQueue(options: BullMQDeliveryQueueOptions): DeliveryQueue {
  const { logger } = options;
  const connection = parseRedisUrl(options.redisUrl);
  const sleep = options.sleep ?? defaultSleep;

  let queue: Queue<DeliveryJob> | null = null;
  let worker: Worker<DeliveryJob> | null = null;

  return {
    async start(handler: DeliveryJobHandler): Promise<void> {
      queue = new Queue<DeliveryJob>(QUEUE_NAME, { connection });

      worker = new Worker<DeliveryJob>(
        QUEUE_NAME,
        async (job) => {
          await handler(job.data);
        },
        { connection, concurrency: options.concurrency },
      );

      worker.on('failed', (job, error) => {
        logger.error('Delivery job failed', {
          component: 'delivery-queue',
          jobId: job?.id,
          subscriptionId: job?.data.subscriptionId,
          error: error.message,
        });
      });

      worker.on('error', (error) => {
        logger.error('BullMQ worker error', {
          component: 'delivery-queue',
          error: error.message,
        });
      });

      logger.info('Delivery queue started', {
        component: 'delivery-queue',
        queueName: QUEUE_NAME,
        concurrency: options.concurrency,
      });
    },

    async enqueue(job: DeliveryJob): Promise<void> {
      if (!queue) {
        throw new Error('Delivery queue not started');
      }

      await queue.add(`deliver-${job.payload.event}`, job, {
        attempts: 1,
        removeOnComplete: 100,
        removeOnFail: 100,
      });
    },

    async idle(): Promise<void> {
      while (queue) {
        const counts = await queue.getJobCounts('active', 'waiting', 'delayed');
        const outstanding = Object.values(counts).reduce((sum, count) => sum + count, 0);
        if (outstanding === 0) return;
        await sleep(IDLE_POLL_MS);
      }
    },

    async stop(): Promise<void> {
      if (worker) {
        await worker.close();
        worker = null;
      }

      if (queue) {
        await queue.close();
        queue = null;
      }

      logger.info('Delivery queue stopped', { component: 'delivery-queue' });
    },
  };
}
