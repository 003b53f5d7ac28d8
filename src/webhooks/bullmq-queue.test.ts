import { describe, it, expect, vi, beforeEach } from 'vitest';
import { asSubscriptionId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/workflow.js';
import { buildPayload } from './events.js';
import type { DeliveryJob } from './types.js';

// ─── BullMQ Mock ────────────────────────────────────────────────

const bull = vi.hoisted(() => {
  const state = {
    queueArgs: [] as unknown[][],
    workerArgs: [] as unknown[][],
    add: vi.fn().mockResolvedValue({ id: 'job-1' }),
    getJobCounts: vi.fn().mockResolvedValue({ active: 0, waiting: 0, delayed: 0 }),
    queueClose: vi.fn().mockResolvedValue(undefined),
    workerClose: vi.fn().mockResolvedValue(undefined),
    workerOn: vi.fn(),
  };
  return state;
});

vi.mock('bullmq', () => ({
  Queue: class MockQueue {
    constructor(...args: unknown[]) {
      bull.queueArgs.push(args);
    }
    add = bull.add;
    getJobCounts = bull.getJobCounts;
    close = bull.queueClose;
  },
  Worker: class MockWorker {
    constructor(...args: unknown[]) {
      bull.workerArgs.push(args);
    }
    on = bull.workerOn;
    close = bull.workerClose;
  },
}));

const { createBullMQDeliveryQueue, parseRedisUrl } = await import('./bullmq-queue.js');

function job(): DeliveryJob {
  return {
    subscriptionId: asSubscriptionId('wh_1'),
    payload: buildPayload('query.escalated', 'wh_1', { query_id: 'conv_1' }, new Date('2025-01-01T00:00:00.000Z')),
  };
}

describe('createBullMQDeliveryQueue', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    bull.queueArgs.length = 0;
    bull.workerArgs.length = 0;
  });

  it('connects queue and worker to the configured Redis', async () => {
    const queue = createBullMQDeliveryQueue({
      redisUrl: 'redis://:test-secret@cache.internal:6380',
      concurrency: 4,
      logger: createMockLogger(),
    });

    await queue.start(vi.fn());

    expect(bull.queueArgs[0]).toEqual([
      'webhook-delivery',
      { connection: { host: 'cache.internal', port: 6380, password: 'test-secret' } },
    ]);
    expect(bull.workerArgs[0]?.[0]).toBe('webhook-delivery');
    expect(bull.workerArgs[0]?.[2]).toEqual({
      connection: { host: 'cache.internal', port: 6380, password: 'test-secret' },
      concurrency: 4,
    });
  });

  it('adds jobs with BullMQ retries disabled', async () => {
    const queue = createBullMQDeliveryQueue({ redisUrl: 'redis://localhost', concurrency: 1, logger: createMockLogger() });
    await queue.start(vi.fn());

    await queue.enqueue(job());

    expect(bull.add).toHaveBeenCalledWith('deliver-query.escalated', job(), {
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 100,
    });
  });

  it('hands job data to the handler', async () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    const queue = createBullMQDeliveryQueue({ redisUrl: 'redis://localhost', concurrency: 1, logger: createMockLogger() });
    await queue.start(handler);

    const processor = bull.workerArgs[0]?.[1];
    expect(typeof processor).toBe('function');
    if (typeof processor === 'function') {
      await processor({ data: job() });
    }

    expect(handler).toHaveBeenCalledWith(job());
  });

  it('refuses jobs before start', async () => {
    const queue = createBullMQDeliveryQueue({ redisUrl: 'redis://localhost', concurrency: 1, logger: createMockLogger() });

    await expect(queue.enqueue(job())).rejects.toThrow('Delivery queue not started');
  });

  it('polls job counts until the queue is empty', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    bull.getJobCounts
      .mockResolvedValueOnce({ active: 1, waiting: 2, delayed: 0 })
      .mockResolvedValueOnce({ active: 0, waiting: 0, delayed: 0 });
    const queue = createBullMQDeliveryQueue({ redisUrl: 'redis://localhost', concurrency: 1, logger: createMockLogger(), sleep });
    await queue.start(vi.fn());

    await queue.idle();

    expect(bull.getJobCounts).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('closes worker and queue on stop', async () => {
    const queue = createBullMQDeliveryQueue({ redisUrl: 'redis://localhost', concurrency: 1, logger: createMockLogger() });
    await queue.start(vi.fn());

    await queue.stop();

    expect(bull.workerClose).toHaveBeenCalledTimes(1);
    expect(bull.queueClose).toHaveBeenCalledTimes(1);
  });
});

describe('parseRedisUrl', () => {
  it('defaults the port to 6379 and omits an empty password', () => {
    expect(parseRedisUrl('redis://localhost')).toEqual({ host: 'localhost', port: 6379, password: undefined });
  });
});
