import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createDatabase } from '@/infrastructure/database.js';
import type { AppDatabase } from '@/infrastructure/database.js';
import { createWebhookRepository } from '@/infrastructure/repositories/webhook-repository.js';
import { createMockLogger } from '@/testing/fixtures/workflow.js';
import { deliverWebhook } from './delivery.js';
import type { DeliverFn } from './delivery.js';
import { createInProcessDeliveryQueue } from './delivery-queue.js';
import { createWebhookDispatcher } from './dispatcher.js';
import { verifySignature } from './signing.js';
import type { WebhookDispatcher, WebhookRepository } from './types.js';

/** Routes fake HTTP responses by URL. */
type Receiver = (init: RequestInit | undefined) => Promise<Response>;

describe('createWebhookDispatcher', () => {
  let db: AppDatabase;
  let repository: WebhookRepository;
  let receivers: Map<string, Receiver>;
  let fetchMock: ReturnType<typeof vi.fn<typeof fetch>>;
  let sleep: ReturnType<typeof vi.fn<(ms: number) => Promise<void>>>;
  let dispatcher: WebhookDispatcher;

  beforeEach(async () => {
    db = createDatabase({ path: ':memory:', logger: createMockLogger() });
    repository = createWebhookRepository(db.client);
    receivers = new Map();
    fetchMock = vi.fn<typeof fetch>((input, init) => {
      const receiver = receivers.get(String(input));
      return receiver ? receiver(init) : Promise.reject(new Error('ECONNREFUSED'));
    });
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

    const logger = createMockLogger();
    dispatcher = createWebhookDispatcher({
      repository,
      queue: createInProcessDeliveryQueue({ concurrency: 10, maxQueueSize: 100, logger }),
      deliver: deliverWebhook,
      deliveryOptions: { fetch: fetchMock, sleep },
      logger,
    });
    await dispatcher.start();
  });

  afterEach(async () => {
    await dispatcher.stop();
    db.close();
  });

  async function subscribe(url: string, events: Parameters<WebhookRepository['create']>[0]['events']) {
    return repository.create({ url, events, secretKey: 'test-secret' });
  }

  it('makes a single attempt when the subscriber answers 404', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.created']);
    receivers.set('https://a.example.com/hook', () => Promise.resolve(new Response('gone', { status: 404 })));

    dispatcher.dispatch('query.created', { query_id: 'conv_1' });
    await dispatcher.idle();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const log = await repository.listDeliveries(webhook.id, { skip: 0, limit: 10 });
    expect(log.items).toHaveLength(1);
    expect(log.items[0]).toMatchObject({ status: 'failed', statusCode: 404, attemptCount: 1 });
    const after = await repository.findById(webhook.id);
    expect(after?.deliveryCount).toBe(1);
    expect(after?.failureCount).toBe(1);
  });

  it('retries a failing subscriber three times with 1s and 2s backoff', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.escalated']);
    receivers.set('https://a.example.com/hook', () => Promise.resolve(new Response('down', { status: 503 })));

    dispatcher.dispatch('query.escalated', { query_id: 'conv_1' });
    await dispatcher.idle();

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    const log = await repository.listDeliveries(webhook.id, { skip: 0, limit: 10 });
    expect(log.items[0]).toMatchObject({ status: 'failed', attemptCount: 3, errorMessage: 'HTTP 503: down' });
  });

  it('records success after a transient failure', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.resolved']);
    const responses = [new Response(null, { status: 500 }), new Response('ok', { status: 200 })];
    receivers.set('https://a.example.com/hook', () => {
      const next = responses.shift();
      return next ? Promise.resolve(next) : Promise.reject(new Error('unexpected call'));
    });

    dispatcher.dispatch('query.resolved', { query_id: 'conv_1' });
    await dispatcher.idle();

    const log = await repository.listDeliveries(webhook.id, { skip: 0, limit: 10 });
    expect(log.items[0]).toMatchObject({ status: 'success', attemptCount: 2, responseBody: 'ok' });
    const after = await repository.findById(webhook.id);
    expect(after?.deliveryCount).toBe(1);
    expect(after?.failureCount).toBe(0);
    expect(after?.lastDeliveryAt).toBeInstanceOf(Date);
  });

  it('does not call subscribers of other events', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['feedback.received']);

    dispatcher.dispatch('query.created', { query_id: 'conv_1' });
    await dispatcher.idle();

    expect(fetchMock).not.toHaveBeenCalled();
    expect((await repository.listDeliveries(webhook.id, { skip: 0, limit: 10 })).total).toBe(0);
  });

  it('sends each subscriber its own signed envelope', async () => {
    const first = await subscribe('https://a.example.com/hook', ['query.created']);
    const second = await repository.create({
      url: 'https://b.example.com/hook',
      events: ['query.created'],
      secretKey: 'second-secret',
    });
    const bodies = new Map<string, { body: string; signature: string }>();
    for (const url of ['https://a.example.com/hook', 'https://b.example.com/hook']) {
      receivers.set(url, (init) => {
        const headers = new Headers(init?.headers);
        bodies.set(url, { body: String(init?.body), signature: headers.get('X-Webhook-Signature') ?? '' });
        return Promise.resolve(new Response('ok', { status: 200 }));
      });
    }

    dispatcher.dispatch('query.created', { query_id: 'conv_9' });
    await dispatcher.idle();

    const a = bodies.get('https://a.example.com/hook');
    const b = bodies.get('https://b.example.com/hook');
    expect(a && JSON.parse(a.body)).toMatchObject({ event: 'query.created', webhook_id: first.id, data: { query_id: 'conv_9' } });
    expect(b && JSON.parse(b.body)).toMatchObject({ webhook_id: second.id });
    expect(a && verifySignature(a.body, a.signature, 'test-secret')).toBe(true);
    expect(b && verifySignature(b.body, b.signature, 'second-secret')).toBe(true);
  });

  it('does not let a hanging subscriber delay the others', async () => {
    const slow = await subscribe('https://slow.example.com/hook', ['query.created']);
    const fast = await subscribe('https://fast.example.com/hook', ['query.created']);
    let releaseSlow: (() => void) | undefined;
    receivers.set(
      'https://slow.example.com/hook',
      () =>
        new Promise<Response>((resolve) => {
          releaseSlow = () => {
            resolve(new Response('late', { status: 200 }));
          };
        }),
    );
    receivers.set('https://fast.example.com/hook', () => Promise.resolve(new Response('ok', { status: 200 })));

    dispatcher.dispatch('query.created', { query_id: 'conv_1' });

    await vi.waitFor(async () => {
      expect((await repository.listDeliveries(fast.id, { skip: 0, limit: 10 })).total).toBe(1);
    });
    expect((await repository.listDeliveries(slow.id, { skip: 0, limit: 10 })).total).toBe(0);

    releaseSlow?.();
    await dispatcher.idle();
    expect((await repository.listDeliveries(slow.id, { skip: 0, limit: 10 })).total).toBe(1);
  });

  it('skips a subscription deleted before its job runs', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.created']);
    const lookup = vi.spyOn(repository, 'findById').mockResolvedValueOnce(null);

    dispatcher.dispatch('query.created', { query_id: 'conv_1' });
    await dispatcher.idle();

    expect(lookup).toHaveBeenCalledWith(webhook.id);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('logs and swallows a failed subscriber lookup', async () => {
    const logger = createMockLogger();
    const failing = createWebhookDispatcher({
      repository: { ...repository, findActiveForEvent: () => Promise.reject(new Error('db locked')) },
      queue: createInProcessDeliveryQueue({ concurrency: 1, maxQueueSize: 1, logger }),
      deliver: deliverWebhook,
      logger,
    });
    await failing.start();

    expect(() => {
      failing.dispatch('query.created', {});
    }).not.toThrow();
    await failing.idle();

    expect(logger.error).toHaveBeenCalledWith('Webhook dispatch failed', {
      component: 'webhook-dispatcher',
      event: 'query.created',
      error: 'db locked',
    });
    await failing.stop();
  });

  it('delivers a test event once without logging it', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.created']);
    receivers.set('https://a.example.com/hook', () => Promise.resolve(new Response('down', { status: 503 })));

    const result = await dispatcher.deliverNow(webhook, {
      event: 'webhook.test',
      timestamp: '2025-01-01T00:00:00.000Z',
      webhook_id: webhook.id,
      data: { message: 'test' },
    });

    expect(result.attempts).toBe(1);
    expect(result.success).toBe(false);
    expect((await repository.listDeliveries(webhook.id, { skip: 0, limit: 10 })).total).toBe(0);
  });

  it('hands its own logger to each delivery unless one is configured', async () => {
    const webhook = await subscribe('https://a.example.com/hook', ['query.created']);
    const logger = createMockLogger();
    const deliveryLogger = createMockLogger();
    const deliver = vi.fn<DeliverFn>().mockResolvedValue({
      success: true,
      statusCode: 200,
      responseBody: 'ok',
      error: null,
      attempts: 1,
      responseTimeMs: 1,
      delays: [],
    });
    const queue = createInProcessDeliveryQueue({ concurrency: 1, maxQueueSize: 10, logger });

    const plain = createWebhookDispatcher({ repository, queue, deliver, logger });
    await plain.deliverNow(webhook, {
      event: 'webhook.test',
      timestamp: '2025-01-01T00:00:00.000Z',
      webhook_id: webhook.id,
      data: {},
    });
    const configured = createWebhookDispatcher({
      repository,
      queue,
      deliver,
      logger,
      deliveryOptions: { logger: deliveryLogger },
    });
    await configured.deliverNow(webhook, {
      event: 'webhook.test',
      timestamp: '2025-01-01T00:00:00.000Z',
      webhook_id: webhook.id,
      data: {},
    });

    expect(deliver.mock.calls[0]?.[2]?.logger).toBe(logger);
    expect(deliver.mock.calls[1]?.[2]?.logger).toBe(deliveryLogger);
  });
});
