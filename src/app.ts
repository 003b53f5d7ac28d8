/**
 * Composition root: builds every component from the validated configuration
 * and returns the server plus the handles needed to shut it down.
 */
import type { FastifyInstance } from 'fastify';
import { createServer } from '@/api/index.js';
import type { RouteDependencies } from '@/api/index.js';
import type { AppConfig } from '@/config/index.js';
import {
  createConversationRepository,
  createDatabase,
  createKnowledgeRepository,
  createRequesterRepository,
  createWebhookRepository,
} from '@/infrastructure/index.js';
import type { AppDatabase } from '@/infrastructure/index.js';
import { createKnowledgeLookup, importFaqs } from '@/knowledge/index.js';
import type { KnowledgeRepository } from '@/knowledge/index.js';
import { createLogger } from '@/observability/index.js';
import type { Logger } from '@/observability/index.js';
import { createProvider, resolveEmbeddingProvider } from '@/providers/index.js';
import type { EmbeddingGenerator, LLMProvider } from '@/providers/index.js';
import { createSupportService } from '@/support/index.js';
import type { SupportService } from '@/support/index.js';
import {
  createBullMQDeliveryQueue,
  createInProcessDeliveryQueue,
  createSubscriptionService,
  createWebhookDispatcher,
  deliverWebhook,
} from '@/webhooks/index.js';
import type { DeliveryQueue, WebhookDispatcher } from '@/webhooks/index.js';
import { createLlmClassifier, createLlmResponder, createWorkflowEngine } from '@/workflow/index.js';
import type { Sleep } from '@/workflow/index.js';

export const APP_VERSION = '1.0.0';

/** Replacements for the outside world, used by tests. */
export interface ApplicationOverrides {
  logger?: Logger;
  /** Replaces the provider built from `config.llm`. */
  provider?: LLMProvider;
  /** Replaces the embedding provider built from `config.embeddings`. `null` disables lookup. */
  embed?: EmbeddingGenerator | null;
  /** HTTP client for webhook deliveries. */
  fetch?: typeof fetch;
  /** Used for port-guard retries and webhook backoff. */
  sleep?: Sleep;
}

export interface Application {
  server: FastifyInstance;
  database: AppDatabase;
  dispatcher: WebhookDispatcher;
  supportService: SupportService;
  knowledge: KnowledgeRepository;
  embed: EmbeddingGenerator | null;
  /** Close the server, drain webhook deliveries and close the database. */
  close(): Promise<void>;
}

function createDeliveryQueue(config: AppConfig, logger: Logger): DeliveryQueue {
  const { redisUrl, concurrency, maxQueueSize } = config.webhooks;
  if (redisUrl) {
    logger.info('Webhook deliveries use BullMQ', { component: 'app', concurrency });
    return createBullMQDeliveryQueue({ redisUrl, concurrency, logger });
  }
  logger.info('Webhook deliveries use the in-process queue', {
    component: 'app',
    concurrency,
    maxQueueSize,
  });
  return createInProcessDeliveryQueue({ concurrency, maxQueueSize, logger });
}

export async function createApplication(
  config: AppConfig,
  overrides: ApplicationOverrides = {},
): Promise<Application> {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level });

  // Storage
  const database = createDatabase({ path: config.database.path, logger });
  const webhookRepository = createWebhookRepository(database.client);
  const conversations = createConversationRepository(database.client);
  const requesters = createRequesterRepository(database.client);
  const knowledge = createKnowledgeRepository(database.client);

  // Providers and ports
  const provider = overrides.provider ?? createProvider(config.llm);
  const embed = overrides.embed !== undefined ? overrides.embed : resolveEmbeddingProvider(config.embeddings);
  const portOptions = {
    temperature: config.llm.temperature,
    maxOutputTokens: config.llm.maxOutputTokens,
  };

  const engine = createWorkflowEngine({
    classifier: createLlmClassifier(provider, portOptions),
    knowledge: createKnowledgeLookup({ repository: knowledge, embed, logger }),
    responder: createLlmResponder(provider, portOptions),
    logger,
    options: config.workflow,
    sleep: overrides.sleep,
  });

  // Webhooks
  const dispatcher = createWebhookDispatcher({
    repository: webhookRepository,
    queue: createDeliveryQueue(config, logger),
    deliver: deliverWebhook,
    logger,
    deliveryOptions: {
      timeoutMs: config.webhooks.timeoutMs,
      maxAttempts: config.webhooks.maxAttempts,
      backoffBaseMs: config.webhooks.backoffBaseMs,
      productName: config.webhooks.productName,
      fetch: overrides.fetch,
      sleep: overrides.sleep,
      logger,
    },
  });
  await dispatcher.start();

  // Services and HTTP
  const supportService = createSupportService({
    engine,
    conversations,
    requesters,
    dispatcher,
    logger,
  });
  const subscriptionService = createSubscriptionService({
    repository: webhookRepository,
    dispatcher,
    logger,
  });

  const deps: RouteDependencies = {
    supportService,
    subscriptionService,
    version: APP_VERSION,
    isDatabaseReady: () => database.client.open,
    logger,
  };
  const server = await createServer(deps, {
    corsOrigin: config.server.corsOrigin,
    rateLimitMax: config.server.rateLimitMax,
  });

  return {
    server,
    database,
    dispatcher,
    supportService,
    knowledge,
    embed,
    async close(): Promise<void> {
      await server.close();
      await dispatcher.stop();
      database.close();
    },
  };
}

/**
 * Load the FAQ file into an empty knowledge base. Does nothing when entries
 * already exist or no embedding provider is configured.
 */
export async function seedKnowledgeBase(
  app: Pick<Application, 'knowledge' | 'embed'>,
  faqPath: string,
  logger: Logger,
): Promise<number> {
  if (!app.embed) return 0;
  if ((await app.knowledge.count()) > 0) return 0;

  const result = await importFaqs(faqPath, { repository: app.knowledge, embed: app.embed, logger });
  if (!result.ok) {
    logger.warn('Knowledge base not seeded', {
      component: 'app',
      faqPath,
      error: result.error.message,
    });
    return 0;
  }
  return result.value.imported;
}
