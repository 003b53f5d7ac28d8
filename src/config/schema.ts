/**
 * Zod schemas for the service configuration.
 * Values arrive either from a JSON config file or from environment variables,
 * so numeric fields are coerced.
 */
import { z } from 'zod';
import { DEFAULT_ESCALATION_KEYWORDS } from '@/workflow/policy.js';

// ─── LLM Provider Config ────────────────────────────────────────

/**
 * Schema for the LLM provider backing classification and response generation.
 * `groq` goes through the OpenAI-compatible adapter.
 */
export const llmProviderConfigSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'groq']).default('groq'),
  model: z.string().min(1, 'Model identifier cannot be empty').default('llama-3.3-70b-versatile'),
  temperature: z.coerce.number().min(0).max(2).default(0),
  maxOutputTokens: z.coerce.number().int().positive().default(1000),
  apiKeyEnvVar: z.string().min(1).optional(),
  baseUrl: z.string().url('Invalid base URL format').optional(),
});

export const embeddingsConfigSchema = z.object({
  model: z.string().min(1).default('text-embedding-3-small'),
  apiKeyEnvVar: z.string().min(1).default('OPENAI_API_KEY'),
  baseUrl: z.string().url('Invalid base URL format').optional(),
});

// ─── Port Guard ─────────────────────────────────────────────────

/** Timeout and retry policy applied to one external port. */
export const portGuardConfigSchema = z.object({
  timeoutMs: z.coerce.number().int().positive('Timeout must be a positive integer').default(30_000),
  maxAttempts: z.coerce.number().int().min(1).max(10, 'Max attempts cannot exceed 10').default(3),
  retryDelayMs: z.coerce.number().int().min(0).default(1_000),
});

// ─── Workflow ───────────────────────────────────────────────────

export const workflowConfigSchema = z.object({
  knowledgeTopK: z.coerce.number().int().positive().default(3),
  minSimilarity: z.coerce.number().min(0).max(1).default(0.3),
  classification: portGuardConfigSchema.default({}),
  knowledge: portGuardConfigSchema.default({}),
  responder: portGuardConfigSchema.default({}),
  escalationKeywords: z
    .array(z.string().min(1, 'Escalation keyword cannot be empty'))
    .default([...DEFAULT_ESCALATION_KEYWORDS]),
});

// ─── Webhooks ───────────────────────────────────────────────────

export const webhookConfigSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.coerce.number().int().min(0).default(1_000),
  concurrency: z.coerce.number().int().positive().default(10),
  maxQueueSize: z.coerce.number().int().positive().default(1_000),
  productName: z.string().min(1).default('HR-Triage'),
  /** When set, deliveries go through a BullMQ queue instead of the in-process pool. */
  redisUrl: z.string().url('Invalid Redis URL').optional(),
});

// ─── App Config ─────────────────────────────────────────────────

export const appConfigSchema = z.object({
  server: z
    .object({
      port: z.coerce.number().int().min(0).max(65_535).default(8000),
      host: z.string().min(1).default('0.0.0.0'),
      /** Comma-separated allowed origins. Unset allows any origin. */
      corsOrigin: z.string().min(1).optional(),
      rateLimitMax: z.coerce.number().int().positive().default(100),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).default('./data/hr-triage.db'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    })
    .default({}),
  llm: llmProviderConfigSchema.default({}),
  embeddings: embeddingsConfigSchema.default({}),
  knowledge: z
    .object({
      faqPath: z.string().min(1).default('./data/knowledge_base/faqs.json'),
    })
    .default({}),
  workflow: workflowConfigSchema.default({}),
  webhooks: webhookConfigSchema.default({}),
});

// ─── Inferred Types ─────────────────────────────────────────────

export type LLMProviderConfig = z.infer<typeof llmProviderConfigSchema>;

export type EmbeddingsConfig = z.infer<typeof embeddingsConfigSchema>;

export type PortGuardConfig = z.infer<typeof portGuardConfigSchema>;

export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

export type WebhookConfig = z.infer<typeof webhookConfigSchema>;

export type AppConfig = z.infer<typeof appConfigSchema>;
