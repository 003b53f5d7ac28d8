/**
 * Embedding provider: generates vector embeddings from text.
 *
 * Uses the OpenAI embeddings API (text-embedding-3-small by default).
 * Also compatible with any OpenAI-compatible endpoint.
 * The API key is read from the environment, never from config.
 */
import OpenAI from 'openai';

import type { EmbeddingsConfig } from '@/config/schema.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { EmbeddingGenerator } from './types.js';

const logger = createLogger({ name: 'embeddings' });

/** Configuration for the embedding provider. */
export interface EmbeddingProviderOptions {
  apiKey: string;
  /** Model identifier (default: 'text-embedding-3-small'). */
  model?: string;
  baseUrl?: string;
}

/**
 * Create an embedding generator backed by the OpenAI embeddings API.
 */
export function createEmbeddingProvider(options: EmbeddingProviderOptions): EmbeddingGenerator {
  const model = options.model ?? 'text-embedding-3-small';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return async (text: string, signal?: AbortSignal): Promise<number[]> => {
    logger.debug('Generating embedding', {
      component: 'embeddings',
      model,
      textLength: text.length,
    });

    const response = await client.embeddings.create(
      { model, input: text },
      signal ? { signal } : undefined,
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new ProviderError('embeddings', 'Embedding response contained no data');
    }

    return embedding;
  };
}

/**
 * Resolve the embedding generator from config.
 * Returns null when the API key variable is not set; knowledge lookup is then disabled.
 */
export function resolveEmbeddingProvider(
  config: EmbeddingsConfig,
  env: Record<string, string | undefined> = process.env,
): EmbeddingGenerator | null {
  const apiKey = env[config.apiKeyEnvVar];
  if (!apiKey) {
    logger.warn(`${config.apiKeyEnvVar} not set, knowledge lookup disabled`, {
      component: 'embeddings',
    });
    return null;
  }
  return createEmbeddingProvider({ apiKey, model: config.model, baseUrl: config.baseUrl });
}
