/**
 * Provider factory.
 * Resolves an LLMProviderConfig into a concrete LLMProvider instance.
 * Handles API key resolution from environment variables.
 */
import type { LLMProviderConfig } from '@/config/schema.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createAnthropicProvider } from './anthropic.js';
import { createOpenAIProvider } from './openai.js';
import type { LLMProvider } from './types.js';

const logger = createLogger({ name: 'provider-factory' });

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const DEFAULT_KEY_VARS: Readonly<Record<LLMProviderConfig['provider'], string>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  groq: 'GROQ_API_KEY',
};

/**
 * Resolve an API key from an environment variable name.
 * Never logs or returns the key value, only whether it was found.
 */
export function resolveApiKey(
  envVar: string,
  provider: string,
  env: Record<string, string | undefined> = process.env,
): string {
  const key = env[envVar];
  if (!key) {
    throw new ProviderError(provider, `Environment variable "${envVar}" is not set or empty`);
  }
  return key;
}

/**
 * Create an LLMProvider from a configuration object.
 * API keys are resolved from environment variables at construction time.
 */
export function createProvider(
  config: LLMProviderConfig,
  env: Record<string, string | undefined> = process.env,
): LLMProvider {
  logger.info('Creating LLM provider', {
    component: 'provider-factory',
    provider: config.provider,
    model: config.model,
  });

  const keyVar = config.apiKeyEnvVar ?? DEFAULT_KEY_VARS[config.provider];

  switch (config.provider) {
    case 'anthropic': {
      const apiKey = resolveApiKey(keyVar, 'anthropic', env);
      return createAnthropicProvider({
        apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
      });
    }

    case 'openai': {
      const apiKey = resolveApiKey(keyVar, 'openai', env);
      return createOpenAIProvider({
        apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
        providerLabel: 'openai',
      });
    }

    case 'groq': {
      const apiKey = resolveApiKey(keyVar, 'groq', env);
      return createOpenAIProvider({
        apiKey,
        model: config.model,
        baseUrl: config.baseUrl ?? GROQ_BASE_URL,
        providerLabel: 'groq',
      });
    }

    default: {
      const _exhaustive: never = config.provider;
      throw new ProviderError(String(_exhaustive), `Unknown provider: ${String(_exhaustive)}`);
    }
  }
}
