/**
 * Anthropic LLM provider adapter.
 * Wraps the @anthropic-ai/sdk to implement the LLMProvider interface.
 */
import Anthropic from '@anthropic-ai/sdk';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { CompletionParams, CompletionResult, LLMProvider, Message } from './types.js';

const logger = createLogger({ name: 'anthropic-provider' });

/** Configuration for the Anthropic provider. */
export interface AnthropicProviderOptions {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'claude-3-5-haiku-latest'). */
  model: string;
  /** Custom base URL (for proxies). */
  baseUrl?: string;
}

function toAnthropicMessages(messages: Message[]): Anthropic.Messages.MessageParam[] {
  return messages.map((msg) => ({ role: msg.role, content: msg.content }));
}

/**
 * Anthropic provider implementing the LLMProvider interface.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions): LLMProvider {
  const client = new Anthropic({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `anthropic:${options.model}`,
    displayName: `Anthropic ${options.model}`,

    async complete(params: CompletionParams): Promise<CompletionResult> {
      logger.debug('Requesting Anthropic completion', {
        component: 'anthropic',
        model: options.model,
        messageCount: params.messages.length,
      });

      try {
        const response = await client.messages.create(
          {
            model: options.model,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
            ...(params.systemPrompt ? { system: params.systemPrompt } : {}),
            messages: toAnthropicMessages(params.messages),
          },
          params.signal ? { signal: params.signal } : undefined,
        );

        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('');

        return {
          text: text.trim(),
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
        };
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          logger.error('Anthropic API error', {
            component: 'anthropic',
            status: error.status,
            errorMessage: error.message,
          });
          throw new ProviderError('anthropic', `${String(error.status)}: ${error.message}`, error);
        }
        throw error;
      }
    },
  };
}
