/**
 * OpenAI LLM provider adapter.
 * Wraps the openai SDK to implement the LLMProvider interface.
 * Also usable for OpenAI-compatible APIs (Groq, Ollama, etc.) via baseUrl.
 */
import OpenAI from 'openai';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { CompletionParams, CompletionResult, LLMProvider, Message } from './types.js';

const logger = createLogger({ name: 'openai-provider' });

/** Configuration for the OpenAI provider. */
export interface OpenAIProviderOptions {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o-mini'). */
  model: string;
  /** Custom base URL (Groq, proxies, etc.). */
  baseUrl?: string;
  /** Provider label for logging/display. Defaults to 'openai'. */
  providerLabel?: string;
}

function toOpenAIMessages(
  messages: Message[],
  systemPrompt?: string,
): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const result: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

  if (systemPrompt) {
    result.push({ role: 'system', content: systemPrompt });
  }

  for (const msg of messages) {
    if (msg.role === 'assistant') {
      result.push({ role: 'assistant', content: msg.content });
    } else {
      result.push({ role: 'user', content: msg.content });
    }
  }

  return result;
}

/**
 * OpenAI provider implementing the LLMProvider interface.
 */
export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const label = options.providerLabel ?? 'openai';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `${label}:${options.model}`,
    displayName: `${label.charAt(0).toUpperCase()}${label.slice(1)} ${options.model}`,

    async complete(params: CompletionParams): Promise<CompletionResult> {
      const openaiMessages = toOpenAIMessages(params.messages, params.systemPrompt);

      logger.debug('Requesting OpenAI completion', {
        component: label,
        model: options.model,
        messageCount: openaiMessages.length,
      });

      try {
        const response = await client.chat.completions.create(
          {
            model: options.model,
            messages: openaiMessages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
          },
          params.signal ? { signal: params.signal } : undefined,
        );

        const text = response.choices[0]?.message.content ?? '';
        return {
          text: text.trim(),
          usage: {
            inputTokens: response.usage?.prompt_tokens ?? 0,
            outputTokens: response.usage?.completion_tokens ?? 0,
          },
        };
      } catch (error) {
        if (error instanceof OpenAI.APIError) {
          logger.error('OpenAI API error', {
            component: label,
            status: error.status,
            errorMessage: error.message,
          });
          throw new ProviderError(label, `${String(error.status)}: ${error.message}`, error);
        }
        throw error;
      }
    },
  };
}
