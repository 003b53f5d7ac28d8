/**
 * LLM-backed implementations of the classification and response ports.
 */
import { ProviderError } from '@/core/errors.js';
import type { LLMProvider } from '@/providers/types.js';

import type { ClassificationPort, ResponseGenerationPort } from './ports.js';
import {
  CATEGORY_PROMPT,
  SENTIMENT_PROMPT,
  buildSpecialistPrompt,
  formatClassificationHistory,
  interpolate,
} from './prompts.js';
import type { HistoryTurn } from './types.js';

export interface LlmPortOptions {
  temperature: number;
  maxOutputTokens: number;
}

const LABEL_MAX_TOKENS = 20;

export function createLlmClassifier(
  provider: LLMProvider,
  options: LlmPortOptions,
): ClassificationPort {
  const label = async (
    template: string,
    text: string,
    history: readonly HistoryTurn[],
    signal?: AbortSignal,
  ): Promise<string> => {
    const prompt = interpolate(template, {
      query: text,
      history: formatClassificationHistory(history),
    });
    const result = await provider.complete({
      messages: [{ role: 'user', content: prompt }],
      maxTokens: Math.min(LABEL_MAX_TOKENS, options.maxOutputTokens),
      temperature: options.temperature,
      signal,
    });
    return result.text;
  };

  return {
    classifyCategory: (text, history, signal) => label(CATEGORY_PROMPT, text, history, signal),
    classifySentiment: (text, history, signal) => label(SENTIMENT_PROMPT, text, history, signal),
  };
}

export function createLlmResponder(
  provider: LLMProvider,
  options: LlmPortOptions,
): ResponseGenerationPort {
  return {
    async generate(category, context, signal) {
      const result = await provider.complete({
        systemPrompt: buildSpecialistPrompt(category, context),
        messages: [{ role: 'user', content: context.text }],
        maxTokens: options.maxOutputTokens,
        temperature: options.temperature,
        signal,
      });
      if (result.text === '') {
        throw new ProviderError(provider.id, 'Empty response');
      }
      return result.text;
    },
  };
}
