/**
 * Scripted LLM provider and embedder for end-to-end tests.
 * Answers the classification prompts with fixed labels and the specialist
 * prompt with a fixed reply, so the real ports and prompts run unchanged.
 */
import { CATEGORY_PROMPT, SENTIMENT_PROMPT } from '@/workflow/prompts.js';
import type { CompletionParams, EmbeddingGenerator, LLMProvider } from '@/providers/types.js';

export interface ScriptedProviderConfig {
  /** Label returned for the category prompt, or a function of the user query. */
  category?: string | ((query: string) => string);
  sentiment?: string | ((query: string) => string);
  /** Reply returned for the specialist prompt. */
  response?: string | ((query: string, systemPrompt: string) => string);
  /** Thrown from every call when set. */
  failWith?: Error;
}

export interface ScriptedProvider extends LLMProvider {
  /** Every request received, in order. */
  readonly calls: CompletionParams[];
}

const CATEGORY_MARKER = firstLine(CATEGORY_PROMPT);
const SENTIMENT_MARKER = firstLine(SENTIMENT_PROMPT);

function firstLine(text: string): string {
  return text.split('\n')[0] ?? text;
}

function extractQuery(prompt: string): string {
  const match = /^Query: (.*)$/m.exec(prompt);
  return match?.[1] ?? prompt;
}

function answer<A extends unknown[]>(
  value: string | ((...args: A) => string) | undefined,
  fallback: string,
  ...args: A
): string {
  if (value === undefined) return fallback;
  return typeof value === 'string' ? value : value(...args);
}

export function createScriptedProvider(config: ScriptedProviderConfig = {}): ScriptedProvider {
  const calls: CompletionParams[] = [];

  return {
    id: 'scripted',
    displayName: 'Scripted Test Provider',
    calls,

    complete(params) {
      calls.push(params);
      if (config.failWith) return Promise.reject(config.failWith);

      const content = params.messages[params.messages.length - 1]?.content ?? '';
      let text: string;
      if (content.startsWith(CATEGORY_MARKER)) {
        text = answer(config.category, 'General', extractQuery(content));
      } else if (content.startsWith(SENTIMENT_MARKER)) {
        text = answer(config.sentiment, 'Neutral', extractQuery(content));
      } else {
        text = answer(config.response, 'Here is what you need to know.', content, params.systemPrompt ?? '');
      }

      return Promise.resolve({
        text,
        usage: { inputTokens: content.length, outputTokens: text.length },
      });
    },
  };
}

/**
 * Bag-of-words embedder over a fixed vocabulary. Texts sharing vocabulary
 * words get a positive cosine similarity; texts sharing none score zero.
 */
export function createKeywordEmbedder(vocabulary: readonly string[]): EmbeddingGenerator {
  const terms = vocabulary.map((term) => term.toLowerCase());
  return (text) => {
    const words = new Set(text.toLowerCase().match(/[a-z0-9]+/g) ?? []);
    return Promise.resolve(terms.map((term) => (words.has(term) ? 1 : 0)));
  };
}
