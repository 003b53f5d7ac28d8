// LLM provider adapters (openai, groq, anthropic) and embeddings
export type {
  CompletionParams,
  CompletionResult,
  EmbeddingGenerator,
  LLMProvider,
  Message,
  MessageRole,
  TokenUsage,
} from './types.js';

export { createProvider, resolveApiKey } from './factory.js';
export { createAnthropicProvider } from './anthropic.js';
export type { AnthropicProviderOptions } from './anthropic.js';
export { createOpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { createEmbeddingProvider, resolveEmbeddingProvider } from './embeddings.js';
export type { EmbeddingProviderOptions } from './embeddings.js';
