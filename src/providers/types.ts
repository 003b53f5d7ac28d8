// ─── Messages ───────────────────────────────────────────────────

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

// ─── Completion ─────────────────────────────────────────────────

export interface CompletionParams {
  messages: Message[];
  systemPrompt?: string;
  maxTokens: number;
  temperature: number;
  /** Aborts the underlying HTTP request. */
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResult {
  text: string;
  usage: TokenUsage;
}

// ─── Provider Interface ─────────────────────────────────────────

export interface LLMProvider {
  readonly id: string;
  readonly displayName: string;

  /** Single, non-streaming chat completion. */
  complete(params: CompletionParams): Promise<CompletionResult>;
}

/** Text → embedding vector. */
export type EmbeddingGenerator = (text: string, signal?: AbortSignal) => Promise<number[]>;
