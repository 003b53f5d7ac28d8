import type { Category, Sentiment } from '@/core/types.js';

import type { HistoryTurn, KnowledgeSnippet } from './types.js';

// ─── External Ports ─────────────────────────────────────────────
// The workflow depends only on these interfaces. LLM-backed and
// SQLite-backed implementations live in llm-ports.ts and src/knowledge.

/** Returns raw, free-form labels; the workflow parses them. */
export interface ClassificationPort {
  classifyCategory(
    text: string,
    history: readonly HistoryTurn[],
    signal?: AbortSignal,
  ): Promise<string>;
  classifySentiment(
    text: string,
    history: readonly HistoryTurn[],
    signal?: AbortSignal,
  ): Promise<string>;
}

export interface KnowledgeLookupPort {
  /** Results sorted by descending score, all with `score >= minScore`. */
  retrieve(
    query: string,
    k: number,
    categoryFilter: Category | undefined,
    minScore: number,
    signal?: AbortSignal,
  ): Promise<KnowledgeSnippet[]>;
}

/** Everything a specialist responder sees. */
export interface ResponseContext {
  readonly text: string;
  readonly sentiment: Sentiment;
  readonly priorityScore: number;
  /** At most the last 5 turns. */
  readonly history: readonly HistoryTurn[];
  /** At most the top 2 snippets. */
  readonly knowledge: readonly KnowledgeSnippet[];
}

export interface ResponseGenerationPort {
  generate(category: Category, context: ResponseContext, signal?: AbortSignal): Promise<string>;
}
