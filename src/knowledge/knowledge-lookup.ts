/**
 * Semantic FAQ lookup over the SQLite knowledge store.
 * Implements the workflow's KnowledgeLookupPort.
 */
import type { Logger } from '@/observability/logger.js';
import type { EmbeddingGenerator } from '@/providers/types.js';
import type { KnowledgeLookupPort } from '@/workflow/ports.js';
import type { KnowledgeSnippet } from '@/workflow/types.js';
import type { KnowledgeRepository } from './types.js';

export interface KnowledgeLookupDeps {
  repository: KnowledgeRepository;
  /** Null when no embedding provider is configured; every lookup then returns nothing. */
  embed: EmbeddingGenerator | null;
  logger: Logger;
}

/** Cosine similarity in [-1, 1]. Mismatched or zero vectors score 0. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function createKnowledgeLookup(deps: KnowledgeLookupDeps): KnowledgeLookupPort {
  const { repository, embed, logger } = deps;

  return {
    async retrieve(query, k, categoryFilter, minScore, signal): Promise<KnowledgeSnippet[]> {
      if (!embed || k <= 0) return [];

      const vector = await embed(query, signal);
      const entries = await repository.list(categoryFilter);

      const ranked = entries
        .map((entry) => ({
          title: entry.title,
          content: entry.content,
          category: entry.category,
          score: cosineSimilarity(vector, entry.embedding),
        }))
        .filter((snippet) => snippet.score >= minScore)
        .sort((a, b) => b.score - a.score)
        .slice(0, k);

      logger.debug('Knowledge lookup complete', {
        component: 'knowledge-lookup',
        category: categoryFilter,
        candidates: entries.length,
        returned: ranked.length,
      });

      return ranked;
    },
  };
}
