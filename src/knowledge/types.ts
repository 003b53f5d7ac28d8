/**
 * Knowledge base types: FAQ entries with their embedding vectors.
 */
import type { KnowledgeEntryId } from '@/core/types.js';

// ─── Knowledge Entry ────────────────────────────────────────────

export interface KnowledgeEntry {
  id: KnowledgeEntryId;
  /** The FAQ question. */
  title: string;
  /** The FAQ answer. */
  content: string;
  category: string;
  embedding: number[];
  createdAt: Date;
}

export interface CreateKnowledgeEntryInput {
  title: string;
  content: string;
  category: string;
  embedding: number[];
}

// ─── FAQ Import ─────────────────────────────────────────────────

/** One record of a FAQ file. */
export interface FaqItem {
  question: string;
  answer: string;
  category: string;
}

export interface FaqImportResult {
  imported: number;
  failed: number;
  errors: string[];
}

// ─── Repository Interface ───────────────────────────────────────

export interface KnowledgeRepository {
  create(input: CreateKnowledgeEntryInput): Promise<KnowledgeEntry>;
  /** All entries, or those of one category when given. */
  list(category?: string): Promise<KnowledgeEntry[]>;
  count(): Promise<number>;
  /** Remove every entry. Used before a full re-import. */
  clear(): Promise<number>;
}
