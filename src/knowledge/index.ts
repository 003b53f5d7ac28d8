/**
 * Knowledge base module: FAQ storage, import and semantic lookup.
 */
export type {
  CreateKnowledgeEntryInput,
  FaqImportResult,
  FaqItem,
  KnowledgeEntry,
  KnowledgeRepository,
} from './types.js';

export { cosineSimilarity, createKnowledgeLookup } from './knowledge-lookup.js';
export type { KnowledgeLookupDeps } from './knowledge-lookup.js';
export { faqEmbeddingText, importFaqItems, importFaqs, parseFaqFile } from './faq-import.js';
export type { ImportFaqsOptions } from './faq-import.js';
