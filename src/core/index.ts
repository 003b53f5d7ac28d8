// Core module: shared IDs, domain vocabulary, errors
export type {
  Category,
  ConversationId,
  DeliveryId,
  KnowledgeEntryId,
  RequesterId,
  Sentiment,
  SubscriptionId,
} from './types.js';
export {
  CATEGORIES,
  SENTIMENTS,
  asConversationId,
  asDeliveryId,
  asKnowledgeEntryId,
  asRequesterId,
  asSubscriptionId,
  isCategory,
  isSentiment,
} from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  TriageError,
  ValidationError,
  NotFoundError,
  ProviderError,
  PortTimeoutError,
  QueueFullError,
} from './errors.js';
