export { createConversationRepository } from './conversation-repository.js';
export type { ConversationRepository } from '@/support/types.js';

export { createRequesterRepository } from './requester-repository.js';
export type { RequesterRepository } from '@/support/types.js';

export { createKnowledgeRepository } from './knowledge-repository.js';
export type { KnowledgeRepository } from '@/knowledge/types.js';

export { createWebhookRepository } from './webhook-repository.js';
export type { WebhookRepository } from '@/webhooks/types.js';
