// SQLite handle
export { createDatabase } from './database.js';
export type { AppDatabase, DatabaseOptions, SqliteDatabase } from './database.js';

// Repositories
export {
  createConversationRepository,
  createRequesterRepository,
  createKnowledgeRepository,
  createWebhookRepository,
} from './repositories/index.js';

export type {
  ConversationRepository,
  RequesterRepository,
  KnowledgeRepository,
  WebhookRepository,
} from './repositories/index.js';
