/**
 * SQLite database handle with schema bootstrap and lifecycle management.
 * Repositories receive the raw handle; nothing here is a module-level singleton.
 */
import Database from 'better-sqlite3';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';

/** Raw better-sqlite3 handle passed to repository factories. */
export type SqliteDatabase = Database.Database;

/** Options for opening the database. */
export interface DatabaseOptions {
  /** File path, or `:memory:` for an in-process database. */
  path: string;
  logger?: Logger;
}

/** Wrapper around the SQLite handle with lifecycle hooks. */
export interface AppDatabase {
  /** The raw better-sqlite3 instance. */
  client: SqliteDatabase;
  /** Close the handle. Safe to call twice. */
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS requesters (
    id TEXT PRIMARY KEY,
    is_vip INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS conversations (
    id TEXT PRIMARY KEY,
    requester_id TEXT NOT NULL REFERENCES requesters(id),
    query TEXT NOT NULL,
    category TEXT NOT NULL,
    sentiment TEXT NOT NULL,
    priority_score INTEGER NOT NULL,
    response TEXT NOT NULL,
    response_time_seconds REAL NOT NULL,
    status TEXT NOT NULL,
    escalated INTEGER NOT NULL DEFAULT 0,
    escalation_reason TEXT,
    metadata TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_conversations_requester
    ON conversations(requester_id, created_at);

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    role TEXT NOT NULL,
    content TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id);

  CREATE TABLE IF NOT EXISTS feedback (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    rating INTEGER NOT NULL CHECK (rating BETWEEN 1 AND 5),
    comment TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS knowledge_entries (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    category TEXT NOT NULL,
    embedding TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_knowledge_category ON knowledge_entries(category);

  CREATE TABLE IF NOT EXISTS webhooks (
    id TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    events TEXT NOT NULL,
    secret_key TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    delivery_count INTEGER NOT NULL DEFAULT 0,
    failure_count INTEGER NOT NULL DEFAULT 0,
    last_delivery_at TEXT,
    last_failure_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS webhook_deliveries (
    id TEXT PRIMARY KEY,
    webhook_id TEXT NOT NULL REFERENCES webhooks(id) ON DELETE CASCADE,
    event_type TEXT NOT NULL,
    payload TEXT NOT NULL,
    status TEXT NOT NULL,
    status_code INTEGER,
    response_body TEXT,
    error_message TEXT,
    attempt_count INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    delivered_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_deliveries_webhook
    ON webhook_deliveries(webhook_id, created_at);
`;

/**
 * Open the database and create any missing tables.
 * File databases run in WAL mode; foreign keys are always enforced.
 */
export function createDatabase(options: DatabaseOptions): AppDatabase {
  const logger = options.logger ?? createLogger({ name: 'database' });
  const client = new Database(options.path);

  if (options.path !== ':memory:') {
    client.pragma('journal_mode = WAL');
  }
  client.pragma('foreign_keys = ON');
  client.exec(SCHEMA);

  logger.info('Database opened', { component: 'database', path: options.path });

  return {
    client,

    close(): void {
      if (!client.open) return;
      client.close();
      logger.info('Database closed', { component: 'database', path: options.path });
    },
  };
}
