/**
 * Knowledge repository: FAQ entries with JSON-encoded embeddings.
 */
import { nanoid } from 'nanoid';
import type { SqliteDatabase } from '@/infrastructure/database.js';
import { asKnowledgeEntryId } from '@/core/types.js';
import type {
  CreateKnowledgeEntryInput,
  KnowledgeEntry,
  KnowledgeRepository,
} from '@/knowledge/types.js';

interface KnowledgeRow {
  id: string;
  title: string;
  content: string;
  category: string;
  embedding: string;
  created_at: string;
}

function parseEmbedding(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === 'number');
}

function toKnowledgeModel(row: KnowledgeRow): KnowledgeEntry {
  return {
    id: asKnowledgeEntryId(row.id),
    title: row.title,
    content: row.content,
    category: row.category,
    embedding: parseEmbedding(row.embedding),
    createdAt: new Date(row.created_at),
  };
}

/** Create a KnowledgeRepository backed by SQLite. */
export function createKnowledgeRepository(
  db: SqliteDatabase,
  now: () => Date = () => new Date(),
): KnowledgeRepository {
  const insert = db.prepare(`
    INSERT INTO knowledge_entries (id, title, content, category, embedding, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const selectAll = db.prepare('SELECT * FROM knowledge_entries ORDER BY rowid');
  const selectByCategory = db.prepare(
    'SELECT * FROM knowledge_entries WHERE category = ? ORDER BY rowid',
  );

  return {
    async create(input: CreateKnowledgeEntryInput): Promise<KnowledgeEntry> {
      const row: KnowledgeRow = {
        id: nanoid(),
        title: input.title,
        content: input.content,
        category: input.category,
        embedding: JSON.stringify(input.embedding),
        created_at: now().toISOString(),
      };
      insert.run(row.id, row.title, row.content, row.category, row.embedding, row.created_at);
      return toKnowledgeModel(row);
    },

    async list(category?: string): Promise<KnowledgeEntry[]> {
      const rows = (
        category === undefined ? selectAll.all() : selectByCategory.all(category)
      ) as KnowledgeRow[];
      return rows.map(toKnowledgeModel);
    },

    async count(): Promise<number> {
      const row = db.prepare('SELECT COUNT(*) AS total FROM knowledge_entries').get() as {
        total: number;
      };
      return row.total;
    },

    async clear(): Promise<number> {
      return db.prepare('DELETE FROM knowledge_entries').run().changes;
    },
  };
}
