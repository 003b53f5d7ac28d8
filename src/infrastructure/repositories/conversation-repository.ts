/**
 * Conversation repository: processed requests, their messages and feedback.
 */
import type { SqliteDatabase } from '@/infrastructure/database.js';
import { asConversationId, asRequesterId, isCategory, isSentiment } from '@/core/types.js';
import type { ConversationId, RequesterId } from '@/core/types.js';
import type {
  Conversation,
  ConversationRepository,
  Feedback,
  SaveConversationInput,
} from '@/support/types.js';
import type { HistoryTurn } from '@/workflow/types.js';

const DEFAULT_HISTORY_CONVERSATIONS = 5;
const DEFAULT_HISTORY_MESSAGES = 3;

// ─── Rows ───────────────────────────────────────────────────────

interface ConversationRow {
  id: string;
  requester_id: string;
  query: string;
  category: string;
  sentiment: string;
  priority_score: number;
  response: string;
  response_time_seconds: number;
  status: string;
  escalated: number;
  escalation_reason: string | null;
  metadata: string | null;
  created_at: string;
}

interface MessageRow {
  role: string;
  content: string;
}

interface FeedbackRow {
  conversation_id: string;
  rating: number;
  comment: string | null;
  created_at: string;
}

// ─── Mappers ────────────────────────────────────────────────────

function toConversationModel(row: ConversationRow): Conversation {
  return {
    conversationId: asConversationId(row.id),
    requesterId: asRequesterId(row.requester_id),
    query: row.query,
    category: isCategory(row.category) ? row.category : 'General',
    sentiment: isSentiment(row.sentiment) ? row.sentiment : 'Neutral',
    priorityScore: row.priority_score,
    response: row.response,
    responseTimeSeconds: row.response_time_seconds,
    status: row.status === 'Escalated' ? 'Escalated' : 'Resolved',
    escalated: row.escalated === 1,
    escalationReason: row.escalation_reason ?? undefined,
    metadata: row.metadata ? (JSON.parse(row.metadata) as Record<string, unknown>) : undefined,
    createdAt: new Date(row.created_at),
  };
}

function toHistoryTurn(row: MessageRow): HistoryTurn {
  return { role: row.role === 'assistant' ? 'assistant' : 'user', content: row.content };
}

function toFeedbackModel(row: FeedbackRow): Feedback {
  return {
    conversationId: asConversationId(row.conversation_id),
    rating: row.rating,
    comment: row.comment ?? undefined,
    createdAt: new Date(row.created_at),
  };
}

// ─── Repository Factory ─────────────────────────────────────────

/**
 * Create a ConversationRepository backed by SQLite.
 * Saving an existing conversation id replaces its analysis and appends the new messages.
 */
export function createConversationRepository(
  db: SqliteDatabase,
  now: () => Date = () => new Date(),
): ConversationRepository {
  const upsertConversation = db.prepare(`
    INSERT INTO conversations (
      id, requester_id, query, category, sentiment, priority_score, response,
      response_time_seconds, status, escalated, escalation_reason, metadata, created_at
    ) VALUES (
      @id, @requester_id, @query, @category, @sentiment, @priority_score, @response,
      @response_time_seconds, @status, @escalated, @escalation_reason, @metadata, @created_at
    )
    ON CONFLICT(id) DO UPDATE SET
      query = excluded.query,
      category = excluded.category,
      sentiment = excluded.sentiment,
      priority_score = excluded.priority_score,
      response = excluded.response,
      response_time_seconds = excluded.response_time_seconds,
      status = excluded.status,
      escalated = excluded.escalated,
      escalation_reason = excluded.escalation_reason,
      metadata = excluded.metadata
  `);

  const insertMessage = db.prepare(
    'INSERT INTO messages (conversation_id, role, content, created_at) VALUES (?, ?, ?, ?)',
  );

  const selectById = db.prepare('SELECT * FROM conversations WHERE id = ?');

  const selectForRequester = db.prepare(`
    SELECT * FROM conversations WHERE requester_id = ?
    ORDER BY created_at DESC, rowid DESC LIMIT ?
  `);

  const selectLastMessages = db.prepare(`
    SELECT role, content FROM (
      SELECT id, role, content FROM messages WHERE conversation_id = ?
      ORDER BY id DESC LIMIT ?
    ) ORDER BY id ASC
  `);

  const insertFeedback = db.prepare(
    'INSERT INTO feedback (conversation_id, rating, comment, created_at) VALUES (?, ?, ?, ?)',
  );

  function findRow(id: string): ConversationRow | undefined {
    return selectById.get(id) as ConversationRow | undefined;
  }

  const save = db.transaction((input: SaveConversationInput): ConversationRow | undefined => {
    const at = now().toISOString();
    upsertConversation.run({
      id: input.conversationId,
      requester_id: input.requesterId,
      query: input.query,
      category: input.category,
      sentiment: input.sentiment,
      priority_score: input.priorityScore,
      response: input.response,
      response_time_seconds: input.responseTimeSeconds,
      status: input.status,
      escalated: Number(input.escalated),
      escalation_reason: input.escalationReason ?? null,
      metadata: input.metadata ? JSON.stringify(input.metadata) : null,
      created_at: at,
    });
    insertMessage.run(input.conversationId, 'user', input.query, at);
    insertMessage.run(input.conversationId, 'assistant', input.response, at);
    return findRow(input.conversationId);
  });

  return {
    async save(input: SaveConversationInput): Promise<Conversation> {
      const row = save(input);
      if (!row) throw new Error(`Conversation ${input.conversationId} vanished after save`);
      return toConversationModel(row);
    },

    async findById(id: ConversationId): Promise<Conversation | null> {
      const row = findRow(id);
      return row ? toConversationModel(row) : null;
    },

    async listForRequester(requesterId: RequesterId, limit: number): Promise<Conversation[]> {
      const rows = selectForRequester.all(requesterId, limit) as ConversationRow[];
      return rows.map(toConversationModel);
    },

    async recentHistory(requesterId, options): Promise<HistoryTurn[]> {
      const conversations = selectForRequester.all(
        requesterId,
        options?.conversations ?? DEFAULT_HISTORY_CONVERSATIONS,
      ) as ConversationRow[];

      // Oldest conversation first so the turns read chronologically.
      return conversations.reverse().flatMap((conversation) => {
        const rows = selectLastMessages.all(
          conversation.id,
          options?.messagesPerConversation ?? DEFAULT_HISTORY_MESSAGES,
        ) as MessageRow[];
        return rows.map(toHistoryTurn);
      });
    },

    async addFeedback(input): Promise<Feedback> {
      const at = now().toISOString();
      insertFeedback.run(input.conversationId, input.rating, input.comment ?? null, at);
      return toFeedbackModel({
        conversation_id: input.conversationId,
        rating: input.rating,
        comment: input.comment ?? null,
        created_at: at,
      });
    },
  };
}
