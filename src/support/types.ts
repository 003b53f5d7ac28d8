import type { Category, ConversationId, RequesterId, Sentiment } from '@/core/types.js';
import type { HistoryTurn, WorkflowResult } from '@/workflow/types.js';

// ─── Requester ──────────────────────────────────────────────────

export interface Requester {
  requesterId: RequesterId;
  isVip: boolean;
  createdAt: Date;
}

export interface RequesterRepository {
  /** Return the requester, creating a non-VIP record on first contact. */
  getOrCreate(id: RequesterId): Promise<Requester>;
  setVip(id: RequesterId, isVip: boolean): Promise<Requester | null>;
}

// ─── Conversation ───────────────────────────────────────────────

export type ConversationStatus = 'Resolved' | 'Escalated';

export interface Conversation {
  conversationId: ConversationId;
  requesterId: RequesterId;
  query: string;
  category: Category;
  sentiment: Sentiment;
  priorityScore: number;
  response: string;
  responseTimeSeconds: number;
  status: ConversationStatus;
  escalated: boolean;
  escalationReason?: string;
  metadata?: Record<string, unknown>;
  createdAt: Date;
}

export type SaveConversationInput = Omit<Conversation, 'createdAt'>;

export interface Feedback {
  conversationId: ConversationId;
  rating: number;
  comment?: string;
  createdAt: Date;
}

export interface ConversationRepository {
  /** Store the conversation with its user and assistant messages. */
  save(input: SaveConversationInput): Promise<Conversation>;
  findById(id: ConversationId): Promise<Conversation | null>;
  /** Most recent first. */
  listForRequester(requesterId: RequesterId, limit: number): Promise<Conversation[]>;
  /**
   * Prior turns for the workflow, oldest first: the last `messagesPerConversation`
   * messages of each of the requester's `conversations` most recent conversations.
   */
  recentHistory(
    requesterId: RequesterId,
    options?: { conversations?: number; messagesPerConversation?: number },
  ): Promise<HistoryTurn[]>;
  addFeedback(input: Omit<Feedback, 'createdAt'>): Promise<Feedback>;
}

// ─── Service ────────────────────────────────────────────────────

export interface ProcessQueryInput {
  message: string;
  userId?: string;
  conversationId?: string;
}

export interface SubmitFeedbackInput {
  conversationId: string;
  rating: number;
  comment?: string;
}

export interface SupportService {
  processQuery(input: ProcessQueryInput): Promise<WorkflowResult>;
  submitFeedback(input: SubmitFeedbackInput): Promise<Feedback>;
  getHistory(userId: string, limit: number): Promise<Conversation[]>;
}
