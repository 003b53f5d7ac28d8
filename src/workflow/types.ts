import type { Category, ConversationId, RequesterId, Sentiment } from '@/core/types.js';

// ─── Request Input ──────────────────────────────────────────────

export interface HistoryTurn {
  readonly role: 'user' | 'assistant';
  readonly content: string;
}

export interface RequesterFlags {
  readonly isVip?: boolean;
  readonly isRepeat?: boolean;
  readonly attemptCount?: number;
}

/** Immutable input to one workflow run. */
export interface RequestContext {
  readonly text: string;
  readonly requesterId: RequesterId;
  readonly conversationId: ConversationId;
  readonly priorHistory?: readonly HistoryTurn[];
  readonly requesterFlags?: RequesterFlags;
}

// ─── Pipeline State ─────────────────────────────────────────────

export interface KnowledgeSnippet {
  readonly title: string;
  readonly content: string;
  readonly category: string;
  readonly score: number;
}

export type WorkflowAction = 'pending' | 'complete' | 'escalate';

/**
 * Accumulator threaded through the stages of a single run.
 * Stages return a new object; the previous one is never mutated.
 */
export interface WorkflowState {
  readonly category: Category | null;
  readonly sentiment: Sentiment | null;
  readonly priorityScore: number;
  readonly knowledgeSnippets: readonly KnowledgeSnippet[];
  readonly escalate: boolean;
  readonly escalationReason: string | null;
  readonly responseText: string | null;
  readonly action: WorkflowAction;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export const SPECIALIST_ROUTES = [
  'recruitment',
  'payroll',
  'benefits',
  'policy',
  'leave_management',
  'performance',
  'general',
] as const;

export type SpecialistRoute = (typeof SPECIALIST_ROUTES)[number];

export type RouteTarget = SpecialistRoute | 'escalate';

export type StageName =
  | 'classify'
  | 'sentiment'
  | 'retrieve_knowledge'
  | 'check_escalation'
  | RouteTarget;

/** Tagged result of one stage. Only `check_escalation` produces `route`. */
export type StageOutcome =
  | { readonly kind: 'next'; readonly state: WorkflowState }
  | { readonly kind: 'route'; readonly target: RouteTarget; readonly state: WorkflowState }
  | { readonly kind: 'done'; readonly state: WorkflowState };

export type Stage = (state: WorkflowState, context: RequestContext) => Promise<StageOutcome>;

// ─── Result ─────────────────────────────────────────────────────

/** Frozen snapshot of the final state. This is what is persisted and dispatched. */
export interface WorkflowResult {
  readonly conversationId: ConversationId;
  readonly requesterId: RequesterId;
  readonly category: Category;
  readonly sentiment: Sentiment;
  readonly priorityScore: number;
  readonly escalated: boolean;
  readonly escalationReason?: string;
  readonly responseText: string;
  readonly knowledgeSnippets: readonly KnowledgeSnippet[];
  readonly route: RouteTarget;
  readonly processingTimeSeconds: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface EscalationDecision {
  readonly escalate: boolean;
  /** `null` exactly when `escalate` is false. */
  readonly reason: string | null;
}
