import type { Category, ConversationId, Sentiment } from '@/core/types.js';

import type { ResponseContext } from './ports.js';
import type { RequestContext, WorkflowState } from './types.js';

export const HISTORY_WINDOW = 5;
export const KNOWLEDGE_WINDOW = 2;

export const RESPONDER_FAILURE_REASON = 'System error during response generation';

const TECHNICAL_DIFFICULTIES = "I apologize, but I'm experiencing technical difficulties. ";

/** Sent in place of a generated answer when the responder fails. */
export const CANNED_APOLOGIES: Readonly<Record<Category, string>> = {
  Recruitment:
    TECHNICAL_DIFFICULTIES +
    'Please contact recruiting@company.com or visit careers.company.com for assistance.',
  Payroll:
    TECHNICAL_DIFFICULTIES +
    'For urgent payroll matters, please contact payroll@company.com or call ext. 2200 immediately.',
  Benefits:
    TECHNICAL_DIFFICULTIES +
    'Please contact benefits@company.com or call ext. 2300 for immediate assistance.',
  Policy:
    TECHNICAL_DIFFICULTIES +
    'Please refer to the employee handbook at handbook.company.com or contact hr@company.com.',
  LeaveManagement:
    TECHNICAL_DIFFICULTIES +
    'Please visit timeoff.company.com or contact leave@company.com for assistance.',
  Performance:
    TECHNICAL_DIFFICULTIES +
    'Please contact your manager or visit performance.company.com.',
  General: TECHNICAL_DIFFICULTIES + 'Please try again or contact hr@company.com directly.',
};

const HANDOFF_MESSAGES = {
  Angry:
    "I sincerely apologize for the frustration you're experiencing. " +
    "Your concern is very important to us, and I'm connecting you with " +
    'a specialized support representative who can provide immediate assistance. ' +
    'They will be with you shortly and have full context of your situation.',
  Negative:
    'I understand your concern, and I want to ensure you receive the best possible assistance. ' +
    "I'm connecting you with a senior support specialist who can help resolve this issue. " +
    "They'll have access to all the details we've discussed.",
  other:
    'To ensure you receive the most accurate assistance for your inquiry, ' +
    "I'm connecting you with a specialized support representative. " +
    "They'll be able to help you shortly.",
} as const;

/** Deterministic hand-off text for the `escalate` stage. */
export function buildEscalationMessage(
  sentiment: Sentiment | null,
  conversationId: ConversationId,
): string {
  const opening =
    sentiment === 'Angry'
      ? HANDOFF_MESSAGES.Angry
      : sentiment === 'Negative'
        ? HANDOFF_MESSAGES.Negative
        : HANDOFF_MESSAGES.other;

  return (
    `${opening}\n\nCase Reference: ${conversationId}` + '\n\nEstimated wait time: 2-5 minutes'
  );
}

/** What a specialist responder is given: recent turns and the best snippets only. */
export function buildResponseContext(
  state: WorkflowState,
  context: RequestContext,
): ResponseContext {
  const history = context.priorHistory ?? [];
  return {
    text: context.text,
    sentiment: state.sentiment ?? 'Neutral',
    priorityScore: state.priorityScore,
    history: history.slice(-HISTORY_WINDOW),
    knowledge: state.knowledgeSnippets.slice(0, KNOWLEDGE_WINDOW),
  };
}
