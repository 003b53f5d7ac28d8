/**
 * Prompt templates for the LLM-backed classification and response ports.
 * Templates use {{placeholder}} syntax; unknown placeholders are left as-is.
 */
import type { Category } from '@/core/types.js';

import type { ResponseContext } from './ports.js';
import type { HistoryTurn, KnowledgeSnippet } from './types.js';

const CLASSIFICATION_HISTORY_TURNS = 3;
const CLASSIFICATION_TURN_CHARS = 100;
const SNIPPET_CHARS = 200;

export const CATEGORY_PROMPT = `You are an expert HR query classifier for employee support.

Categorize the following employee query into ONE of these categories:
- Recruitment: job applications, internal positions, hiring, interviews, referrals, offer letters
- Payroll: salary, paychecks, direct deposit, tax withholdings, W-2 forms, overtime
- Benefits: health insurance, 401(k), retirement plans, wellness programs, enrollment
- Policy: company policies, employee handbook, remote work, dress code, code of conduct, expenses
- LeaveManagement: vacation requests, PTO, sick leave, FMLA, bereavement, leave of absence
- Performance: performance reviews, goals, promotions, feedback, training, career growth
- General: anything else

Query: {{query}}

{{history}}

Respond with ONLY the category name.`;

export const SENTIMENT_PROMPT = `You are an expert at analyzing employee sentiment.

Classify the sentiment of the following query as ONE of:
- Positive: happy, satisfied, grateful
- Neutral: informational, factual, calm
- Negative: disappointed, frustrated, concerned
- Angry: very upset, furious, demanding, threatening

Query: {{query}}

{{history}}

Respond with ONLY the sentiment label.`;

/** Specialist persona and focus areas, one per category. */
export const SPECIALIST_FOCUS: Readonly<Record<Category, string>> = {
  Recruitment:
    'an HR Recruitment specialist. Cover internal applications, interview processes, referrals, offer letters and onboarding',
  Payroll:
    'an HR Payroll specialist. Cover pay schedules, direct deposit, withholdings, W-2 forms, overtime and pay discrepancies',
  Benefits:
    'an HR Benefits specialist. Cover health insurance, 401(k), enrollment windows, dependents and qualifying life events',
  Policy:
    'an HR Policy specialist. Cover the employee handbook, remote work, expenses, dress code and code of conduct',
  LeaveManagement:
    'an HR Leave specialist. Cover PTO requests and balances, sick leave, FMLA, bereavement and leaves of absence',
  Performance:
    'an HR Performance specialist. Cover review cycles, goals, promotions, feedback and development plans',
  General: 'a helpful HR support agent providing general assistance and pointing employees to the right contacts',
};

export const SPECIALIST_PROMPT = `You are {{persona}}.

Employee sentiment: {{sentiment}}
Priority level: {{priority}}

{{history}}

{{knowledge}}

Instructions:
1. Give clear, actionable guidance with concrete next steps
2. If the sentiment is negative, open with empathy
3. Offer to connect the employee with the right team for complex matters
4. Keep the answer professional and under 300 words`;

export function interpolate(template: string, variables: Record<string, string>): string {
  return template.replace(
    /\{\{(\w+)\}\}/g,
    (_match, key: string) => variables[key] ?? `{{${key}}}`,
  );
}

function capitalize(value: string): string {
  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

/** Short history block for the classifiers: last 3 turns, each cut to 100 chars. */
export function formatClassificationHistory(history: readonly HistoryTurn[]): string {
  if (history.length === 0) return '';
  const lines = history
    .slice(-CLASSIFICATION_HISTORY_TURNS)
    .map((turn) => `${turn.role}: ${turn.content.slice(0, CLASSIFICATION_TURN_CHARS)}`);
  return `Previous conversation context:\n${lines.join('\n')}`;
}

export function formatResponderHistory(history: readonly HistoryTurn[]): string {
  if (history.length === 0) return '';
  const lines = history.map((turn) => `${capitalize(turn.role)}: ${turn.content}`);
  return `Previous conversation:\n${lines.join('\n')}`;
}

export function formatKnowledge(snippets: readonly KnowledgeSnippet[]): string {
  if (snippets.length === 0) return '';
  const lines = snippets.map(
    (snippet, index) =>
      `${(index + 1).toString()}. ${snippet.title}: ${snippet.content.slice(0, SNIPPET_CHARS)}`,
  );
  return `Relevant HR knowledge base articles:\n${lines.join('\n')}`;
}

export function buildSpecialistPrompt(category: Category, context: ResponseContext): string {
  return interpolate(SPECIALIST_PROMPT, {
    persona: SPECIALIST_FOCUS[category],
    sentiment: context.sentiment,
    priority: context.priorityScore.toString(),
    history: formatResponderHistory(context.history),
    knowledge: formatKnowledge(context.knowledge),
  }).replace(/\n{3,}/g, '\n\n');
}
