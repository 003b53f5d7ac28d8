/**
 * Priority scoring, escalation policy and label parsing.
 * All functions are pure.
 */
import type { Category, Sentiment } from '@/core/types.js';

import type { EscalationDecision } from './types.js';

const BASE_PRIORITY = 3;
const MIN_PRIORITY = 1;
const MAX_PRIORITY = 10;
const HIGH_PRIORITY_THRESHOLD = 8;
const MAX_ATTEMPTS_BEFORE_ESCALATION = 3;

const SENTIMENT_WEIGHT: Readonly<Record<Sentiment, number>> = {
  Positive: 0,
  Neutral: 0,
  Negative: 2,
  Angry: 3,
};

/** Phrases that force a human hand-off. Matched case-insensitively as substrings, in order. */
export const DEFAULT_ESCALATION_KEYWORDS: readonly string[] = [
  'lawsuit',
  'legal',
  'attorney',
  'lawyer',
  'sue',
  'refund immediately',
  'speak to a manager',
  'speak to manager',
  'talk to a manager',
  'talk to manager',
  'contact supervisor',
  'unacceptable',
  'ridiculous',
  'demand refund',
  'escalate this',
];

/**
 * Priority on a 1–10 scale. `category` does not currently contribute
 * but stays part of the signature for callers.
 */
export function scorePriority(
  sentiment: Sentiment,
  _category: Category,
  isRepeat: boolean,
  isVip: boolean,
): number {
  let score = BASE_PRIORITY + SENTIMENT_WEIGHT[sentiment];
  if (isRepeat) score += 2;
  if (isVip) score += 2;
  return Math.max(MIN_PRIORITY, Math.min(MAX_PRIORITY, score));
}

/**
 * Collects every escalation reason that applies, in a fixed order.
 * Only the first matching keyword is reported.
 */
export function decideEscalation(
  priorityScore: number,
  sentiment: Sentiment,
  attemptCount: number,
  rawText: string,
  keywords: readonly string[] = DEFAULT_ESCALATION_KEYWORDS,
): EscalationDecision {
  const reasons: string[] = [];

  if (priorityScore >= HIGH_PRIORITY_THRESHOLD) {
    reasons.push('High priority score');
  }
  if (sentiment === 'Angry') {
    reasons.push('Angry sentiment detected');
  }
  if (attemptCount >= MAX_ATTEMPTS_BEFORE_ESCALATION) {
    reasons.push('Multiple unsuccessful attempts');
  }

  const lowered = rawText.toLowerCase();
  const keyword = keywords.find((kw) => lowered.includes(kw.toLowerCase()));
  if (keyword !== undefined) {
    reasons.push(`Escalation keyword detected: ${keyword}`);
  }

  if (reasons.length === 0) {
    return { escalate: false, reason: null };
  }
  return { escalate: true, reason: reasons.join('; ') };
}

// ─── Label Parsing ──────────────────────────────────────────────

/** Checked in order; the first category with a matching fragment wins. */
const CATEGORY_FRAGMENTS: readonly (readonly [Category, readonly string[]])[] = [
  ['Recruitment', ['recruit', 'hiring', 'job', 'interview']],
  ['Payroll', ['payroll', 'salary', 'pay', 'w-2', 'w2']],
  ['Benefits', ['benefit', 'insurance', '401k', 'retirement']],
  ['Policy', ['policy', 'handbook', 'code of conduct', 'dress code']],
  ['LeaveManagement', ['leave', 'vacation', 'pto', 'sick', 'fmla']],
  ['Performance', ['performance', 'review', 'promotion', 'goal']],
];

/** Maps a free-form classifier label onto a category. Unknown labels become `General`. */
export function parseCategoryLabel(raw: string): Category {
  const lowered = raw.toLowerCase().trim();
  for (const [category, fragments] of CATEGORY_FRAGMENTS) {
    if (fragments.some((fragment) => lowered.includes(fragment))) {
      return category;
    }
  }
  return 'General';
}

const NEGATIVE_MARKERS = ['negative', 'angry', 'frustrated'];
const INTENSITY_MARKERS = ['very', 'extremely', 'angry'];
const POSITIVE_MARKERS = ['positive', 'happy', 'satisfied'];

/** Maps a free-form sentiment label onto a sentiment. Unknown labels become `Neutral`. */
export function parseSentimentLabel(raw: string): Sentiment {
  const lowered = raw.toLowerCase().trim();
  if (NEGATIVE_MARKERS.some((marker) => lowered.includes(marker))) {
    return INTENSITY_MARKERS.some((marker) => lowered.includes(marker)) ? 'Angry' : 'Negative';
  }
  if (POSITIVE_MARKERS.some((marker) => lowered.includes(marker))) {
    return 'Positive';
  }
  return 'Neutral';
}
