/**
 * Pipeline stages. Each stage owns a fixed set of state fields and returns a
 * new state; port failures degrade to documented fallbacks instead of throwing.
 */
import type { Category } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

import type { PortGuardOptions, Sleep } from './port-guard.js';
import { guardPortCall } from './port-guard.js';
import {
  decideEscalation,
  parseCategoryLabel,
  parseSentimentLabel,
  scorePriority,
} from './policy.js';
import type { ClassificationPort, KnowledgeLookupPort, ResponseGenerationPort } from './ports.js';
import {
  CANNED_APOLOGIES,
  RESPONDER_FAILURE_REASON,
  buildEscalationMessage,
  buildResponseContext,
} from './responders.js';
import { resolveRoute } from './routing.js';
import type { SpecialistRoute, Stage, StageName, WorkflowState } from './types.js';

/** Priority assigned when sentiment analysis fails. */
export const DEGRADED_PRIORITY = 5;

const MANUAL_ESCALATION_REASON = 'Manual escalation required';

type GuardPolicy = Omit<PortGuardOptions, 'sleep' | 'logger'>;

export interface WorkflowOptions {
  knowledgeTopK: number;
  minSimilarity: number;
  escalationKeywords: readonly string[];
  classification: GuardPolicy;
  knowledge: GuardPolicy;
  responder: GuardPolicy;
}

export interface StageDeps {
  classifier: ClassificationPort;
  knowledge: KnowledgeLookupPort;
  responder: ResponseGenerationPort;
  logger: Logger;
  options: WorkflowOptions;
  sleep?: Sleep;
}

const SPECIALIST_CATEGORY: Readonly<Record<SpecialistRoute, Category>> = {
  recruitment: 'Recruitment',
  payroll: 'Payroll',
  benefits: 'Benefits',
  policy: 'Policy',
  leave_management: 'LeaveManagement',
  performance: 'Performance',
  general: 'General',
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** State after a responder failure: canned text and a forced escalation. */
export function responderFailureState(state: WorkflowState, category: Category): WorkflowState {
  return {
    ...state,
    responseText: CANNED_APOLOGIES[category],
    escalate: true,
    escalationReason: RESPONDER_FAILURE_REASON,
    action: 'escalate',
  };
}

/** Builds the stage table for one engine instance. */
export function createStages(deps: StageDeps): Readonly<Record<StageName, Stage>> {
  const { classifier, knowledge, responder, logger, options, sleep } = deps;

  const guard = (policy: GuardPolicy): PortGuardOptions => ({ ...policy, sleep, logger });

  const classify: Stage = async (state, ctx) => {
    try {
      const raw = await guardPortCall(
        'classification',
        (signal) => classifier.classifyCategory(ctx.text, ctx.priorHistory ?? [], signal),
        guard(options.classification),
      );
      const category = parseCategoryLabel(raw);
      logger.info('Request classified', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        category,
      });
      return {
        kind: 'next',
        state: { ...state, category, metadata: { ...state.metadata, rawCategory: raw } },
      };
    } catch (error) {
      logger.error('Classification failed, defaulting to General', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        error: describeError(error),
      });
      return { kind: 'next', state: { ...state, category: 'General' } };
    }
  };

  const sentiment: Stage = async (state, ctx) => {
    try {
      const raw = await guardPortCall(
        'sentiment',
        (signal) => classifier.classifySentiment(ctx.text, ctx.priorHistory ?? [], signal),
        guard(options.classification),
      );
      const parsed = parseSentimentLabel(raw);
      const priorityScore = scorePriority(
        parsed,
        state.category ?? 'General',
        ctx.requesterFlags?.isRepeat ?? false,
        ctx.requesterFlags?.isVip ?? false,
      );
      logger.info('Sentiment analysed', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        sentiment: parsed,
        priorityScore,
      });
      return {
        kind: 'next',
        state: {
          ...state,
          sentiment: parsed,
          priorityScore,
          metadata: { ...state.metadata, rawSentiment: raw },
        },
      };
    } catch (error) {
      logger.error('Sentiment analysis failed, defaulting to Neutral', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        error: describeError(error),
      });
      return {
        kind: 'next',
        state: { ...state, sentiment: 'Neutral', priorityScore: DEGRADED_PRIORITY },
      };
    }
  };

  const retrieveKnowledge: Stage = async (state, ctx) => {
    try {
      const results = await guardPortCall(
        'knowledge',
        (signal) =>
          knowledge.retrieve(
            ctx.text,
            options.knowledgeTopK,
            state.category ?? undefined,
            options.minSimilarity,
            signal,
          ),
        guard(options.knowledge),
      );
      const snippets = results
        .filter((snippet) => snippet.score >= options.minSimilarity)
        .sort((a, b) => b.score - a.score)
        .slice(0, options.knowledgeTopK);
      logger.debug('Knowledge retrieved', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        count: snippets.length,
        topScore: snippets[0]?.score,
      });
      return { kind: 'next', state: { ...state, knowledgeSnippets: snippets } };
    } catch (error) {
      logger.error('Knowledge lookup failed, continuing without snippets', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        error: describeError(error),
      });
      return { kind: 'next', state: { ...state, knowledgeSnippets: [] } };
    }
  };

  const checkEscalation: Stage = (state, ctx) => {
    const decision = decideEscalation(
      state.priorityScore,
      state.sentiment ?? 'Neutral',
      ctx.requesterFlags?.attemptCount ?? 1,
      ctx.text,
      options.escalationKeywords,
    );
    const next: WorkflowState = decision.escalate
      ? {
          ...state,
          escalate: true,
          escalationReason:
            decision.reason !== null && decision.reason !== ''
              ? decision.reason
              : MANUAL_ESCALATION_REASON,
        }
      : { ...state, escalate: false, escalationReason: null };

    if (next.escalate) {
      logger.warn('Request flagged for escalation', {
        component: 'workflow',
        conversationId: ctx.conversationId,
        reason: next.escalationReason,
      });
    }
    return Promise.resolve({ kind: 'route', target: resolveRoute(next), state: next });
  };

  const specialist =
    (route: SpecialistRoute): Stage =>
    async (state, ctx) => {
      const category = SPECIALIST_CATEGORY[route];
      try {
        const responseText = await guardPortCall(
          `responder.${route}`,
          (signal) => responder.generate(category, buildResponseContext(state, ctx), signal),
          guard(options.responder),
        );
        return { kind: 'done', state: { ...state, responseText, action: 'complete' } };
      } catch (error) {
        logger.error('Response generation failed, sending canned apology', {
          component: 'workflow',
          conversationId: ctx.conversationId,
          route,
          error: describeError(error),
        });
        return { kind: 'done', state: responderFailureState(state, category) };
      }
    };

  const escalate: Stage = (state, ctx) =>
    Promise.resolve({
      kind: 'done',
      state: {
        ...state,
        responseText: buildEscalationMessage(state.sentiment, ctx.conversationId),
        action: 'escalate',
      },
    });

  return {
    classify,
    sentiment,
    retrieve_knowledge: retrieveKnowledge,
    check_escalation: checkEscalation,
    recruitment: specialist('recruitment'),
    payroll: specialist('payroll'),
    benefits: specialist('benefits'),
    policy: specialist('policy'),
    leave_management: specialist('leave_management'),
    performance: specialist('performance'),
    general: specialist('general'),
    escalate,
  };
}
