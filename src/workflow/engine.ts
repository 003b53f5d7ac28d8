/**
 * Workflow engine: drives one request through the fixed stage sequence
 * `classify → sentiment → retrieve_knowledge → check_escalation → route → done`
 * and returns a frozen result. `run` never rejects.
 */
import type { Logger } from '@/observability/logger.js';

import type { Sleep } from './port-guard.js';
import type { ClassificationPort, KnowledgeLookupPort, ResponseGenerationPort } from './ports.js';
import { CANNED_APOLOGIES } from './responders.js';
import type { WorkflowOptions } from './stages.js';
import { createStages, describeError, responderFailureState } from './stages.js';
import type {
  RequestContext,
  RouteTarget,
  StageName,
  WorkflowResult,
  WorkflowState,
} from './types.js';

/** Upper bound on stage transitions; the pipeline needs at most 5. */
const MAX_TRANSITIONS = 16;

const LINEAR_NEXT: Partial<Record<StageName, StageName>> = {
  classify: 'sentiment',
  sentiment: 'retrieve_knowledge',
  retrieve_knowledge: 'check_escalation',
};

export interface WorkflowEngineDeps {
  classifier: ClassificationPort;
  knowledge: KnowledgeLookupPort;
  responder: ResponseGenerationPort;
  logger: Logger;
  options: WorkflowOptions;
  /** Used for retry back-off between port attempts. */
  sleep?: Sleep;
  /** Milliseconds clock used for processing time. */
  now?: () => number;
}

export interface WorkflowEngine {
  run(context: RequestContext): Promise<WorkflowResult>;
}

export function initialState(): WorkflowState {
  return {
    category: null,
    sentiment: null,
    priorityScore: 3,
    knowledgeSnippets: [],
    escalate: false,
    escalationReason: null,
    responseText: null,
    action: 'pending',
    metadata: {},
  };
}

/**
 * Create a workflow engine. One instance per process, injected where needed.
 */
export function createWorkflowEngine(deps: WorkflowEngineDeps): WorkflowEngine {
  const logger = deps.logger.child({ component: 'workflow-engine' });
  const now = deps.now ?? Date.now;
  const stages = createStages({ ...deps, logger });

  return {
    async run(context: RequestContext): Promise<WorkflowResult> {
      const startedAt = now();
      let state: WorkflowState = {
        ...initialState(),
        metadata: {
          isVip: context.requesterFlags?.isVip ?? false,
          isRepeat: context.requesterFlags?.isRepeat ?? false,
          attemptCount: context.requesterFlags?.attemptCount ?? 1,
        },
      };
      let current: StageName | undefined = 'classify';
      let route: RouteTarget = 'general';
      const trace: StageName[] = [];

      logger.info('Workflow started', {
        component: 'workflow-engine',
        conversationId: context.conversationId,
        requesterId: context.requesterId,
      });

      for (let step = 0; current !== undefined && step < MAX_TRANSITIONS; step++) {
        const name: StageName = current;
        trace.push(name);
        try {
          const outcome = await stages[name](state, context);
          state = outcome.state;
          switch (outcome.kind) {
            case 'next':
              current = LINEAR_NEXT[name];
              break;
            case 'route':
              route = outcome.target;
              current = outcome.target;
              break;
            case 'done':
              current = undefined;
              break;
          }
        } catch (error) {
          logger.error('Stage failed unexpectedly, forcing escalation', {
            component: 'workflow-engine',
            conversationId: context.conversationId,
            stage: name,
            error: describeError(error),
          });
          state = responderFailureState(state, state.category ?? 'General');
          current = undefined;
        }
      }

      const processingTimeSeconds = Math.max(0, now() - startedAt) / 1000;
      const result = toResult(state, context, route, processingTimeSeconds, trace);

      logger.info('Workflow completed', {
        component: 'workflow-engine',
        conversationId: context.conversationId,
        category: result.category,
        route: result.route,
        escalated: result.escalated,
        processingTimeSeconds,
      });

      return result;
    },
  };
}

function toResult(
  state: WorkflowState,
  context: RequestContext,
  route: RouteTarget,
  processingTimeSeconds: number,
  trace: readonly StageName[],
): WorkflowResult {
  const category = state.category ?? 'General';
  const result: WorkflowResult = {
    conversationId: context.conversationId,
    requesterId: context.requesterId,
    category,
    sentiment: state.sentiment ?? 'Neutral',
    priorityScore: state.priorityScore,
    escalated: state.escalate,
    ...(state.escalate && state.escalationReason !== null
      ? { escalationReason: state.escalationReason }
      : {}),
    responseText: state.responseText ?? CANNED_APOLOGIES[category],
    knowledgeSnippets: Object.freeze([...state.knowledgeSnippets]),
    route,
    processingTimeSeconds,
    metadata: Object.freeze({ ...state.metadata, stages: [...trace] }),
  };
  return Object.freeze(result);
}
