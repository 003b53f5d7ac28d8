// Request workflow: policy, stages, engine and ports
export type {
  EscalationDecision,
  HistoryTurn,
  KnowledgeSnippet,
  RequestContext,
  RequesterFlags,
  RouteTarget,
  SpecialistRoute,
  Stage,
  StageName,
  StageOutcome,
  WorkflowAction,
  WorkflowResult,
  WorkflowState,
} from './types.js';
export { SPECIALIST_ROUTES } from './types.js';

export {
  DEFAULT_ESCALATION_KEYWORDS,
  decideEscalation,
  parseCategoryLabel,
  parseSentimentLabel,
  scorePriority,
} from './policy.js';
export { ROUTE_TABLE, resolveRoute } from './routing.js';
export { defaultSleep, guardPortCall } from './port-guard.js';
export type { PortGuardOptions, Sleep } from './port-guard.js';

export type {
  ClassificationPort,
  KnowledgeLookupPort,
  ResponseContext,
  ResponseGenerationPort,
} from './ports.js';
export { createLlmClassifier, createLlmResponder } from './llm-ports.js';
export type { LlmPortOptions } from './llm-ports.js';

export { CANNED_APOLOGIES, buildEscalationMessage } from './responders.js';
export { createStages, DEGRADED_PRIORITY } from './stages.js';
export type { StageDeps, WorkflowOptions } from './stages.js';
export { createWorkflowEngine, initialState } from './engine.js';
export type { WorkflowEngine, WorkflowEngineDeps } from './engine.js';
