// Support: request processing, conversation history and feedback
export type {
  Conversation,
  ConversationRepository,
  ConversationStatus,
  Feedback,
  ProcessQueryInput,
  Requester,
  RequesterRepository,
  SaveConversationInput,
  SubmitFeedbackInput,
  SupportService,
} from './types.js';
export { createSupportService, DEFAULT_USER_ID, generateConversationId } from './support-service.js';
export type { SupportServiceDeps } from './support-service.js';
