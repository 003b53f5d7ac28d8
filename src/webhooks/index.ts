// Types
export * from './types.js';

// Events and signing
export {
  buildPayload,
  feedbackReceivedData,
  queryCreatedData,
  queryEscalatedData,
  queryResolvedData,
} from './events.js';
export type {
  FeedbackReceivedData,
  QueryCreatedData,
  QueryEscalatedData,
  QueryResolvedData,
} from './events.js';
export {
  canonicalJson,
  generateSecretKey,
  signBody,
  signPayload,
  verifyPayloadSignature,
  verifySignature,
} from './signing.js';

// Delivery
export { DEFAULT_DELIVERY_OPTIONS, backoffDelay, buildDeliveryHeaders, deliverWebhook } from './delivery.js';
export type { DeliverFn, DeliveryOptions, DeliveryTarget } from './delivery.js';
export { createInProcessDeliveryQueue } from './delivery-queue.js';
export type { InProcessDeliveryQueueOptions } from './delivery-queue.js';
export { createBullMQDeliveryQueue, parseRedisUrl } from './bullmq-queue.js';
export type { BullMQDeliveryQueueOptions } from './bullmq-queue.js';

// Dispatcher and subscriptions
export { createWebhookDispatcher } from './dispatcher.js';
export type { WebhookDispatcherDeps } from './dispatcher.js';
export { createSubscriptionService } from './subscription-service.js';
export type {
  SubscriptionService,
  SubscriptionServiceDeps,
  UpdateSubscriptionRequest,
} from './subscription-service.js';
