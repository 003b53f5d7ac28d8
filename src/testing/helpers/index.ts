/**
 * Test helpers for end-to-end testing: a scripted LLM provider, a webhook
 * receiver and the full application wired around them.
 */
export * from './test-llm-provider.js';
export * from './test-server.js';
export * from './webhook-receiver.js';
