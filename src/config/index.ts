// ─── Schemas & Types ────────────────────────────────────────────
export type {
  AppConfig,
  EmbeddingsConfig,
  LLMProviderConfig,
  PortGuardConfig,
  WebhookConfig,
  WorkflowConfig,
} from './schema.js';
export {
  appConfigSchema,
  embeddingsConfigSchema,
  llmProviderConfigSchema,
  portGuardConfigSchema,
  webhookConfigSchema,
  workflowConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export type { LoadConfigOptions } from './loader.js';
export { ConfigError, configFromEnv, loadConfig, mergeConfig, resolveEnvVars } from './loader.js';
