/**
 * Configuration loader: merges an optional JSON config file with environment
 * variables, resolves `${VAR}` placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { TriageError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { AppConfig } from './schema.js';
import { appConfigSchema } from './schema.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error raised when configuration loading or validation fails.
 */
export class ConfigError extends TriageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the form `${VAR_NAME}` with the value of
 * the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Env Mapping ────────────────────────────────────────────────

/** Environment variable → dotted config path. */
const ENV_MAPPING: readonly (readonly [string, string])[] = [
  ['PORT', 'server.port'],
  ['HOST', 'server.host'],
  ['CORS_ORIGIN', 'server.corsOrigin'],
  ['RATE_LIMIT_MAX', 'server.rateLimitMax'],
  ['DATABASE_PATH', 'database.path'],
  ['LOG_LEVEL', 'logging.level'],
  ['LLM_PROVIDER', 'llm.provider'],
  ['LLM_MODEL', 'llm.model'],
  ['LLM_TEMPERATURE', 'llm.temperature'],
  ['LLM_MAX_TOKENS', 'llm.maxOutputTokens'],
  ['LLM_API_KEY_ENV_VAR', 'llm.apiKeyEnvVar'],
  ['LLM_BASE_URL', 'llm.baseUrl'],
  ['EMBEDDINGS_MODEL', 'embeddings.model'],
  ['EMBEDDINGS_API_KEY_ENV_VAR', 'embeddings.apiKeyEnvVar'],
  ['EMBEDDINGS_BASE_URL', 'embeddings.baseUrl'],
  ['FAQ_PATH', 'knowledge.faqPath'],
  ['KNOWLEDGE_TOP_K', 'workflow.knowledgeTopK'],
  ['KNOWLEDGE_MIN_SIMILARITY', 'workflow.minSimilarity'],
  ['WEBHOOK_TIMEOUT_MS', 'webhooks.timeoutMs'],
  ['WEBHOOK_MAX_ATTEMPTS', 'webhooks.maxAttempts'],
  ['WEBHOOK_BACKOFF_BASE_MS', 'webhooks.backoffBaseMs'],
  ['WEBHOOK_CONCURRENCY', 'webhooks.concurrency'],
  ['WEBHOOK_MAX_QUEUE_SIZE', 'webhooks.maxQueueSize'],
  ['WEBHOOK_PRODUCT_NAME', 'webhooks.productName'],
  ['REDIS_URL', 'webhooks.redisUrl'],
];

/**
 * Builds a partial config object from the environment variables that are set.
 * Empty strings count as unset.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  for (const [name, path] of ENV_MAPPING) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    setPath(config, path.split('.'), value);
  }
  return config;
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  target[head] = child;
  setPath(child, rest, value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge where `override` wins. Arrays are replaced, not concatenated. */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = mergeConfig(base[key], value);
  }
  return result;
}

// ─── File Loading ───────────────────────────────────────────────

async function readConfigFile(
  filePath: string,
  env: Env,
): Promise<Result<unknown, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: nodeError.code,
        errorMessage: nodeError.message,
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  try {
    return ok(resolveEnvVars(parsed, env));
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}

// ─── Configuration Loader ───────────────────────────────────────

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: Env;
  /** JSON config file. Defaults to `env.HR_TRIAGE_CONFIG` when set. */
  filePath?: string;
}

/**
 * Loads and validates the service configuration.
 *
 * 1. Reads the JSON file (if any) and resolves `${VAR}` placeholders
 * 2. Overlays values from well-known environment variables
 * 3. Validates against the Zod schema, filling defaults
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<Result<AppConfig, ConfigError>> {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? (env['HR_TRIAGE_CONFIG'] || undefined);

  let base: unknown = {};
  if (filePath !== undefined) {
    const fileResult = await readConfigFile(filePath, env);
    if (!fileResult.ok) return fileResult;
    base = fileResult.value;
  }

  const merged = mergeConfig(base, configFromEnv(env));
  const validation = appConfigSchema.safeParse(merged);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigError('Configuration validation failed', {
        filePath,
        issues,
      }),
    );
  }

  return ok(validation.data);
}
