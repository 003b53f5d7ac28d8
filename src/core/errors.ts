/**
 * Base error class for all HR Triage errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class TriageError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'TriageError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input validation fails at the API or service boundary. */
export class ValidationError extends TriageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a referenced resource does not exist. */
export class NotFoundError extends TriageError {
  constructor(resource: string, id: string) {
    super({
      message: `${resource} "${id}" not found`,
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { resource, id },
    });
    this.name = 'NotFoundError';
  }
}

/** Thrown when an LLM or embedding provider call fails. */
export class ProviderError extends TriageError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `LLM provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Thrown when an external port call does not settle within its deadline. */
export class PortTimeoutError extends TriageError {
  constructor(port: string, timeoutMs: number) {
    super({
      message: `Port "${port}" timed out after ${timeoutMs.toString()}ms`,
      code: 'PORT_TIMEOUT',
      statusCode: 504,
      context: { port, timeoutMs },
    });
    this.name = 'PortTimeoutError';
  }
}

/** Thrown when the webhook delivery queue refuses new jobs. */
export class QueueFullError extends TriageError {
  constructor(queue: string, limit: number) {
    super({
      message: `Queue "${queue}" is full (${limit.toString()} pending jobs)`,
      code: 'QUEUE_FULL',
      statusCode: 503,
      context: { queue, limit },
    });
    this.name = 'QueueFullError';
  }
}
