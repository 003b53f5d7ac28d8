import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for HR Triage. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Adapt pino's `(obj, msg)` call order to the `(msg, context)` order used across the codebase. */
function wrap(instance: PinoLogger): Logger {
  const emit = (level: LogLevel) => (msg: string, context?: LogContext): void => {
    if (context) {
      instance[level](context, msg);
    } else {
      instance[level](msg);
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'hr-triage',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'secret',
        'secretKey',
        '*.apiKey',
        '*.secretKey',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
