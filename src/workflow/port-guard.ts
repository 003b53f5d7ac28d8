/**
 * Timeout and bounded retry around calls to external ports
 * (classification, knowledge lookup, response generation).
 */
import { PortTimeoutError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface PortGuardOptions {
  timeoutMs: number;
  maxAttempts: number;
  /** Delay before retry `n` is `retryDelayMs * n`. */
  retryDelayMs: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Runs `fn` with a per-attempt deadline. The signal handed to `fn` aborts when
 * the deadline passes. After the last failed attempt the last error is thrown.
 */
export async function guardPortCall<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: PortGuardOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await withDeadline(label, fn, options.timeoutMs);
    } catch (error) {
      lastError = error;
      options.logger?.warn(`Port call "${label}" failed`, {
        component: 'port-guard',
        port: label,
        attempt,
        maxAttempts,
        error: error instanceof Error ? error.message : String(error),
      });
      if (attempt < maxAttempts) {
        await sleep(options.retryDelayMs * attempt);
      }
    }
  }

  throw lastError;
}

async function withDeadline<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new PortTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
