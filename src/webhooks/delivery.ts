/**
 * Signed HTTP delivery of one payload to one subscriber, with bounded retry.
 *
 * 2xx is success. 4xx and a URL that does not parse are permanent failures.
 * 5xx, timeouts and network errors are retried with exponential backoff
 * until `maxAttempts`.
 */
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import { defaultSleep } from '@/workflow/port-guard.js';
import type { Sleep } from '@/workflow/port-guard.js';
import { canonicalJson, signBody } from './signing.js';
import type { DeliveryResult, WebhookPayload, WebhookSubscription } from './types.js';

const defaultLogger = createLogger({ name: 'webhook-delivery' });

const MAX_RESPONSE_BODY = 1000;
const MAX_ERROR_BODY = 200;

export interface DeliveryOptions {
  timeoutMs: number;
  maxAttempts: number;
  /** Delay before retry `n` is `backoffBaseMs * 2^(n-1)`. */
  backoffBaseMs: number;
  /** Product name used in the `User-Agent` header. */
  productName: string;
  sleep?: Sleep;
  fetch?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

export const DEFAULT_DELIVERY_OPTIONS: DeliveryOptions = {
  timeoutMs: 10_000,
  maxAttempts: 3,
  backoffBaseMs: 1_000,
  productName: 'HR-Triage',
};

/** The part of a subscription delivery needs. */
export type DeliveryTarget = Pick<WebhookSubscription, 'id' | 'url' | 'secretKey'>;

export type DeliverFn = (
  target: DeliveryTarget,
  payload: WebhookPayload,
  overrides?: Partial<DeliveryOptions>,
) => Promise<DeliveryResult>;

export function backoffDelay(backoffBaseMs: number, attempt: number): number {
  return backoffBaseMs * 2 ** (attempt - 1);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/** fetch rejects with a TypeError before any request when the URL does not parse. */
function isInvalidUrl(error: unknown): boolean {
  if (!(error instanceof TypeError)) return false;
  const { cause } = error;
  return (
    error.message.startsWith('Failed to parse URL') ||
    (cause instanceof Error && 'code' in cause && cause.code === 'ERR_INVALID_URL')
  );
}

function formatSeconds(ms: number): string {
  return String(ms / 1000);
}

/** Build the headers for one delivery. */
export function buildDeliveryHeaders(
  target: DeliveryTarget,
  body: string,
  productName: string,
  now: Date,
): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'X-Webhook-Signature': signBody(body, target.secretKey),
    'X-Webhook-Timestamp': now.toISOString(),
    'X-Webhook-ID': target.id,
    'User-Agent': `${productName}-Webhook/1.0`,
  };
}

/** Deliver `payload` to `target`, retrying transient failures. */
export async function deliverWebhook(
  target: DeliveryTarget,
  payload: WebhookPayload,
  overrides?: Partial<DeliveryOptions>,
): Promise<DeliveryResult> {
  const options = { ...DEFAULT_DELIVERY_OPTIONS, ...overrides };
  const sleep = options.sleep ?? defaultSleep;
  const doFetch = options.fetch ?? fetch;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? defaultLogger;
  const maxAttempts = Math.max(1, options.maxAttempts);

  const body = canonicalJson(payload);
  const headers = buildDeliveryHeaders(target, body, options.productName, now());
  const delays: number[] = [];

  let result: DeliveryResult = {
    success: false,
    statusCode: null,
    responseBody: null,
    error: 'No delivery attempted',
    attempts: 0,
    responseTimeMs: 0,
    delays,
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const startTime = Date.now();
    let retryable: boolean;

    try {
      const response = await doFetch(target.url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      const text = await response.text();
      const responseTimeMs = Date.now() - startTime;

      if (response.status >= 200 && response.status < 300) {
        logger.info('Webhook delivered', {
          component: 'webhook-delivery',
          subscriptionId: target.id,
          attempt,
          statusCode: response.status,
          responseTimeMs,
        });
        return {
          success: true,
          statusCode: response.status,
          responseBody: text.slice(0, MAX_RESPONSE_BODY),
          error: null,
          attempts: attempt,
          responseTimeMs,
          delays,
        };
      }

      result = {
        success: false,
        statusCode: response.status,
        responseBody: text.slice(0, MAX_RESPONSE_BODY),
        error: `HTTP ${String(response.status)}: ${text.slice(0, MAX_ERROR_BODY)}`,
        attempts: attempt,
        responseTimeMs,
        delays,
      };
      retryable = response.status < 400 || response.status >= 500;
    } catch (error) {
      const invalidUrl = isInvalidUrl(error);
      let message: string;
      if (invalidUrl) {
        message = `Invalid URL: ${target.url}`;
      } else if (isTimeout(error)) {
        message = `Timeout after ${formatSeconds(options.timeoutMs)}s`;
      } else {
        message = `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
      }
      result = {
        success: false,
        statusCode: null,
        responseBody: null,
        error: message,
        attempts: attempt,
        responseTimeMs: Date.now() - startTime,
        delays,
      };
      retryable = !invalidUrl;
    }

    logger.warn('Webhook delivery attempt failed', {
      component: 'webhook-delivery',
      subscriptionId: target.id,
      attempt,
      maxAttempts,
      error: result.error,
    });

    if (!retryable || attempt === maxAttempts) break;

    const delay = backoffDelay(options.backoffBaseMs, attempt);
    delays.push(delay);
    await sleep(delay);
  }

  return result;
}
