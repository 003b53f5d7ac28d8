/**
 * HMAC-SHA256 signing of webhook payloads.
 *
 * The signature covers the canonical JSON of the payload (keys sorted at every
 * depth, no whitespace), and that same string is the request body, so a
 * receiver can verify either the raw body or its parsed form.
 */
import { createHmac, randomBytes, timingSafeEqual } from 'crypto';
import type { WebhookPayload } from './types.js';

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(child);
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted recursively and no insignificant whitespace. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/** Hex HMAC-SHA256 of a raw body. */
export function signBody(body: string | Buffer, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/** Hex HMAC-SHA256 of the payload's canonical JSON. */
export function signPayload(payload: WebhookPayload | Record<string, unknown>, secret: string): string {
  return signBody(canonicalJson(payload), secret);
}

function safeEqual(received: string, expected: string): boolean {
  // Accept the common `sha256=` prefix
  const value = received.startsWith('sha256=') ? received.slice(7) : received;
  const a = Buffer.from(value, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/** Verify a signature against the exact bytes received. */
export function verifySignature(body: string | Buffer, signature: string, secret: string): boolean {
  return safeEqual(signature, signBody(body, secret));
}

/** Verify a signature against an already-parsed payload. */
export function verifyPayloadSignature(
  payload: WebhookPayload | Record<string, unknown>,
  signature: string,
  secret: string,
): boolean {
  return safeEqual(signature, signPayload(payload, secret));
}

/** 32 random bytes, base64url encoded. */
export function generateSecretKey(): string {
  return randomBytes(32).toString('base64url');
}
