// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  conversationId?: string;
  subscriptionId?: string;
  component: string;
  [key: string]: unknown;
}
