import type { Logger } from '@/observability/logger.js';
import type { SupportService } from '@/support/types.js';
import type { SubscriptionService } from '@/webhooks/subscription-service.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Health ─────────────────────────────────────────────────────

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  version: string;
  database: boolean;
  timestamp: string;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  supportService: SupportService;
  subscriptionService: SubscriptionService;
  /** Reported by `GET /health`. */
  version: string;
  /** True when the database answers a trivial query. */
  isDatabaseReady: () => boolean;
  logger: Logger;
}
