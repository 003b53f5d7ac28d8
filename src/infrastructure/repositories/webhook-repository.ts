/**
 * Webhook repository: subscriptions and their delivery log.
 */
import { nanoid } from 'nanoid';
import type { SqliteDatabase } from '@/infrastructure/database.js';
import { asDeliveryId, asSubscriptionId } from '@/core/types.js';
import type { SubscriptionId } from '@/core/types.js';
import { isWebhookEventType } from '@/webhooks/types.js';
import type {
  CreateSubscriptionInput,
  DeliverableEventType,
  DeliveryAttempt,
  DeliveryStatus,
  ListSubscriptionsParams,
  Page,
  PageParams,
  RecordDeliveryInput,
  UpdateSubscriptionInput,
  WebhookEventType,
  WebhookPayload,
  WebhookRepository,
  WebhookSubscription,
} from '@/webhooks/types.js';

const MAX_RESPONSE_BODY = 1000;

// ─── Rows ───────────────────────────────────────────────────────

interface WebhookRow {
  id: string;
  url: string;
  events: string;
  secret_key: string;
  is_active: number;
  delivery_count: number;
  failure_count: number;
  last_delivery_at: string | null;
  last_failure_at: string | null;
  created_at: string;
  updated_at: string;
}

interface DeliveryRow {
  id: string;
  webhook_id: string;
  event_type: DeliverableEventType;
  payload: string;
  status: DeliveryStatus;
  status_code: number | null;
  response_body: string | null;
  error_message: string | null;
  attempt_count: number;
  created_at: string;
  delivered_at: string | null;
}

// ─── Mappers ────────────────────────────────────────────────────

function parseEvents(raw: string): WebhookEventType[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is WebhookEventType =>
    typeof value === 'string' && isWebhookEventType(value),
  );
}

function toSubscriptionModel(row: WebhookRow): WebhookSubscription {
  return {
    id: asSubscriptionId(row.id),
    url: row.url,
    events: parseEvents(row.events),
    secretKey: row.secret_key,
    isActive: row.is_active === 1,
    deliveryCount: row.delivery_count,
    failureCount: row.failure_count,
    lastDeliveryAt: row.last_delivery_at ? new Date(row.last_delivery_at) : undefined,
    lastFailureAt: row.last_failure_at ? new Date(row.last_failure_at) : undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toDeliveryModel(row: DeliveryRow): DeliveryAttempt {
  return {
    id: asDeliveryId(row.id),
    webhookId: asSubscriptionId(row.webhook_id),
    eventType: row.event_type,
    payload: JSON.parse(row.payload) as WebhookPayload,
    status: row.status,
    statusCode: row.status_code ?? undefined,
    responseBody: row.response_body ?? undefined,
    errorMessage: row.error_message ?? undefined,
    attemptCount: row.attempt_count,
    createdAt: new Date(row.created_at),
    deliveredAt: row.delivered_at ? new Date(row.delivered_at) : undefined,
  };
}

// ─── Repository Factory ─────────────────────────────────────────

/**
 * Create a WebhookRepository backed by SQLite.
 * `now` is injectable so tests can order rows deterministically.
 */
export function createWebhookRepository(
  db: SqliteDatabase,
  now: () => Date = () => new Date(),
): WebhookRepository {
  const selectById = db.prepare('SELECT * FROM webhooks WHERE id = ?');

  const insertDelivery = db.prepare(`
    INSERT INTO webhook_deliveries (
      id, webhook_id, event_type, payload, status, status_code,
      response_body, error_message, attempt_count, created_at, delivered_at
    ) VALUES (
      @id, @webhook_id, @event_type, @payload, @status, @status_code,
      @response_body, @error_message, @attempt_count, @created_at, @delivered_at
    )
  `);

  const bumpSuccess = db.prepare(`
    UPDATE webhooks
    SET delivery_count = delivery_count + 1, last_delivery_at = @at, updated_at = @at
    WHERE id = @id
  `);

  const bumpFailure = db.prepare(`
    UPDATE webhooks
    SET delivery_count = delivery_count + 1,
        failure_count = failure_count + 1,
        last_failure_at = @at,
        updated_at = @at
    WHERE id = @id
  `);

  function findRow(id: string): WebhookRow | undefined {
    return selectById.get(id) as WebhookRow | undefined;
  }

  const record = db.transaction((input: RecordDeliveryInput): DeliveryRow => {
    const at = now().toISOString();
    const { result } = input;

    (result.success ? bumpSuccess : bumpFailure).run({ id: input.webhookId, at });

    const row: DeliveryRow = {
      id: nanoid(),
      webhook_id: input.webhookId,
      event_type: input.payload.event,
      payload: JSON.stringify(input.payload),
      status: result.success ? 'success' : 'failed',
      status_code: result.statusCode,
      response_body: result.responseBody?.slice(0, MAX_RESPONSE_BODY) ?? null,
      error_message: result.error,
      attempt_count: result.attempts,
      created_at: at,
      delivered_at: result.success ? at : null,
    };
    insertDelivery.run(row);
    return row;
  });

  return {
    async create(input: CreateSubscriptionInput): Promise<WebhookSubscription> {
      const id = nanoid();
      const at = now().toISOString();
      db.prepare(`
        INSERT INTO webhooks (id, url, events, secret_key, is_active, created_at, updated_at)
        VALUES (?, ?, ?, ?, 1, ?, ?)
      `).run(id, input.url, JSON.stringify(input.events), input.secretKey, at, at);

      const row = findRow(id);
      if (!row) throw new Error(`Webhook ${id} vanished after insert`);
      return toSubscriptionModel(row);
    },

    async findById(id: SubscriptionId): Promise<WebhookSubscription | null> {
      const row = findRow(id);
      return row ? toSubscriptionModel(row) : null;
    },

    async update(
      id: SubscriptionId,
      input: UpdateSubscriptionInput,
    ): Promise<WebhookSubscription | null> {
      const existing = findRow(id);
      if (!existing) return null;

      db.prepare(`
        UPDATE webhooks SET url = ?, events = ?, is_active = ?, updated_at = ? WHERE id = ?
      `).run(
        input.url ?? existing.url,
        input.events !== undefined ? JSON.stringify(input.events) : existing.events,
        input.isActive !== undefined ? Number(input.isActive) : existing.is_active,
        now().toISOString(),
        id,
      );

      const row = findRow(id);
      return row ? toSubscriptionModel(row) : null;
    },

    async delete(id: SubscriptionId): Promise<boolean> {
      const info = db.prepare('DELETE FROM webhooks WHERE id = ?').run(id);
      return info.changes > 0;
    },

    async list(params: ListSubscriptionsParams): Promise<Page<WebhookSubscription>> {
      const where = params.isActive === undefined ? '' : 'WHERE is_active = ?';
      const filter = params.isActive === undefined ? [] : [Number(params.isActive)];

      const rows = db
        .prepare(
          `SELECT * FROM webhooks ${where}
           ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        )
        .all(...filter, params.limit, params.skip) as WebhookRow[];
      const count = db
        .prepare(`SELECT COUNT(*) AS total FROM webhooks ${where}`)
        .get(...filter) as { total: number };

      return { items: rows.map(toSubscriptionModel), total: count.total };
    },

    async findActiveForEvent(event: WebhookEventType): Promise<WebhookSubscription[]> {
      const rows = db
        .prepare(
          `SELECT webhooks.* FROM webhooks, json_each(webhooks.events)
           WHERE webhooks.is_active = 1 AND json_each.value = ?
           ORDER BY webhooks.created_at, webhooks.rowid`,
        )
        .all(event) as WebhookRow[];
      return rows.map(toSubscriptionModel);
    },

    async recordDelivery(input: RecordDeliveryInput): Promise<DeliveryAttempt> {
      return toDeliveryModel(record(input));
    },

    async listDeliveries(id: SubscriptionId, params: PageParams): Promise<Page<DeliveryAttempt>> {
      const rows = db
        .prepare(
          `SELECT * FROM webhook_deliveries WHERE webhook_id = ?
           ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        )
        .all(id, params.limit, params.skip) as DeliveryRow[];
      const count = db
        .prepare('SELECT COUNT(*) AS total FROM webhook_deliveries WHERE webhook_id = ?')
        .get(id) as { total: number };

      return { items: rows.map(toDeliveryModel), total: count.total };
    },
  };
}
