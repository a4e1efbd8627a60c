/**
 * Webhook Ingestor
 * Verifies a delivery against the raw bytes, records its receipt once per
 * (topic, event id) and translates the topic into inbound jobs. The sender
 * only ever learns accepted or rejected.
 */

import crypto from 'crypto';
import { z } from 'zod';
import {
  createLogger,
  err,
  isEntityType,
  normalizeRemoteRef,
  ok,
  systemClock,
  verifyWebhookSignature,
  WEBHOOK_HEADERS,
  type Clock,
  type EntityType,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import type { SyncEngineEventBus } from '../events.js';
import type { IdentityMap } from '../identity/IdentityMap.js';
import type { SyncJobQueue } from '../queue/SyncJobQueue.js';
import type { EntityFields, JsonValue, NewSyncJob, WebhookEventStore } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface AcceptedWebhook {
  status: 'accepted';
  topic: string;
  eventId: string;
  /** True when the delivery was already recorded and nothing was enqueued */
  duplicate: boolean;
  jobIds: string[];
}

export interface RejectedWebhook {
  status: 'rejected';
  reason: 'unauthorized';
  message: string;
}

export interface WebhookIngestorOptions {
  secret: string;
  store: WebhookEventStore;
  queue: SyncJobQueue;
  identity: IdentityMap;
  events?: SyncEngineEventBus;
  clock?: Clock;
  logger?: Logger;
  /** Unprocessed receipts older than this may be taken over by a redelivery */
  reclaimAfterMs?: number;
  priority?: number;
}

// ============================================================================
// Body schema
// ============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const webhookBodySchema = z.record(jsonValueSchema);

type WebhookBody = z.infer<typeof webhookBodySchema>;

const UPDATE_ACTIONS = new Set(['update', 'updated', 'paid', 'cancelled', 'fulfilled', 'edited']);

const DEFAULT_RECLAIM_AFTER_MS = 5 * 60 * 1000;
const DEFAULT_WEBHOOK_PRIORITY = 10;

// ============================================================================
// Ingestor
// ============================================================================

export class WebhookIngestor {
  private readonly options: WebhookIngestorOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly reclaimAfterMs: number;
  private readonly priority: number;

  constructor(options: WebhookIngestorOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('webhook-ingestor');
    this.reclaimAfterMs = options.reclaimAfterMs ?? DEFAULT_RECLAIM_AFTER_MS;
    this.priority = options.priority ?? DEFAULT_WEBHOOK_PRIORITY;
  }

  async receive(rawBody: string | Buffer, headers: WebhookHeaders): Promise<Result<AcceptedWebhook, RejectedWebhook>> {
    const topic = readHeader(headers, WEBHOOK_HEADERS.topic) ?? '';
    const text = typeof rawBody === 'string' ? rawBody : rawBody.toString('utf8');
    const now = new Date(this.clock.now());

    const verification = verifyWebhookSignature(rawBody, readHeader(headers, WEBHOOK_HEADERS.signature), this.options.secret);
    if (!verification.valid) {
      const eventId = headerEventId(headers) ?? fallbackEventId(topic, text);
      await this.options.store.recordRejected({ eventId, topic, receivedAt: now, signatureValid: false, processed: false });
      this.logger.warn({ topic, eventId, error: verification.error }, 'Webhook rejected');
      return err({ status: 'rejected', reason: 'unauthorized', message: verification.error ?? 'Invalid signature' });
    }

    const body = parseBody(text);
    const eventId = headerEventId(headers) ?? readString(body?.event_id) ?? fallbackEventId(topic, text);

    const recorded = await this.options.store.recordReceipt({
      eventId,
      topic,
      receivedAt: now,
      signatureValid: true,
      processed: false,
    });
    if (!recorded.inserted) {
      const existing = recorded.existing;
      const inFlight = now.getTime() - existing.receivedAt.getTime() < this.reclaimAfterMs;
      if (existing.processed || inFlight) {
        return ok(this.accepted(topic, eventId, true, []));
      }
      const reclaimed = await this.options.store.reclaim(topic, eventId, existing.receivedAt, now);
      if (!reclaimed) {
        return ok(this.accepted(topic, eventId, true, []));
      }
      this.logger.info({ topic, eventId }, 'Reclaimed stalled webhook receipt');
    }

    let jobIds: string[] = [];
    if (body) {
      jobIds = await this.enqueueFor(topic, body);
    } else {
      this.logger.warn({ topic, eventId }, 'Malformed webhook body; accepted without jobs');
    }

    await this.options.store.markProcessed(topic, eventId);
    return ok(this.accepted(topic, eventId, false, jobIds));
  }

  // ============================================================================
  // Topic translation
  // ============================================================================

  private async enqueueFor(topic: string, body: WebhookBody): Promise<string[]> {
    const parsed = parseTopic(topic);
    if (!parsed) {
      this.logger.debug({ topic }, 'Unhandled webhook topic');
      return [];
    }
    const { entityType, action } = parsed;

    const remoteRef = remoteRefOf(entityType, body);
    if (!remoteRef) {
      this.logger.warn({ topic }, 'Webhook body carries no remote reference');
      return [];
    }

    const jobIds: string[] = [];
    const primary = await this.jobFor(entityType, action, remoteRef, payloadOf(body));
    if (primary) {
      jobIds.push(primary);
    }

    const variants = body.variants;
    if (entityType === 'product' && UPDATE_ACTIONS.has(action) && Array.isArray(variants)) {
      for (const variant of variants) {
        if (!isJsonObject(variant)) {
          continue;
        }
        const variantRef = remoteRefOf('variant', variant);
        const variantJob = variantRef ? await this.jobFor('variant', action, variantRef, payloadOf(variant)) : null;
        if (variantJob) {
          jobIds.push(variantJob);
        }
      }
    }
    return jobIds;
  }

  private async jobFor(
    entityType: EntityType,
    action: string,
    remoteRef: string,
    payload: EntityFields | null
  ): Promise<string | null> {
    const mapping = await this.options.identity.findByRemote(entityType, remoteRef);
    if (mapping && mapping.archivedAt !== null) {
      this.logger.debug({ entityType, remoteRef }, 'Mapping archived; webhook discarded');
      return null;
    }

    let job: NewSyncJob;
    if (action === 'create') {
      job = { entityType, remoteRef, operation: 'import', direction: 'inbound', payload };
    } else if (UPDATE_ACTIONS.has(action)) {
      job = mapping
        ? { entityType, localRef: mapping.localRef, remoteRef, operation: 'update', direction: 'inbound', payload }
        : { entityType, remoteRef, operation: 'import', direction: 'inbound', payload };
    } else if (action === 'delete') {
      if (!mapping) {
        return null;
      }
      job = { entityType, localRef: mapping.localRef, remoteRef, operation: 'delete', direction: 'inbound' };
    } else {
      return null;
    }

    const result = await this.options.queue.enqueue({ ...job, priority: this.priority });
    return result.jobId;
  }

  private accepted(topic: string, eventId: string, duplicate: boolean, jobIds: string[]): AcceptedWebhook {
    this.options.events?.emitWebhookReceived({ topic, eventId, duplicate, jobIds });
    if (duplicate) {
      this.logger.debug({ topic, eventId }, 'Duplicate webhook delivery');
    }
    return { status: 'accepted', topic, eventId, duplicate, jobIds };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function readHeader(headers: WebhookHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) {
      continue;
    }
    const first = Array.isArray(value) ? value[0] : value;
    if (first) {
      return first;
    }
  }
  return undefined;
}

function headerEventId(headers: WebhookHeaders): string | undefined {
  return readHeader(headers, WEBHOOK_HEADERS.eventId) ?? readHeader(headers, WEBHOOK_HEADERS.webhookId);
}

function fallbackEventId(topic: string, body: string): string {
  return crypto.createHash('sha256').update(topic).update('\n').update(body).digest('hex');
}

function parseBody(text: string): WebhookBody | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = webhookBodySchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * `products/update` → product/update. Resource names may be singular or plural.
 */
export function parseTopic(topic: string): { entityType: EntityType; action: string } | null {
  const [resource, action] = topic.toLowerCase().split('/');
  if (!resource || !action) {
    return null;
  }
  const singular = resource.endsWith('s') ? resource.slice(0, -1) : resource;
  const candidate = singular === 'product_variant' ? 'variant' : singular;
  return isEntityType(candidate) ? { entityType: candidate, action } : null;
}

export function remoteRefOf(entityType: EntityType, body: { [key: string]: JsonValue }): string | null {
  const explicit = readString(body.remote_ref) ?? readString(body.admin_graphql_api_id);
  if (explicit) {
    return explicit;
  }
  const id = body.id;
  if (typeof id === 'number' || (typeof id === 'string' && /^\d+$/.test(id))) {
    return normalizeRemoteRef(entityType, id);
  }
  return null;
}

function payloadOf(body: { [key: string]: JsonValue }): EntityFields | null {
  const fields = body.fields;
  return fields !== undefined && isJsonObject(fields) ? fields : null;
}
