import {
  pgTable,
  pgEnum,
  varchar,
  text,
  timestamp,
  integer,
  bigserial,
  boolean,
  jsonb,
  primaryKey,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { EntityFields } from '@commercesync/sync-engine';

// Enums
export const entityTypeEnum = pgEnum('entity_type', ['product', 'variant', 'inventory_level', 'order', 'customer']);
export const syncOperationEnum = pgEnum('sync_operation', ['create', 'update', 'delete', 'import']);
export const syncDirectionEnum = pgEnum('sync_direction', ['inbound', 'outbound']);
export const jobStatusEnum = pgEnum('job_status', ['pending', 'processing', 'done', 'failed']);
export const errorKindEnum = pgEnum('error_kind', [
  'validation',
  'auth',
  'throttle',
  'transient',
  'conflict',
  'bulk_timeout',
]);

// Sync jobs
export const syncJobs = pgTable(
  'sync_jobs',
  {
    seq: bigserial('seq', { mode: 'number' }).primaryKey(),
    entityType: entityTypeEnum('entity_type').notNull(),
    localRef: varchar('local_ref', { length: 255 }),
    remoteRef: varchar('remote_ref', { length: 255 }),
    operation: syncOperationEnum('operation').notNull(),
    direction: syncDirectionEnum('direction').notNull(),
    priority: integer('priority').notNull(),
    status: jobStatusEnum('status').notNull().default('pending'),
    retryCount: integer('retry_count').notNull().default(0),
    maxRetries: integer('max_retries').notNull(),
    lastError: text('last_error'),
    errorKind: errorKindEnum('error_kind'),
    payload: jsonb('payload').$type<EntityFields>(),
    coalescingKey: text('coalescing_key').notNull(),
    runAfter: timestamp('run_after', { withTimezone: true }).notNull(),
    claimedBy: varchar('claimed_by', { length: 255 }),
    claimedAt: timestamp('claimed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    statusRunAfterIdx: index('idx_sync_jobs_status_run_after').on(table.status, table.runAfter),
    pendingKeyIdx: index('idx_sync_jobs_pending_key').on(table.coalescingKey).where(sql`status = 'pending'`),
  })
);

// Identity mappings; uniqueness holds among rows that are not archived
export const identityMappings = pgTable(
  'identity_mappings',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    entityType: entityTypeEnum('entity_type').notNull(),
    localRef: varchar('local_ref', { length: 255 }).notNull(),
    remoteRef: varchar('remote_ref', { length: 255 }).notNull(),
    lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }).notNull(),
    contentHash: varchar('content_hash', { length: 64 }),
    archivedAt: timestamp('archived_at', { withTimezone: true }),
  },
  (table) => ({
    activeLocalIdx: uniqueIndex('idx_identity_active_local')
      .on(table.entityType, table.localRef)
      .where(sql`archived_at IS NULL`),
    activeRemoteIdx: uniqueIndex('idx_identity_active_remote')
      .on(table.entityType, table.remoteRef)
      .where(sql`archived_at IS NULL`),
  })
);

// Create leases held while a remote create is in flight
export const identityLocks = pgTable(
  'identity_locks',
  {
    entityType: entityTypeEnum('entity_type').notNull(),
    localRef: varchar('local_ref', { length: 255 }).notNull(),
    holder: varchar('holder', { length: 255 }).notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.entityType, table.localRef] }),
  })
);

// Webhook receipts; rejected deliveries never take part in deduplication
export const webhookEvents = pgTable(
  'webhook_events',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    eventId: varchar('event_id', { length: 255 }).notNull(),
    topic: varchar('topic', { length: 255 }).notNull(),
    receivedAt: timestamp('received_at', { withTimezone: true }).notNull(),
    signatureValid: boolean('signature_valid').notNull(),
    processed: boolean('processed').notNull().default(false),
  },
  (table) => ({
    validReceiptIdx: uniqueIndex('idx_webhook_events_valid')
      .on(table.topic, table.eventId)
      .where(sql`signature_valid`),
    receivedAtIdx: index('idx_webhook_events_received_at').on(table.receivedAt),
  })
);

// Local system of record
export const localRecords = pgTable(
  'local_records',
  {
    entityType: entityTypeEnum('entity_type').notNull(),
    localRef: varchar('local_ref', { length: 255 }).notNull(),
    fields: jsonb('fields').$type<EntityFields>().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.entityType, table.localRef] }),
    updatedAtIdx: index('idx_local_records_updated_at').on(table.entityType, table.updatedAt),
  })
);

// Type exports
export type SyncJobRow = typeof syncJobs.$inferSelect;
export type NewSyncJobRow = typeof syncJobs.$inferInsert;
export type IdentityMappingRow = typeof identityMappings.$inferSelect;
export type IdentityLockRow = typeof identityLocks.$inferSelect;
export type WebhookEventRow = typeof webhookEvents.$inferSelect;
export type LocalRecordRow = typeof localRecords.$inferSelect;
