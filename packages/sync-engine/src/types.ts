/**
 * Sync Engine Types
 * Jobs, identity mappings, webhook receipts and the store interfaces the
 * engine persists them through
 */

import type { EntityType, SyncErrorKind } from '@commercesync/integrations';

export type { EntityType };

// ============================================================================
// Field payloads
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Flat field set of a record as both sides exchange it */
export type EntityFields = { [field: string]: JsonValue };

// ============================================================================
// Sync Jobs
// ============================================================================

export type SyncOperation = 'create' | 'update' | 'delete' | 'import';

/** inbound: remote → local, outbound: local → remote */
export type SyncDirection = 'inbound' | 'outbound';

export type JobStatus = 'pending' | 'processing' | 'done' | 'failed';

export interface SyncJob {
  id: string;
  entityType: EntityType;
  localRef: string | null;
  remoteRef: string | null;
  operation: SyncOperation;
  direction: SyncDirection;
  /** Lower numbers are claimed first */
  priority: number;
  status: JobStatus;
  retryCount: number;
  maxRetries: number;
  lastError: string | null;
  errorKind: SyncErrorKind | null;
  /** Latest known state carried by the job, if any */
  payload: EntityFields | null;
  /** Earliest time the job may be claimed */
  runAfter: Date;
  claimedBy: string | null;
  claimedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewSyncJob {
  entityType: EntityType;
  localRef?: string | null;
  remoteRef?: string | null;
  operation: SyncOperation;
  direction: SyncDirection;
  priority?: number;
  payload?: EntityFields | null;
  maxRetries?: number;
}

export interface EnqueueResult {
  jobId: string;
  /** True when the job was merged into an equivalent pending job */
  coalesced: boolean;
}

export interface JobFailureUpdate {
  errorKind: SyncErrorKind;
  lastError: string;
  /** When a retry sweep may move the job back to pending */
  runAfter: Date;
}

export type JobStatusCounts = Record<JobStatus, number>;

/**
 * Durable job storage. Every status transition is a compare-and-swap; a
 * method that loses the race reports it instead of overwriting.
 */
export interface JobStore {
  /** Insert, or merge into a pending job with the same coalescing key */
  enqueue(job: NewSyncJob & { priority: number; maxRetries: number }, now: Date): Promise<EnqueueResult>;
  claimNext(workerId: string, now: Date): Promise<SyncJob | null>;
  complete(jobId: string, workerId: string, now: Date): Promise<boolean>;
  fail(jobId: string, workerId: string, failure: JobFailureUpdate, now: Date): Promise<boolean>;
  /** Move failed jobs whose backoff elapsed and whose budget remains back to pending */
  requeueRetryable(now: Date): Promise<string[]>;
  /** Return jobs claimed before `olderThan` and still processing to pending */
  releaseStaleClaims(olderThan: Date, now: Date): Promise<string[]>;
  /** Failed jobs that no sweep will retry */
  listTerminalFailures(limit: number): Promise<SyncJob[]>;
  /** Manual re-enqueue of a failed job with a fresh retry budget */
  retry(jobId: string, now: Date): Promise<boolean>;
  get(jobId: string): Promise<SyncJob | null>;
  countByStatus(): Promise<JobStatusCounts>;
}

// ============================================================================
// Identity Map
// ============================================================================

export interface IdentityMapping {
  entityType: EntityType;
  localRef: string;
  remoteRef: string;
  lastSyncedAt: Date;
  /** Fingerprint of the last synced field set */
  contentHash: string | null;
  /** Set when the local record was deleted */
  archivedAt: Date | null;
}

export type InsertOutcome = 'inserted' | 'conflict';
export type UpdateOutcome = 'updated' | 'conflict' | 'missing';

/**
 * Uniqueness of `(entityType, localRef)` and `(entityType, remoteRef)` holds
 * among mappings that are not archived.
 */
export interface IdentityStore {
  /** Active mapping for the local ref, else the latest archived one */
  findByLocal(entityType: EntityType, localRef: string): Promise<IdentityMapping | null>;
  /** Active mapping for the remote ref, else the latest archived one */
  findByRemote(entityType: EntityType, remoteRef: string): Promise<IdentityMapping | null>;
  insert(mapping: IdentityMapping): Promise<InsertOutcome>;
  /** Update the active mapping of `mapping.localRef` */
  update(mapping: IdentityMapping): Promise<UpdateOutcome>;
  archive(entityType: EntityType, localRef: string, at: Date): Promise<boolean>;
  list(entityType: EntityType): Promise<IdentityMapping[]>;
  /**
   * Take the create lease for a local record. Succeeds when no unexpired
   * lease is held by another holder.
   */
  acquireCreateLock(entityType: EntityType, localRef: string, holder: string, expiresAt: Date, now: Date): Promise<boolean>;
  releaseCreateLock(entityType: EntityType, localRef: string, holder: string): Promise<void>;
}

// ============================================================================
// Webhook receipts
// ============================================================================

export interface WebhookReceipt {
  eventId: string;
  topic: string;
  receivedAt: Date;
  signatureValid: boolean;
  processed: boolean;
}

export type RecordReceiptOutcome = { inserted: true } | { inserted: false; existing: WebhookReceipt };

export interface WebhookEventStore {
  /** Record a signature-valid receipt unless `(topic, eventId)` is already known */
  recordReceipt(receipt: WebhookReceipt): Promise<RecordReceiptOutcome>;
  /** Record a rejected delivery; never takes part in deduplication */
  recordRejected(receipt: WebhookReceipt): Promise<void>;
  /**
   * Take over an unprocessed receipt whose first delivery stalled. Succeeds
   * only while its receivedAt still equals `previousReceivedAt`.
   */
  reclaim(topic: string, eventId: string, previousReceivedAt: Date, now: Date): Promise<boolean>;
  markProcessed(topic: string, eventId: string): Promise<void>;
  purgeOlderThan(cutoff: Date): Promise<number>;
}

// ============================================================================
// Local system of record
// ============================================================================

/** Who performed a local write; sync-originated writes never trigger outbound jobs */
export type WriteOrigin = 'user' | 'sync';

export interface LocalRecord {
  entityType: EntityType;
  localRef: string;
  fields: EntityFields;
  updatedAt: Date;
}

export interface LocalChange {
  entityType: EntityType;
  localRef: string;
  kind: 'create' | 'update' | 'delete';
  fields: EntityFields | null;
  origin: WriteOrigin;
  at: Date;
}

export type LocalChangeListener = (change: LocalChange) => void | Promise<void>;

export interface LocalCatalog {
  get(entityType: EntityType, localRef: string): Promise<LocalRecord | null>;
  list(entityType: EntityType, options?: { modifiedSince?: Date }): Promise<LocalRecord[]>;
  create(entityType: EntityType, fields: EntityFields, origin: WriteOrigin): Promise<LocalRecord>;
  update(entityType: EntityType, localRef: string, fields: EntityFields, origin: WriteOrigin): Promise<LocalRecord | null>;
  delete(entityType: EntityType, localRef: string, origin: WriteOrigin): Promise<boolean>;
  /** Subscribe to committed writes; returns an unsubscribe function */
  onChange(listener: LocalChangeListener): () => void;
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface SyncEngineConfig {
  /** Identifier prefix of this process's workers */
  workerId: string;
  /** Number of concurrently processed jobs */
  concurrency: number;
  /** Job-level timeout; must exceed the client's request timeout */
  jobTimeoutMs: number;
  /** Processing jobs claimed longer ago than this are returned to pending */
  staleClaimGraceMs: number;
  /** Idle wait between empty polls of the queue */
  pollIntervalMs: number;
  /** Retry budget of new jobs */
  maxRetries: number;
  /** Create-lease lifetime; must exceed the client's request timeout */
  createLockTtlMs: number;
  /** Unprocessed receipts older than this may be taken over by a redelivery */
  webhookReclaimAfterMs: number;
  /** Receipts older than this are purged */
  webhookRetentionMs: number;
  webhookSecret: string;
  /** Priority of webhook-originated jobs */
  webhookPriority: number;
  /** Priority of reconciliation jobs */
  sweepPriority: number;
  /** Priority of local edits */
  localChangePriority: number;
}

export const DEFAULT_ENGINE_CONFIG: Omit<SyncEngineConfig, 'webhookSecret'> = {
  workerId: 'worker',
  concurrency: 4,
  jobTimeoutMs: 60000,
  staleClaimGraceMs: 30000,
  pollIntervalMs: 1000,
  maxRetries: 5,
  createLockTtlMs: 90000,
  webhookReclaimAfterMs: 5 * 60 * 1000,
  webhookRetentionMs: 7 * 24 * 60 * 60 * 1000,
  webhookPriority: 10,
  sweepPriority: 50,
  localChangePriority: 20,
};
