/**
 * In-memory stores
 * Single-process implementations of the job, identity, receipt and catalog
 * stores. Each method mutates state synchronously before its first await, so
 * calls are atomic with respect to each other on the event loop.
 */

import { systemClock, type Clock } from '@commercesync/integrations';
import {
  coalescingKey,
  isRetryEligible,
  mergeCoalesced,
  selectNextClaimable,
} from '../queue/ordering.js';
import type {
  EnqueueResult,
  EntityFields,
  EntityType,
  IdentityMapping,
  IdentityStore,
  InsertOutcome,
  JobFailureUpdate,
  JobStatusCounts,
  JobStore,
  LocalCatalog,
  LocalChange,
  LocalChangeListener,
  LocalRecord,
  NewSyncJob,
  RecordReceiptOutcome,
  SyncJob,
  UpdateOutcome,
  WebhookEventStore,
  WebhookReceipt,
  WriteOrigin,
} from '../types.js';

// ============================================================================
// Jobs
// ============================================================================

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, SyncJob>();
  private sequence = 0;

  async enqueue(job: NewSyncJob & { priority: number; maxRetries: number }, now: Date): Promise<EnqueueResult> {
    const key = coalescingKey(job);
    for (const existing of this.jobs.values()) {
      if (existing.status !== 'pending' || coalescingKey(existing) !== key) {
        continue;
      }
      const merged = mergeCoalesced(existing, job);
      existing.payload = merged.payload;
      existing.priority = merged.priority;
      existing.localRef = existing.localRef ?? job.localRef ?? null;
      existing.remoteRef = existing.remoteRef ?? job.remoteRef ?? null;
      existing.updatedAt = now;
      return { jobId: existing.id, coalesced: true };
    }

    this.sequence++;
    const id = `job-${String(this.sequence).padStart(8, '0')}`;
    this.jobs.set(id, {
      id,
      entityType: job.entityType,
      localRef: job.localRef ?? null,
      remoteRef: job.remoteRef ?? null,
      operation: job.operation,
      direction: job.direction,
      priority: job.priority,
      status: 'pending',
      retryCount: 0,
      maxRetries: job.maxRetries,
      lastError: null,
      errorKind: null,
      payload: job.payload ?? null,
      runAfter: now,
      claimedBy: null,
      claimedAt: null,
      createdAt: now,
      updatedAt: now,
    });
    return { jobId: id, coalesced: false };
  }

  async claimNext(workerId: string, now: Date): Promise<SyncJob | null> {
    const all = [...this.jobs.values()];
    const candidates = all.filter((job) => job.status === 'pending' && job.runAfter.getTime() <= now.getTime());
    const active = all.filter((job) => job.status === 'pending' || job.status === 'processing');

    const next = selectNextClaimable(candidates, active);
    if (!next) {
      return null;
    }

    next.status = 'processing';
    next.claimedBy = workerId;
    next.claimedAt = now;
    next.updatedAt = now;
    return { ...next };
  }

  async complete(jobId: string, workerId: string, now: Date): Promise<boolean> {
    const job = this.claimedBy(jobId, workerId);
    if (!job) {
      return false;
    }
    job.status = 'done';
    job.updatedAt = now;
    return true;
  }

  async fail(jobId: string, workerId: string, failure: JobFailureUpdate, now: Date): Promise<boolean> {
    const job = this.claimedBy(jobId, workerId);
    if (!job) {
      return false;
    }
    job.status = 'failed';
    job.retryCount += 1;
    job.errorKind = failure.errorKind;
    job.lastError = failure.lastError;
    job.runAfter = failure.runAfter;
    job.claimedBy = null;
    job.claimedAt = null;
    job.updatedAt = now;
    return true;
  }

  async requeueRetryable(now: Date): Promise<string[]> {
    const requeued: string[] = [];
    for (const job of this.jobs.values()) {
      if (isRetryEligible(job) && job.runAfter.getTime() <= now.getTime()) {
        job.status = 'pending';
        job.updatedAt = now;
        requeued.push(job.id);
      }
    }
    return requeued;
  }

  async releaseStaleClaims(olderThan: Date, now: Date): Promise<string[]> {
    const released: string[] = [];
    for (const job of this.jobs.values()) {
      if (job.status === 'processing' && job.claimedAt && job.claimedAt.getTime() < olderThan.getTime()) {
        job.status = 'pending';
        job.claimedBy = null;
        job.claimedAt = null;
        job.updatedAt = now;
        released.push(job.id);
      }
    }
    return released;
  }

  async listTerminalFailures(limit: number): Promise<SyncJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.status === 'failed' && !isRetryEligible(job))
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, limit)
      .map((job) => ({ ...job }));
  }

  async retry(jobId: string, now: Date): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'failed') {
      return false;
    }
    job.status = 'pending';
    job.retryCount = 0;
    job.runAfter = now;
    job.updatedAt = now;
    return true;
  }

  async get(jobId: string): Promise<SyncJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const counts: JobStatusCounts = { pending: 0, processing: 0, done: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      counts[job.status]++;
    }
    return counts;
  }

  /** Snapshot of every job, oldest first */
  all(): SyncJob[] {
    return [...this.jobs.values()].map((job) => ({ ...job }));
  }

  private claimedBy(jobId: string, workerId: string): SyncJob | null {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'processing' || job.claimedBy !== workerId) {
      return null;
    }
    return job;
  }
}

// ============================================================================
// Identity mappings
// ============================================================================

interface CreateLease {
  holder: string;
  expiresAt: Date;
}

export class MemoryIdentityStore implements IdentityStore {
  private readonly rows: IdentityMapping[] = [];
  private readonly leases = new Map<string, CreateLease>();

  async findByLocal(entityType: EntityType, localRef: string): Promise<IdentityMapping | null> {
    return this.preferActive(this.rows.filter((row) => row.entityType === entityType && row.localRef === localRef));
  }

  async findByRemote(entityType: EntityType, remoteRef: string): Promise<IdentityMapping | null> {
    return this.preferActive(this.rows.filter((row) => row.entityType === entityType && row.remoteRef === remoteRef));
  }

  async insert(mapping: IdentityMapping): Promise<InsertOutcome> {
    const clash = this.rows.some(
      (row) =>
        row.entityType === mapping.entityType &&
        row.archivedAt === null &&
        (row.localRef === mapping.localRef || row.remoteRef === mapping.remoteRef)
    );
    if (clash) {
      return 'conflict';
    }
    this.rows.push({ ...mapping, archivedAt: null });
    return 'inserted';
  }

  async update(mapping: IdentityMapping): Promise<UpdateOutcome> {
    const row = this.activeRow(mapping.entityType, mapping.localRef);
    if (!row) {
      return 'missing';
    }
    const remoteTaken = this.rows.some(
      (other) =>
        other !== row &&
        other.entityType === mapping.entityType &&
        other.archivedAt === null &&
        other.remoteRef === mapping.remoteRef
    );
    if (remoteTaken) {
      return 'conflict';
    }
    row.remoteRef = mapping.remoteRef;
    row.contentHash = mapping.contentHash;
    row.lastSyncedAt = mapping.lastSyncedAt;
    return 'updated';
  }

  async archive(entityType: EntityType, localRef: string, at: Date): Promise<boolean> {
    const row = this.activeRow(entityType, localRef);
    if (!row) {
      return false;
    }
    row.archivedAt = at;
    return true;
  }

  async list(entityType: EntityType): Promise<IdentityMapping[]> {
    return this.rows.filter((row) => row.entityType === entityType).map((row) => ({ ...row }));
  }

  async acquireCreateLock(
    entityType: EntityType,
    localRef: string,
    holder: string,
    expiresAt: Date,
    now: Date
  ): Promise<boolean> {
    const key = `${entityType}:${localRef}`;
    const lease = this.leases.get(key);
    if (lease && lease.holder !== holder && lease.expiresAt.getTime() > now.getTime()) {
      return false;
    }
    this.leases.set(key, { holder, expiresAt });
    return true;
  }

  async releaseCreateLock(entityType: EntityType, localRef: string, holder: string): Promise<void> {
    const key = `${entityType}:${localRef}`;
    if (this.leases.get(key)?.holder === holder) {
      this.leases.delete(key);
    }
  }

  private activeRow(entityType: EntityType, localRef: string): IdentityMapping | undefined {
    return this.rows.find((row) => row.entityType === entityType && row.localRef === localRef && row.archivedAt === null);
  }

  private preferActive(rows: IdentityMapping[]): IdentityMapping | null {
    const active = rows.find((row) => row.archivedAt === null);
    if (active) {
      return { ...active };
    }
    const archived = [...rows].sort((a, b) => (b.archivedAt?.getTime() ?? 0) - (a.archivedAt?.getTime() ?? 0));
    const latest = archived[0];
    return latest ? { ...latest } : null;
  }
}

// ============================================================================
// Webhook receipts
// ============================================================================

export class MemoryWebhookEventStore implements WebhookEventStore {
  private readonly receipts = new Map<string, WebhookReceipt>();
  readonly rejected: WebhookReceipt[] = [];

  async recordReceipt(receipt: WebhookReceipt): Promise<RecordReceiptOutcome> {
    const key = receiptKey(receipt.topic, receipt.eventId);
    const existing = this.receipts.get(key);
    if (existing) {
      return { inserted: false, existing: { ...existing } };
    }
    this.receipts.set(key, { ...receipt, signatureValid: true });
    return { inserted: true };
  }

  async recordRejected(receipt: WebhookReceipt): Promise<void> {
    this.rejected.push({ ...receipt, signatureValid: false, processed: false });
  }

  async reclaim(topic: string, eventId: string, previousReceivedAt: Date, now: Date): Promise<boolean> {
    const receipt = this.receipts.get(receiptKey(topic, eventId));
    if (!receipt || receipt.processed || receipt.receivedAt.getTime() !== previousReceivedAt.getTime()) {
      return false;
    }
    receipt.receivedAt = now;
    return true;
  }

  async markProcessed(topic: string, eventId: string): Promise<void> {
    const receipt = this.receipts.get(receiptKey(topic, eventId));
    if (receipt) {
      receipt.processed = true;
    }
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    let purged = 0;
    for (const [key, receipt] of this.receipts) {
      if (receipt.receivedAt.getTime() < cutoff.getTime()) {
        this.receipts.delete(key);
        purged++;
      }
    }
    const kept = this.rejected.filter((receipt) => receipt.receivedAt.getTime() >= cutoff.getTime());
    purged += this.rejected.length - kept.length;
    this.rejected.splice(0, this.rejected.length, ...kept);
    return purged;
  }

  get(topic: string, eventId: string): WebhookReceipt | null {
    const receipt = this.receipts.get(receiptKey(topic, eventId));
    return receipt ? { ...receipt } : null;
  }
}

function receiptKey(topic: string, eventId: string): string {
  return `${topic}\n${eventId}`;
}

// ============================================================================
// Local catalog
// ============================================================================

/**
 * Local system of record kept in memory. Change listeners run after every
 * committed write and are awaited before the write resolves.
 */
export class MemoryLocalCatalog implements LocalCatalog {
  private readonly records = new Map<string, LocalRecord>();
  private readonly listeners = new Set<LocalChangeListener>();
  private readonly clock: Clock;
  private sequence = 0;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  async get(entityType: EntityType, localRef: string): Promise<LocalRecord | null> {
    const record = this.records.get(recordKey(entityType, localRef));
    return record ? cloneRecord(record) : null;
  }

  async list(entityType: EntityType, options: { modifiedSince?: Date } = {}): Promise<LocalRecord[]> {
    const since = options.modifiedSince?.getTime();
    return [...this.records.values()]
      .filter((record) => record.entityType === entityType)
      .filter((record) => since === undefined || record.updatedAt.getTime() > since)
      .map(cloneRecord);
  }

  async create(entityType: EntityType, fields: EntityFields, origin: WriteOrigin): Promise<LocalRecord> {
    this.sequence++;
    const record = this.put(entityType, `${entityType}-${this.sequence}`, fields);
    await this.notify({ entityType, localRef: record.localRef, kind: 'create', fields: { ...fields }, origin, at: record.updatedAt });
    return cloneRecord(record);
  }

  async update(
    entityType: EntityType,
    localRef: string,
    fields: EntityFields,
    origin: WriteOrigin
  ): Promise<LocalRecord | null> {
    const existing = this.records.get(recordKey(entityType, localRef));
    if (!existing) {
      return null;
    }
    const record = this.put(entityType, localRef, { ...existing.fields, ...fields });
    await this.notify({ entityType, localRef, kind: 'update', fields: { ...record.fields }, origin, at: record.updatedAt });
    return cloneRecord(record);
  }

  async delete(entityType: EntityType, localRef: string, origin: WriteOrigin): Promise<boolean> {
    const key = recordKey(entityType, localRef);
    const existing = this.records.get(key);
    if (!existing) {
      return false;
    }
    this.records.delete(key);
    await this.notify({ entityType, localRef, kind: 'delete', fields: existing.fields, origin, at: new Date(this.clock.now()) });
    return true;
  }

  onChange(listener: LocalChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Insert a record without notifying listeners
   */
  seed(entityType: EntityType, localRef: string, fields: EntityFields, updatedAt?: Date): LocalRecord {
    const record = this.put(entityType, localRef, fields);
    if (updatedAt) {
      record.updatedAt = updatedAt;
    }
    return cloneRecord(record);
  }

  private put(entityType: EntityType, localRef: string, fields: EntityFields): LocalRecord {
    const record: LocalRecord = { entityType, localRef, fields: { ...fields }, updatedAt: new Date(this.clock.now()) };
    this.records.set(recordKey(entityType, localRef), record);
    return record;
  }

  private async notify(change: LocalChange): Promise<void> {
    for (const listener of [...this.listeners]) {
      await listener(change);
    }
  }
}

function recordKey(entityType: EntityType, localRef: string): string {
  return `${entityType}:${localRef}`;
}

function cloneRecord(record: LocalRecord): LocalRecord {
  return { ...record, fields: { ...record.fields } };
}
