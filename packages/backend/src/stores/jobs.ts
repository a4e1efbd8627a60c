/**
 * Postgres job store
 *
 * Enqueue and claim run inside transactions guarded by advisory locks: one
 * per coalescing key for enqueue, one shared lock for claims so that the
 * ordering rules see a consistent set of active jobs. Completion and failure
 * are compare-and-swap updates on the claiming worker.
 */

import { and, asc, desc, eq, inArray, isNull, lt, lte, notInArray, or, sql, type SQL } from 'drizzle-orm';
import { isRetryableKind } from '@commercesync/integrations';
import {
  coalescingKey,
  mergeCoalesced,
  selectNextClaimable,
  type EnqueueResult,
  type JobFailureUpdate,
  type JobStatusCounts,
  type JobStore,
  type NewSyncJob,
  type SyncJob,
} from '@commercesync/sync-engine';
import type { Database } from '../db/index.js';
import { errorKindEnum, syncJobs, type SyncJobRow } from '../db/schema.js';

/** Claims are serialized on this advisory lock key */
const CLAIM_LOCK_KEY = 7_310_001;

/** Due pending jobs examined per claim */
const CLAIM_WINDOW = 200;

const RETRYABLE_KINDS = errorKindEnum.enumValues.filter(isRetryableKind);

export function jobIdOf(seq: number): string {
  return `job-${String(seq).padStart(8, '0')}`;
}

export function seqOf(jobId: string): number | null {
  const digits = /^job-(\d+)$/.exec(jobId)?.[1];
  return digits === undefined ? null : Number(digits);
}

export function toSyncJob(row: SyncJobRow): SyncJob {
  return {
    id: jobIdOf(row.seq),
    entityType: row.entityType,
    localRef: row.localRef,
    remoteRef: row.remoteRef,
    operation: row.operation,
    direction: row.direction,
    priority: row.priority,
    status: row.status,
    retryCount: row.retryCount,
    maxRetries: row.maxRetries,
    lastError: row.lastError,
    errorKind: row.errorKind,
    payload: row.payload,
    runAfter: row.runAfter,
    claimedBy: row.claimedBy,
    claimedAt: row.claimedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleJobStore implements JobStore {
  constructor(private readonly db: Database) {}

  async enqueue(job: NewSyncJob & { priority: number; maxRetries: number }, now: Date): Promise<EnqueueResult> {
    const key = coalescingKey(job);

    return this.db.transaction(async (tx) => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);

      const [existing] = await tx
        .select()
        .from(syncJobs)
        .where(and(eq(syncJobs.coalescingKey, key), eq(syncJobs.status, 'pending')))
        .orderBy(asc(syncJobs.seq))
        .limit(1);

      if (existing) {
        const merged = mergeCoalesced(existing, job);
        // A claim may have taken the row since it was read
        const updated = await tx
          .update(syncJobs)
          .set({
            payload: merged.payload,
            priority: merged.priority,
            localRef: existing.localRef ?? job.localRef ?? null,
            remoteRef: existing.remoteRef ?? job.remoteRef ?? null,
            updatedAt: now,
          })
          .where(and(eq(syncJobs.seq, existing.seq), eq(syncJobs.status, 'pending')))
          .returning({ seq: syncJobs.seq });
        if (updated.length > 0) {
          return { jobId: jobIdOf(existing.seq), coalesced: true };
        }
      }

      const [inserted] = await tx
        .insert(syncJobs)
        .values({
          entityType: job.entityType,
          localRef: job.localRef ?? null,
          remoteRef: job.remoteRef ?? null,
          operation: job.operation,
          direction: job.direction,
          priority: job.priority,
          status: 'pending',
          retryCount: 0,
          maxRetries: job.maxRetries,
          payload: job.payload ?? null,
          coalescingKey: key,
          runAfter: now,
          createdAt: now,
          updatedAt: now,
        })
        .returning({ seq: syncJobs.seq });
      if (!inserted) {
        throw new Error('Job insert returned no row');
      }
      return { jobId: jobIdOf(inserted.seq), coalesced: false };
    });
  }

  async claimNext(workerId: string, now: Date): Promise<SyncJob | null> {
    return this.db.transaction(async (tx) => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(${CLAIM_LOCK_KEY})`);

      const candidateRows = await tx
        .select()
        .from(syncJobs)
        .where(and(eq(syncJobs.status, 'pending'), lte(syncJobs.runAfter, now)))
        .orderBy(asc(syncJobs.priority), asc(syncJobs.createdAt), asc(syncJobs.seq))
        .limit(CLAIM_WINDOW);
      if (candidateRows.length === 0) {
        return null;
      }

      const localRefs = distinct(candidateRows.map((row) => row.localRef));
      const remoteRefs = distinct(candidateRows.map((row) => row.remoteRef));
      const refMatches: SQL[] = [];
      if (localRefs.length > 0) {
        refMatches.push(inArray(syncJobs.localRef, localRefs));
      }
      if (remoteRefs.length > 0) {
        refMatches.push(inArray(syncJobs.remoteRef, remoteRefs));
      }
      const activeRows =
        refMatches.length > 0
          ? await tx
              .select()
              .from(syncJobs)
              .where(and(inArray(syncJobs.status, ['pending', 'processing']), or(...refMatches)))
          : [];

      const next = selectNextClaimable(candidateRows.map(toSyncJob), activeRows.map(toSyncJob));
      const seq = next ? seqOf(next.id) : null;
      if (seq === null) {
        return null;
      }

      const [claimed] = await tx
        .update(syncJobs)
        .set({ status: 'processing', claimedBy: workerId, claimedAt: now, updatedAt: now })
        .where(and(eq(syncJobs.seq, seq), eq(syncJobs.status, 'pending')))
        .returning();
      return claimed ? toSyncJob(claimed) : null;
    });
  }

  async complete(jobId: string, workerId: string, now: Date): Promise<boolean> {
    const claim = heldBy(jobId, workerId);
    if (!claim) {
      return false;
    }
    const rows = await this.db
      .update(syncJobs)
      .set({ status: 'done', updatedAt: now })
      .where(claim)
      .returning({ seq: syncJobs.seq });
    return rows.length > 0;
  }

  async fail(jobId: string, workerId: string, failure: JobFailureUpdate, now: Date): Promise<boolean> {
    const claim = heldBy(jobId, workerId);
    if (!claim) {
      return false;
    }
    const rows = await this.db
      .update(syncJobs)
      .set({
        status: 'failed',
        retryCount: sql`${syncJobs.retryCount} + 1`,
        errorKind: failure.errorKind,
        lastError: failure.lastError,
        runAfter: failure.runAfter,
        claimedBy: null,
        claimedAt: null,
        updatedAt: now,
      })
      .where(claim)
      .returning({ seq: syncJobs.seq });
    return rows.length > 0;
  }

  async requeueRetryable(now: Date): Promise<string[]> {
    const rows = await this.db
      .update(syncJobs)
      .set({ status: 'pending', updatedAt: now })
      .where(and(retryEligible(), lte(syncJobs.runAfter, now)))
      .returning({ seq: syncJobs.seq });
    return rows.map((row) => jobIdOf(row.seq));
  }

  async releaseStaleClaims(olderThan: Date, now: Date): Promise<string[]> {
    const rows = await this.db
      .update(syncJobs)
      .set({ status: 'pending', claimedBy: null, claimedAt: null, updatedAt: now })
      .where(and(eq(syncJobs.status, 'processing'), lt(syncJobs.claimedAt, olderThan)))
      .returning({ seq: syncJobs.seq });
    return rows.map((row) => jobIdOf(row.seq));
  }

  async listTerminalFailures(limit: number): Promise<SyncJob[]> {
    const rows = await this.db
      .select()
      .from(syncJobs)
      .where(
        and(
          eq(syncJobs.status, 'failed'),
          or(
            isNull(syncJobs.errorKind),
            notInArray(syncJobs.errorKind, RETRYABLE_KINDS),
            sql`${syncJobs.retryCount} >= ${syncJobs.maxRetries}`
          )
        )
      )
      .orderBy(desc(syncJobs.updatedAt))
      .limit(limit);
    return rows.map(toSyncJob);
  }

  async retry(jobId: string, now: Date): Promise<boolean> {
    const seq = seqOf(jobId);
    if (seq === null) {
      return false;
    }
    const rows = await this.db
      .update(syncJobs)
      .set({ status: 'pending', retryCount: 0, runAfter: now, updatedAt: now })
      .where(and(eq(syncJobs.seq, seq), eq(syncJobs.status, 'failed')))
      .returning({ seq: syncJobs.seq });
    return rows.length > 0;
  }

  async get(jobId: string): Promise<SyncJob | null> {
    const seq = seqOf(jobId);
    if (seq === null) {
      return null;
    }
    const [row] = await this.db.select().from(syncJobs).where(eq(syncJobs.seq, seq)).limit(1);
    return row ? toSyncJob(row) : null;
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const rows = await this.db
      .select({ status: syncJobs.status, count: sql<number>`count(*)::int` })
      .from(syncJobs)
      .groupBy(syncJobs.status);

    const counts: JobStatusCounts = { pending: 0, processing: 0, done: 0, failed: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }
}

function heldBy(jobId: string, workerId: string): SQL | undefined {
  const seq = seqOf(jobId);
  if (seq === null) {
    return undefined;
  }
  return and(eq(syncJobs.seq, seq), eq(syncJobs.status, 'processing'), eq(syncJobs.claimedBy, workerId));
}

function retryEligible(): SQL | undefined {
  return and(
    eq(syncJobs.status, 'failed'),
    inArray(syncJobs.errorKind, RETRYABLE_KINDS),
    sql`${syncJobs.retryCount} < ${syncJobs.maxRetries}`
  );
}

function distinct(values: Array<string | null>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value) {
      seen.add(value);
    }
  }
  return [...seen];
}
