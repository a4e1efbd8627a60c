/**
 * Sync Job Queue
 * Durable ordered work queue. Producers enqueue without ever waiting for a
 * worker; workers claim, complete and fail jobs through compare-and-swap
 * transitions on the underlying store.
 */

import {
  BackoffPolicy,
  CommerceApiError,
  createLogger,
  describeError,
  isRetryableKind,
  systemClock,
  type ApiError,
  type Clock,
  type Logger,
} from '@commercesync/integrations';
import type { SyncEngineEventBus } from '../events.js';
import type {
  EnqueueResult,
  JobStatusCounts,
  JobStore,
  NewSyncJob,
  SyncJob,
} from '../types.js';

export interface SyncJobQueueOptions {
  store: JobStore;
  backoff?: BackoffPolicy;
  clock?: Clock;
  events?: SyncEngineEventBus;
  logger?: Logger;
  defaultPriority?: number;
}

export interface FailureOutcome {
  /** False when the job was no longer claimed by this worker */
  recorded: boolean;
  retryable: boolean;
  runAfter: Date;
}

const DEFAULT_PRIORITY = 50;

export class SyncJobQueue {
  private readonly store: JobStore;
  private readonly backoff: BackoffPolicy;
  private readonly clock: Clock;
  private readonly events?: SyncEngineEventBus;
  private readonly logger: Logger;
  private readonly defaultPriority: number;

  constructor(options: SyncJobQueueOptions) {
    this.store = options.store;
    this.backoff = options.backoff ?? new BackoffPolicy();
    this.clock = options.clock ?? systemClock;
    this.events = options.events;
    this.logger = options.logger ?? createLogger('job-queue');
    this.defaultPriority = options.defaultPriority ?? DEFAULT_PRIORITY;
  }

  /**
   * Add a job, or merge it into an equivalent pending one
   */
  async enqueue(job: NewSyncJob): Promise<EnqueueResult> {
    const hasLocal = Boolean(job.localRef);
    const hasRemote = Boolean(job.remoteRef);
    if (!hasLocal && !hasRemote) {
      throw new CommerceApiError(`${job.operation} job for ${job.entityType} carries no reference`);
    }
    if ((!hasLocal || !hasRemote) && job.operation !== 'import' && job.operation !== 'create') {
      throw new CommerceApiError(`${job.operation} job for ${job.entityType} needs both references`);
    }

    const result = await this.store.enqueue(
      {
        ...job,
        priority: job.priority ?? this.defaultPriority,
        maxRetries: job.maxRetries ?? this.backoff.maxRetries,
      },
      this.now()
    );

    this.logger.debug(
      { jobId: result.jobId, coalesced: result.coalesced, entityType: job.entityType, operation: job.operation },
      'Job enqueued'
    );
    this.events?.emitJobEnqueued({
      jobId: result.jobId,
      coalesced: result.coalesced,
      entityType: job.entityType,
      operation: job.operation,
      direction: job.direction,
    });
    if (!result.coalesced) {
      this.events?.emitJobStatus(result.jobId, 'pending');
    }
    return result;
  }

  async claimNext(workerId: string): Promise<SyncJob | null> {
    const job = await this.store.claimNext(workerId, this.now());
    if (job) {
      this.events?.emitJobStatus(job.id, 'processing', workerId);
    }
    return job;
  }

  async markDone(jobId: string, workerId: string): Promise<boolean> {
    const recorded = await this.store.complete(jobId, workerId, this.now());
    if (recorded) {
      this.events?.emitJobStatus(jobId, 'done', workerId);
    } else {
      this.logger.warn({ jobId, workerId }, 'Completion rejected; claim no longer held');
    }
    return recorded;
  }

  /**
   * Record a failure. Retryable kinds get a backoff delay (the server's
   * retry hint acting as a floor) and stay eligible for the retry sweep while
   * their budget lasts; every other failure is terminal.
   */
  async markFailed(jobId: string, workerId: string, error: ApiError): Promise<FailureOutcome> {
    const now = this.now();
    const job = await this.store.get(jobId);
    if (!job || job.status !== 'processing' || job.claimedBy !== workerId) {
      this.logger.warn({ jobId, workerId }, 'Failure rejected; claim no longer held');
      return { recorded: false, retryable: false, runAfter: now };
    }

    const retryCount = job.retryCount + 1;
    const retryable = isRetryableKind(error.kind) && retryCount < job.maxRetries;
    const delayMs = retryable ? this.backoff.delayFor(retryCount, error.retryAfterMs) : 0;
    const runAfter = new Date(now.getTime() + delayMs);

    const recorded = await this.store.fail(
      jobId,
      workerId,
      { errorKind: error.kind, lastError: describeError(error), runAfter },
      now
    );
    if (!recorded) {
      return { recorded: false, retryable: false, runAfter: now };
    }

    this.events?.emitJobStatus(jobId, 'failed', workerId);
    if (retryable) {
      this.logger.info({ jobId, kind: error.kind, retryCount, delayMs }, 'Job failed; retry scheduled');
    } else {
      this.logger.error({ jobId, kind: error.kind, retryCount, error: error.message }, 'Job failed permanently');
      this.events?.emitJobTerminal(
        { ...job, status: 'failed', retryCount, errorKind: error.kind, lastError: describeError(error), runAfter },
        error
      );
    }
    return { recorded: true, retryable, runAfter };
  }

  /**
   * Retry sweep: failed jobs whose delay elapsed go back to pending
   */
  async requeueRetryable(): Promise<string[]> {
    const ids = await this.store.requeueRetryable(this.now());
    for (const id of ids) {
      this.events?.emitJobStatus(id, 'pending');
    }
    if (ids.length > 0) {
      this.logger.debug({ count: ids.length }, 'Requeued retryable jobs');
    }
    return ids;
  }

  /**
   * Stale-claim sweep: jobs stuck in processing past the grace period
   */
  async releaseStaleClaims(graceMs: number): Promise<string[]> {
    const now = this.now();
    const ids = await this.store.releaseStaleClaims(new Date(now.getTime() - graceMs), now);
    for (const id of ids) {
      this.events?.emitJobStatus(id, 'pending');
    }
    if (ids.length > 0) {
      this.logger.warn({ jobIds: ids }, 'Released stale claims');
    }
    return ids;
  }

  /**
   * Jobs that need manual intervention
   */
  async listFailed(limit = 100): Promise<SyncJob[]> {
    return this.store.listTerminalFailures(limit);
  }

  async retry(jobId: string): Promise<boolean> {
    const requeued = await this.store.retry(jobId, this.now());
    if (requeued) {
      this.logger.info({ jobId }, 'Job manually requeued');
      this.events?.emitJobStatus(jobId, 'pending');
    }
    return requeued;
  }

  async get(jobId: string): Promise<SyncJob | null> {
    return this.store.get(jobId);
  }

  async countByStatus(): Promise<JobStatusCounts> {
    return this.store.countByStatus();
  }

  private now(): Date {
    return new Date(this.clock.now());
  }
}
