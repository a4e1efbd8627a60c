/**
 * Sync Worker Pool
 * A fixed number of worker slots, each looping claim → process → complete.
 * Slots run on a p-queue so stop() can wait for in-flight jobs to settle.
 */

import { randomUUID } from 'crypto';
import PQueue from 'p-queue';
import {
  apiError,
  CommerceApiError,
  createLogger,
  err,
  systemClock,
  type ApiError,
  type Clock,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import type { SyncEngineEventBus } from '../events.js';
import type { SyncJobQueue } from '../queue/SyncJobQueue.js';
import type { SyncJob } from '../types.js';
import type { JobOutcome, JobProcessor } from './JobProcessor.js';

export interface SyncWorkerPoolOptions {
  queue: SyncJobQueue;
  processor: JobProcessor;
  events?: SyncEngineEventBus;
  clock?: Clock;
  logger?: Logger;
  /** Prefix of the slot ids recorded as job claimants */
  workerId: string;
  concurrency: number;
  jobTimeoutMs: number;
  pollIntervalMs: number;
}

export interface PoolStatus {
  state: 'stopped' | 'running' | 'stopping';
  concurrency: number;
  inFlight: number;
  processed: number;
  failed: number;
}

export class SyncWorkerPool {
  private readonly options: SyncWorkerPoolOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly slots: PQueue;
  private state: PoolStatus['state'] = 'stopped';
  private inFlight = 0;
  private processed = 0;
  private failed = 0;

  constructor(options: SyncWorkerPoolOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('worker-pool', { workerId: options.workerId });
    this.slots = new PQueue({ concurrency: options.concurrency });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(): void {
    if (this.state !== 'stopped') {
      this.logger.debug({ state: this.state }, 'Worker pool already started');
      return;
    }
    this.state = 'running';
    for (let slot = 1; slot <= this.options.concurrency; slot++) {
      void this.slots.add(() => this.loop(this.slotId(slot)));
    }
    this.logger.info({ concurrency: this.options.concurrency }, 'Worker pool started');
  }

  /**
   * Stop claiming and wait for jobs in flight
   */
  async stop(): Promise<void> {
    if (this.state !== 'running') {
      return;
    }
    this.state = 'stopping';
    await this.slots.onIdle();
    this.state = 'stopped';
    this.logger.info({ processed: this.processed, failed: this.failed }, 'Worker pool stopped');
  }

  getStatus(): PoolStatus {
    return {
      state: this.state,
      concurrency: this.options.concurrency,
      inFlight: this.inFlight,
      processed: this.processed,
      failed: this.failed,
    };
  }

  // ============================================================================
  // Processing
  // ============================================================================

  /**
   * Claim and process one job. Resolves false when nothing was claimable.
   */
  async runOnce(slotId: string = this.slotId(1)): Promise<boolean> {
    const job = await this.options.queue.claimNext(slotId);
    if (!job) {
      return false;
    }

    this.inFlight++;
    try {
      const result = await this.execute(job, slotId);
      if (result.ok) {
        this.processed++;
        this.logger.debug({ jobId: job.id, outcome: result.value }, 'Job done');
        await this.options.queue.markDone(job.id, slotId);
      } else {
        this.failed++;
        if (result.error.kind === 'auth') {
          this.options.events?.emitCredentialHalted(result.error);
        }
        await this.options.queue.markFailed(job.id, slotId, result.error);
      }
    } finally {
      this.inFlight--;
    }
    return true;
  }

  /**
   * Process claimable jobs on every slot until none is left. Jobs whose retry
   * delay has not elapsed stay queued. Only for a pool that is not started.
   */
  async drain(maxRounds = 1000): Promise<number> {
    if (this.state !== 'stopped') {
      throw new CommerceApiError('drain() needs a stopped worker pool');
    }
    let total = 0;
    for (let round = 0; round < maxRounds; round++) {
      const outcomes = await Promise.all(
        Array.from({ length: this.options.concurrency }, (_, index) =>
          this.slots.add(() => this.runOnce(this.slotId(index + 1)))
        )
      );
      const handled = outcomes.filter((outcome) => outcome === true).length;
      if (handled === 0) {
        break;
      }
      total += handled;
    }
    return total;
  }

  private async loop(slotId: string): Promise<void> {
    while (this.state === 'running') {
      let handled = false;
      try {
        handled = await this.runOnce(slotId);
      } catch (error) {
        this.logger.error({ slotId, error: toMessage(error) }, 'Worker slot error');
      }
      if (!handled && this.state === 'running') {
        await this.clock.sleep(this.options.pollIntervalMs);
      }
    }
  }

  /**
   * Run the processor under the job timeout. Thrown errors count as transient
   * failures. A timed-out processor keeps running, so every claim gets its own
   * lease holder and a retry never shares a create lease with it.
   */
  private async execute(job: SyncJob, slotId: string): Promise<Result<JobOutcome>> {
    const holder = `${slotId}:${randomUUID()}`;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Result<JobOutcome>>((resolve) => {
      timer = setTimeout(
        () => resolve(err(apiError('transient', `Job timed out after ${this.options.jobTimeoutMs}ms`))),
        this.options.jobTimeoutMs
      );
    });

    try {
      return await Promise.race([this.options.processor.process(job, holder), timeout]);
    } catch (error) {
      this.logger.error({ jobId: job.id, error: toMessage(error) }, 'Job threw');
      return err(thrownError(error));
    } finally {
      clearTimeout(timer);
    }
  }

  private slotId(slot: number): string {
    return `${this.options.workerId}-${slot}`;
  }
}

function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function thrownError(error: unknown): ApiError {
  return apiError('transient', `Unexpected error: ${toMessage(error)}`);
}
