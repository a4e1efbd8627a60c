/**
 * BullMQ scheduling for Commerce Sync
 * Repeatable jobs drive the retry/maintenance pass and the periodic
 * reconciliation sweeps. Sync jobs themselves live in Postgres; Redis only
 * carries the timers.
 */

import { Queue, Worker, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import { createLogger, describeError, systemClock, type Clock, type EntityType, type Logger } from '@commercesync/integrations';
import type { MaintenanceReport, SweepReport, SyncEngine } from '@commercesync/sync-engine';

export const SCHEDULE_QUEUE = 'commercesync-schedule';

export type ScheduledJobData =
  | { kind: 'maintenance' }
  | { kind: 'sweep'; entityType: EntityType; full: boolean };

export type ScheduledJobResult = MaintenanceReport | SweepReport;

export interface SyncSchedulerOptions {
  connection: Redis;
  engine: Pick<SyncEngine, 'runSweep' | 'runMaintenance'>;
  sweepEntityTypes: readonly EntityType[];
  sweepIntervalMs: number;
  fullSweepIntervalMs: number;
  maintenanceIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

// Initialize Redis connection
export function createRedisConnection(url: string, logger: Logger = createLogger('redis')): Redis {
  const connection = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });

  connection.on('error', (error) => {
    logger.error({ error: error.message }, 'Redis connection error');
  });

  connection.on('connect', () => {
    logger.info('Redis connected for scheduling');
  });

  return connection;
}

export class SyncScheduler {
  private readonly options: SyncSchedulerOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  /** Start time of the last successful sweep per entity type; the next incremental sweep reads from there */
  private readonly lastSweepStart = new Map<EntityType, Date>();
  private queue: Queue<ScheduledJobData, ScheduledJobResult> | null = null;
  private worker: Worker<ScheduledJobData, ScheduledJobResult> | null = null;

  constructor(options: SyncSchedulerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('scheduler');
  }

  async start(): Promise<void> {
    if (this.queue) {
      return;
    }
    const { connection } = this.options;

    const queue = new Queue<ScheduledJobData, ScheduledJobResult>(SCHEDULE_QUEUE, {
      connection,
      defaultJobOptions: {
        removeOnComplete: {
          count: 100, // Keep the last 100 runs
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed runs for 7 days
        },
      },
    });
    this.queue = queue;

    await queue.add('maintenance', { kind: 'maintenance' }, { repeat: { every: this.options.maintenanceIntervalMs } });
    for (const entityType of this.options.sweepEntityTypes) {
      await queue.add(
        `sweep:${entityType}`,
        { kind: 'sweep', entityType, full: false },
        { repeat: { every: this.options.sweepIntervalMs } }
      );
      await queue.add(
        `full-sweep:${entityType}`,
        { kind: 'sweep', entityType, full: true },
        { repeat: { every: this.options.fullSweepIntervalMs } }
      );
    }

    const worker = new Worker<ScheduledJobData, ScheduledJobResult>(
      SCHEDULE_QUEUE,
      async (job: Job<ScheduledJobData, ScheduledJobResult>) => this.run(job.data),
      { connection, concurrency: 1 }
    );
    worker.on('failed', (job, error) => {
      this.logger.error({ job: job?.name, error: error.message }, 'Scheduled job failed');
    });
    this.worker = worker;

    this.logger.info(
      { entityTypes: this.options.sweepEntityTypes, sweepIntervalMs: this.options.sweepIntervalMs },
      'Scheduler started'
    );
  }

  /**
   * Execute one scheduled job against the engine
   */
  async run(data: ScheduledJobData): Promise<ScheduledJobResult> {
    if (data.kind === 'maintenance') {
      return this.options.engine.runMaintenance();
    }

    const startedAt = new Date(this.clock.now());
    const since = data.full ? undefined : this.lastSweepStart.get(data.entityType);
    const result = await this.options.engine.runSweep(data.entityType, { full: data.full, since });
    if (!result.ok) {
      throw new Error(`Sweep of ${data.entityType} failed: ${describeError(result.error)}`);
    }
    this.lastSweepStart.set(data.entityType, startedAt);
    return result.value;
  }

  async stop(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    if (this.queue) {
      await this.queue.close();
      this.queue = null;
    }
    this.logger.info('Scheduler stopped');
  }
}
