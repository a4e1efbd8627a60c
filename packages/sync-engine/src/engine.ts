/**
 * Sync Engine
 * Wires the client, entity handlers, identity map, job queue, worker pool,
 * webhook ingestor, reconciliation sweeper and outbound change hook over one
 * set of stores.
 */

import {
  BackoffPolicy,
  CommerceApiError,
  createGraphQLClient,
  createLogger,
  systemClock,
  type Clock,
  type CommerceGraphQLClient,
  type EntityType,
  type GraphQLClientConfig,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import { createEntityHandlers, type EntityHandlers } from './entities/index.js';
import { createEventBus, type SyncEngineEventBus } from './events.js';
import { OutboundChangeHook } from './hooks/OutboundChangeHook.js';
import { IdentityMap } from './identity/IdentityMap.js';
import { SyncJobQueue } from './queue/SyncJobQueue.js';
import { ReconciliationSweeper, type SweepOptions, type SweepReport } from './reconciliation/ReconciliationSweeper.js';
import {
  DEFAULT_ENGINE_CONFIG,
  type IdentityStore,
  type JobStatusCounts,
  type JobStore,
  type LocalCatalog,
  type SyncEngineConfig,
  type SyncJob,
  type WebhookEventStore,
} from './types.js';
import {
  WebhookIngestor,
  type AcceptedWebhook,
  type RejectedWebhook,
  type WebhookHeaders,
} from './webhooks/WebhookIngestor.js';
import { JobProcessor } from './workers/JobProcessor.js';
import { SyncWorkerPool, type PoolStatus } from './workers/SyncWorkerPool.js';

// ============================================================================
// Engine Dependencies Interface
// ============================================================================

export interface SyncEngineStores {
  jobs: JobStore;
  identity: IdentityStore;
  webhooks: WebhookEventStore;
  catalog: LocalCatalog;
}

export interface SyncEngineDependencies {
  stores: SyncEngineStores;
  client: CommerceGraphQLClient;
  /** Replaces the Admin API handlers built from `client` */
  handlers?: EntityHandlers;
  events?: SyncEngineEventBus;
  clock?: Clock;
  logger?: Logger;
}

export type SyncEngineOptions = Partial<Omit<SyncEngineConfig, 'webhookSecret'>> & Pick<SyncEngineConfig, 'webhookSecret'>;

export interface MaintenanceReport {
  requeued: number;
  releasedClaims: number;
  purgedReceipts: number;
}

export interface EngineStatus {
  state: 'stopped' | 'running';
  startedAt: Date | null;
  /** True after the credential was rejected; API calls stay blocked until resumed */
  halted: boolean;
  pool: PoolStatus;
  jobs: JobStatusCounts;
}

// ============================================================================
// Sync Engine Class
// ============================================================================

export class SyncEngine {
  readonly config: SyncEngineConfig;
  readonly events: SyncEngineEventBus;
  readonly queue: SyncJobQueue;
  readonly identity: IdentityMap;
  readonly handlers: EntityHandlers;

  private readonly stores: SyncEngineStores;
  private readonly client: CommerceGraphQLClient;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pool: SyncWorkerPool;
  private readonly ingestor: WebhookIngestor;
  private readonly sweeper: ReconciliationSweeper;
  private readonly hook: OutboundChangeHook;
  private state: EngineStatus['state'] = 'stopped';
  private startedAt: Date | null = null;

  constructor(options: SyncEngineOptions, deps: SyncEngineDependencies) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options };
    if (!this.config.webhookSecret) {
      throw new CommerceApiError('A webhook secret is required');
    }

    const clock = deps.clock ?? systemClock;
    this.clock = clock;
    this.logger = deps.logger ?? createLogger('sync-engine', { workerId: this.config.workerId });
    this.stores = deps.stores;
    this.client = deps.client;
    this.events = deps.events ?? createEventBus();
    this.handlers = deps.handlers ?? createEntityHandlers(deps.client);

    this.queue = new SyncJobQueue({
      store: deps.stores.jobs,
      backoff: new BackoffPolicy({ maxRetries: this.config.maxRetries }),
      clock,
      events: this.events,
    });
    this.identity = new IdentityMap({
      store: deps.stores.identity,
      clock,
      createLockTtlMs: this.config.createLockTtlMs,
    });

    this.pool = new SyncWorkerPool({
      queue: this.queue,
      processor: new JobProcessor({ handlers: this.handlers, identity: this.identity, catalog: deps.stores.catalog }),
      events: this.events,
      clock,
      workerId: this.config.workerId,
      concurrency: this.config.concurrency,
      jobTimeoutMs: this.config.jobTimeoutMs,
      pollIntervalMs: this.config.pollIntervalMs,
    });

    this.ingestor = new WebhookIngestor({
      secret: this.config.webhookSecret,
      store: deps.stores.webhooks,
      queue: this.queue,
      identity: this.identity,
      events: this.events,
      clock,
      reclaimAfterMs: this.config.webhookReclaimAfterMs,
      priority: this.config.webhookPriority,
    });

    this.sweeper = new ReconciliationSweeper({
      handlers: this.handlers,
      identity: this.identity,
      catalog: deps.stores.catalog,
      queue: this.queue,
      events: this.events,
      clock,
      priority: this.config.sweepPriority,
    });

    // Local edits are queued whether or not workers run in this process
    this.hook = new OutboundChangeHook({
      handlers: this.handlers,
      identity: this.identity,
      queue: this.queue,
      priority: this.config.localChangePriority,
    });
    this.hook.attach(deps.stores.catalog);
  }

  /**
   * Start the worker slots
   */
  start(): void {
    if (this.state === 'running') {
      this.logger.debug('Engine already running');
      return;
    }
    this.pool.start();
    this.state = 'running';
    this.startedAt = new Date(this.clock.now());
    this.logger.info({ concurrency: this.config.concurrency }, 'Sync engine started');
  }

  /**
   * Stop claiming new jobs and wait for the ones in flight
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    await this.pool.stop();
    this.state = 'stopped';
    this.logger.info('Sync engine stopped');
  }

  /**
   * Stop, then drop the local change subscription and event listeners
   */
  async close(): Promise<void> {
    await this.stop();
    this.hook.detach();
    this.events.removeAllListeners();
  }

  async receiveWebhook(
    rawBody: string | Buffer,
    headers: WebhookHeaders
  ): Promise<Result<AcceptedWebhook, RejectedWebhook>> {
    return this.ingestor.receive(rawBody, headers);
  }

  async runSweep(entityType: EntityType, options: SweepOptions = {}): Promise<Result<SweepReport>> {
    return this.sweeper.runSweep(entityType, options);
  }

  /**
   * Retry sweep, stale-claim sweep and receipt purge in one pass
   */
  async runMaintenance(): Promise<MaintenanceReport> {
    const requeued = await this.queue.requeueRetryable();
    const released = await this.queue.releaseStaleClaims(this.config.staleClaimGraceMs);
    const cutoff = new Date(this.clock.now() - this.config.webhookRetentionMs);
    const purgedReceipts = await this.stores.webhooks.purgeOlderThan(cutoff);

    const report = { requeued: requeued.length, releasedClaims: released.length, purgedReceipts };
    if (report.requeued + report.releasedClaims + report.purgedReceipts > 0) {
      this.logger.info(report, 'Maintenance pass');
    }
    return report;
  }

  /**
   * Process everything claimable on a stopped engine; used by one-shot runs
   * and tests. Resolves with the number of jobs handled.
   */
  async drain(maxRounds?: number): Promise<number> {
    return this.pool.drain(maxRounds);
  }

  async listFailedJobs(limit?: number): Promise<SyncJob[]> {
    return this.queue.listFailed(limit);
  }

  async retryJob(jobId: string): Promise<boolean> {
    return this.queue.retry(jobId);
  }

  /**
   * Lift a credential halt once the token was replaced
   */
  resumeCredential(): void {
    this.client.resume();
  }

  async getStatus(): Promise<EngineStatus> {
    return {
      state: this.state,
      startedAt: this.startedAt,
      halted: this.client.isHalted(),
      pool: this.pool.getStatus(),
      jobs: await this.queue.countByStatus(),
    };
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export interface CreateSyncEngineOptions extends Omit<SyncEngineDependencies, 'client'> {
  config: SyncEngineOptions;
  integration: GraphQLClientConfig;
}

/**
 * Build an engine with an Admin API client for `integration`
 */
export function createSyncEngine(options: CreateSyncEngineOptions): SyncEngine {
  const { config, integration, ...deps } = options;
  const client = createGraphQLClient({ clock: deps.clock, ...integration });
  return new SyncEngine(config, { ...deps, client });
}
