/**
 * Commerce Sync - Sync Engine
 * Durable job queue, identity map, worker pool, webhook ingestion and
 * reconciliation between a local catalog and the commerce platform
 *
 * Components:
 * - Sync Job Queue: ordered, coalescing work queue with retry backoff
 * - Identity Map: local/remote correspondence with at-most-one remote creation
 * - Worker Pool: fixed number of slots applying jobs in either direction
 * - Webhook Ingestor: verified, deduplicated inbound notifications
 * - Reconciliation Sweeper: periodic diff that enqueues repair jobs
 *
 * @packageDocumentation
 */

// ============================================================================
// Main Engine
// ============================================================================

export {
  SyncEngine,
  createSyncEngine,
  type SyncEngineDependencies,
  type SyncEngineStores,
  type SyncEngineOptions,
  type CreateSyncEngineOptions,
  type MaintenanceReport,
  type EngineStatus,
} from './engine.js';

// ============================================================================
// Components
// ============================================================================

export { SyncJobQueue, type SyncJobQueueOptions, type FailureOutcome } from './queue/SyncJobQueue.js';
export {
  coalescingKey,
  compareForClaim,
  claimBlocker,
  selectNextClaimable,
  mergeCoalesced,
  isRetryEligible,
} from './queue/ordering.js';

export {
  IdentityMap,
  type IdentityMapOptions,
  type MappingInput,
  type RemoteCreation,
  type CreateOrResolveResult,
} from './identity/IdentityMap.js';

export { JobProcessor, type JobOutcome, type JobProcessorDependencies } from './workers/JobProcessor.js';
export { SyncWorkerPool, type SyncWorkerPoolOptions, type PoolStatus } from './workers/SyncWorkerPool.js';

export {
  WebhookIngestor,
  parseTopic,
  remoteRefOf,
  type WebhookIngestorOptions,
  type WebhookHeaders,
  type AcceptedWebhook,
  type RejectedWebhook,
} from './webhooks/WebhookIngestor.js';

export {
  ReconciliationSweeper,
  type SweepAction,
  type SweepOptions,
  type SweepReport,
  type ReconciliationSweeperOptions,
} from './reconciliation/ReconciliationSweeper.js';

export { OutboundChangeHook, type OutboundChangeHookOptions } from './hooks/OutboundChangeHook.js';

// ============================================================================
// Entity Handlers
// ============================================================================

export * from './entities/index.js';

// ============================================================================
// Stores
// ============================================================================

export {
  MemoryJobStore,
  MemoryIdentityStore,
  MemoryWebhookEventStore,
  MemoryLocalCatalog,
} from './stores/memory.js';

// ============================================================================
// Event Bus
// ============================================================================

export {
  SyncEngineEventBus,
  createEventBus,
  type SyncEngineEvent,
  type SyncEngineEventMap,
  type SyncEngineEventType,
  type JobEnqueuedEvent,
  type JobStatusEvent,
  type JobTerminalEvent,
  type CredentialHaltedEvent,
  type SweepCompletedEvent,
  type WebhookReceivedEvent,
} from './events.js';

// ============================================================================
// Hashing
// ============================================================================

export { canonicalJson, contentHash, hashableFields, mergeFields } from './hash.js';

// ============================================================================
// Types
// ============================================================================

export * from './types.js';
