/**
 * Reconciliation Sweeper
 * Diffs remote and local state of one entity type through the identity map
 * and enqueues the jobs that repair any drift. A sweep never writes either
 * side itself.
 */

import {
  createLogger,
  ok,
  systemClock,
  type Clock,
  type EntityType,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import { contentHash, mergeFields } from '../hash.js';
import type { EntityHandler, EntityHandlers, RemoteRecord } from '../entities/base.js';
import type { SyncEngineEventBus } from '../events.js';
import type { IdentityMap } from '../identity/IdentityMap.js';
import type { SyncJobQueue } from '../queue/SyncJobQueue.js';
import type { IdentityMapping, LocalCatalog, LocalRecord, NewSyncJob } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export type SweepAction = 'import' | 'outboundCreate' | 'inboundUpdate' | 'outboundUpdate' | 'inboundDelete';

export interface SweepOptions {
  /** Compare only records modified after this instant */
  since?: Date;
  /** Export the whole remote collection; also detects remote deletions */
  full?: boolean;
}

export interface SweepReport {
  entityType: EntityType;
  full: boolean;
  since: Date | null;
  startedAt: Date;
  completedAt: Date;
  remoteCount: number;
  localCount: number;
  enqueued: Record<SweepAction, number>;
  jobIds: string[];
}

export interface ReconciliationSweeperOptions {
  handlers: EntityHandlers;
  identity: IdentityMap;
  catalog: LocalCatalog;
  queue: SyncJobQueue;
  events?: SyncEngineEventBus;
  clock?: Clock;
  logger?: Logger;
  priority?: number;
}

interface MappingIndex {
  byLocal: Map<string, IdentityMapping>;
  byRemote: Map<string, IdentityMapping>;
  archivedLocal: Set<string>;
  archivedRemote: Set<string>;
}

const DEFAULT_SWEEP_PRIORITY = 50;

// ============================================================================
// Sweeper
// ============================================================================

export class ReconciliationSweeper {
  private readonly options: ReconciliationSweeperOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly priority: number;

  constructor(options: ReconciliationSweeperOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('reconciliation');
    this.priority = options.priority ?? DEFAULT_SWEEP_PRIORITY;
  }

  async runSweep(entityType: EntityType, sweepOptions: SweepOptions = {}): Promise<Result<SweepReport>> {
    const startedAt = new Date(this.clock.now());
    const handler = this.options.handlers[entityType];
    const full = sweepOptions.full ?? false;

    this.logger.info({ entityType, full, since: sweepOptions.since }, 'Reconciliation sweep started');

    const remote = await handler.listRemote({ since: sweepOptions.since, full });
    if (!remote.ok) {
      this.logger.warn({ entityType, kind: remote.error.kind, error: remote.error.message }, 'Sweep aborted');
      return remote;
    }

    const locals = await this.options.catalog.list(entityType, { modifiedSince: sweepOptions.since });
    const index = indexMappings(await this.options.identity.list(entityType));
    const localsByRef = new Map(locals.map((record) => [record.localRef, record]));
    const remoteRefs = new Set(remote.value.map((record) => record.remoteRef));

    const enqueued = emptyCounts();
    const jobIds: string[] = [];
    const push = async (action: SweepAction, job: NewSyncJob): Promise<void> => {
      const result = await this.options.queue.enqueue({ ...job, priority: this.priority });
      enqueued[action]++;
      jobIds.push(result.jobId);
    };

    // Remote side
    for (const record of remote.value) {
      const mapping = index.byRemote.get(record.remoteRef);
      if (!mapping) {
        if (!index.archivedRemote.has(record.remoteRef)) {
          await push('import', inboundJob(entityType, 'import', null, record));
        }
        continue;
      }

      const local = localsByRef.get(mapping.localRef) ?? (await this.options.catalog.get(entityType, mapping.localRef));
      localsByRef.delete(mapping.localRef);
      if (!local) {
        // Worker recreates the local record
        await push('inboundUpdate', inboundJob(entityType, 'update', mapping.localRef, record));
        continue;
      }

      const action = decide(handler, mapping, local, record);
      if (action === 'inboundUpdate') {
        await push(action, inboundJob(entityType, 'update', mapping.localRef, record));
      } else if (action === 'outboundUpdate') {
        await push(action, outboundJob(entityType, 'update', local.localRef, mapping.remoteRef));
      }
    }

    // Local records the remote listing did not cover
    for (const local of localsByRef.values()) {
      const mapping = index.byLocal.get(local.localRef);
      if (!mapping) {
        if (handler.outbound && !index.archivedLocal.has(local.localRef)) {
          await push('outboundCreate', outboundJob(entityType, 'create', local.localRef, null));
        }
        continue;
      }
      if (full && !remoteRefs.has(mapping.remoteRef)) {
        continue;
      }
      if (handler.outbound && contentHash(local.fields, handler.ignoredFields) !== mapping.contentHash) {
        await push('outboundUpdate', outboundJob(entityType, 'update', local.localRef, mapping.remoteRef));
      }
    }

    // A full export is complete, so a mapped object missing from it is gone.
    // Mappings synced since the export started may name objects it predates.
    if (full) {
      for (const mapping of index.byLocal.values()) {
        if (!remoteRefs.has(mapping.remoteRef) && mapping.lastSyncedAt.getTime() < startedAt.getTime()) {
          await push('inboundDelete', {
            entityType,
            localRef: mapping.localRef,
            remoteRef: mapping.remoteRef,
            operation: 'delete',
            direction: 'inbound',
          });
        }
      }
    }

    const report: SweepReport = {
      entityType,
      full,
      since: sweepOptions.since ?? null,
      startedAt,
      completedAt: new Date(this.clock.now()),
      remoteCount: remote.value.length,
      localCount: locals.length,
      enqueued,
      jobIds,
    };
    this.logger.info({ entityType, enqueued, remoteCount: report.remoteCount, localCount: report.localCount }, 'Reconciliation sweep completed');
    this.options.events?.emitSweepCompleted(report);
    return ok(report);
  }
}

// ============================================================================
// Diff helpers
// ============================================================================

/**
 * Which side of a mapped pair drifted from the last synced state. When both
 * did, the more recently modified side wins; types that never flow outbound
 * always take the remote state.
 */
function decide(
  handler: EntityHandler,
  mapping: IdentityMapping,
  local: LocalRecord,
  remote: RemoteRecord
): SweepAction | null {
  const remoteChanged = contentHash(mergeFields(local.fields, remote.fields), handler.ignoredFields) !== mapping.contentHash;
  const localChanged = contentHash(local.fields, handler.ignoredFields) !== mapping.contentHash;

  if (remoteChanged && (!localChanged || !handler.outbound || remoteIsNewer(remote, local))) {
    return 'inboundUpdate';
  }
  if (localChanged && handler.outbound) {
    return 'outboundUpdate';
  }
  return null;
}

function remoteIsNewer(remote: RemoteRecord, local: LocalRecord): boolean {
  return remote.updatedAt !== null && remote.updatedAt.getTime() > local.updatedAt.getTime();
}

function indexMappings(mappings: IdentityMapping[]): MappingIndex {
  const index: MappingIndex = {
    byLocal: new Map(),
    byRemote: new Map(),
    archivedLocal: new Set(),
    archivedRemote: new Set(),
  };
  for (const mapping of mappings) {
    if (mapping.archivedAt === null) {
      index.byLocal.set(mapping.localRef, mapping);
      index.byRemote.set(mapping.remoteRef, mapping);
    } else {
      index.archivedLocal.add(mapping.localRef);
      index.archivedRemote.add(mapping.remoteRef);
    }
  }
  return index;
}

function inboundJob(
  entityType: EntityType,
  operation: 'import' | 'update',
  localRef: string | null,
  record: RemoteRecord
): NewSyncJob {
  return { entityType, localRef, remoteRef: record.remoteRef, operation, direction: 'inbound', payload: record.fields };
}

function outboundJob(
  entityType: EntityType,
  operation: 'create' | 'update',
  localRef: string,
  remoteRef: string | null
): NewSyncJob {
  return { entityType, localRef, remoteRef, operation, direction: 'outbound' };
}

function emptyCounts(): Record<SweepAction, number> {
  return { import: 0, outboundCreate: 0, inboundUpdate: 0, outboundUpdate: 0, inboundDelete: 0 };
}
