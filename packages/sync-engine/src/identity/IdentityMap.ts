/**
 * Identity Map
 * Durable correspondence between local records and remote objects. Remote
 * creation for a local record goes through `createOrResolve`, which is what
 * keeps every local record at no more than one remote object.
 */

import {
  apiError,
  createLogger,
  err,
  ok,
  systemClock,
  type Clock,
  type EntityType,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import type { IdentityMapping, IdentityStore } from '../types.js';

export interface IdentityMapOptions {
  store: IdentityStore;
  clock?: Clock;
  logger?: Logger;
  /** Lifetime of a create lease; must outlast the remote create call */
  createLockTtlMs?: number;
}

export interface MappingInput {
  entityType: EntityType;
  localRef: string;
  remoteRef: string;
  contentHash?: string | null;
}

export interface RemoteCreation {
  remoteRef: string;
  contentHash: string | null;
}

export interface CreateOrResolveResult {
  mapping: IdentityMapping;
  /** True when this call performed the remote create */
  created: boolean;
}

const DEFAULT_CREATE_LOCK_TTL_MS = 90000;
const LOCK_BUSY_RETRY_MS = 1000;

export class IdentityMap {
  private readonly store: IdentityStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly createLockTtlMs: number;

  constructor(options: IdentityMapOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('identity-map');
    this.createLockTtlMs = options.createLockTtlMs ?? DEFAULT_CREATE_LOCK_TTL_MS;
  }

  async resolveRemote(entityType: EntityType, localRef: string): Promise<string | null> {
    const mapping = await this.store.findByLocal(entityType, localRef);
    return mapping && mapping.archivedAt === null ? mapping.remoteRef : null;
  }

  async resolveLocal(entityType: EntityType, remoteRef: string): Promise<string | null> {
    const mapping = await this.store.findByRemote(entityType, remoteRef);
    return mapping && mapping.archivedAt === null ? mapping.localRef : null;
  }

  /**
   * Mapping for a remote ref, archived or not
   */
  async findByRemote(entityType: EntityType, remoteRef: string): Promise<IdentityMapping | null> {
    return this.store.findByRemote(entityType, remoteRef);
  }

  async findByLocal(entityType: EntityType, localRef: string): Promise<IdentityMapping | null> {
    return this.store.findByLocal(entityType, localRef);
  }

  async list(entityType: EntityType): Promise<IdentityMapping[]> {
    return this.store.list(entityType);
  }

  /**
   * Insert or refresh the mapping of a local record. Pointing a record at a
   * remote object that another record already owns is a conflict.
   */
  async upsert(input: MappingInput): Promise<Result<IdentityMapping>> {
    const mapping: IdentityMapping = {
      entityType: input.entityType,
      localRef: input.localRef,
      remoteRef: input.remoteRef,
      contentHash: input.contentHash ?? null,
      lastSyncedAt: new Date(this.clock.now()),
      archivedAt: null,
    };

    const existing = await this.store.findByLocal(input.entityType, input.localRef);
    const outcome =
      existing && existing.archivedAt === null ? await this.store.update(mapping) : await this.store.insert(mapping);

    if (outcome === 'conflict' || outcome === 'missing') {
      return err(this.conflict(input));
    }
    return ok(mapping);
  }

  async archive(entityType: EntityType, localRef: string): Promise<boolean> {
    const archived = await this.store.archive(entityType, localRef, new Date(this.clock.now()));
    if (archived) {
      this.logger.debug({ entityType, localRef }, 'Mapping archived');
    }
    return archived;
  }

  /**
   * Return the existing mapping of a local record, or create the remote
   * object and record the mapping while holding the record's create lease.
   * The lease is a row with an expiry, so no database connection or
   * transaction stays open across the remote call.
   */
  async createOrResolve(
    entityType: EntityType,
    localRef: string,
    holder: string,
    create: () => Promise<Result<RemoteCreation>>
  ): Promise<Result<CreateOrResolveResult>> {
    const existing = await this.activeMapping(entityType, localRef);
    if (existing) {
      return ok({ mapping: existing, created: false });
    }

    const now = this.clock.now();
    const acquired = await this.store.acquireCreateLock(
      entityType,
      localRef,
      holder,
      new Date(now + this.createLockTtlMs),
      new Date(now)
    );
    if (!acquired) {
      return err(
        apiError('transient', `Create of ${entityType} ${localRef} already in progress`, {
          retryAfterMs: LOCK_BUSY_RETRY_MS,
        })
      );
    }

    try {
      // Another holder may have finished between the first check and the lease
      const settled = await this.activeMapping(entityType, localRef);
      if (settled) {
        return ok({ mapping: settled, created: false });
      }

      const created = await create();
      if (!created.ok) {
        return created;
      }

      const mapping: IdentityMapping = {
        entityType,
        localRef,
        remoteRef: created.value.remoteRef,
        contentHash: created.value.contentHash,
        lastSyncedAt: new Date(this.clock.now()),
        archivedAt: null,
      };
      const outcome = await this.store.insert(mapping);
      if (outcome === 'conflict') {
        return err(this.conflict(mapping));
      }

      this.logger.info({ entityType, localRef, remoteRef: mapping.remoteRef }, 'Remote object created and mapped');
      return ok({ mapping, created: true });
    } finally {
      await this.store.releaseCreateLock(entityType, localRef, holder);
    }
  }

  private async activeMapping(entityType: EntityType, localRef: string): Promise<IdentityMapping | null> {
    const mapping = await this.store.findByLocal(entityType, localRef);
    return mapping && mapping.archivedAt === null ? mapping : null;
  }

  private conflict(input: MappingInput) {
    this.logger.error(
      { entityType: input.entityType, localRef: input.localRef, remoteRef: input.remoteRef },
      'Identity mapping conflict'
    );
    return apiError(
      'conflict',
      `${input.entityType} ${input.localRef} ↔ ${input.remoteRef} collides with an existing mapping`
    );
  }
}
