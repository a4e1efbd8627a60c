/**
 * Job Processor
 * Applies one claimed job: inbound jobs write the local catalog, outbound jobs
 * write the platform. Every path compares content hashes first, so replaying a
 * job that already took effect is a no-op.
 */

import {
  apiError,
  createLogger,
  err,
  ok,
  type Logger,
  type Result,
} from '@commercesync/integrations';
import { contentHash, mergeFields } from '../hash.js';
import type { EntityHandler, EntityHandlers, HandlerContext } from '../entities/base.js';
import type { IdentityMap } from '../identity/IdentityMap.js';
import type { EntityFields, IdentityMapping, LocalCatalog, LocalRecord, SyncJob } from '../types.js';

/**
 * - applied: one side was written
 * - unchanged: both sides already agreed
 * - skipped: the record is gone or its mapping archived
 */
export type JobOutcome = 'applied' | 'unchanged' | 'skipped';

export interface JobProcessorDependencies {
  handlers: EntityHandlers;
  identity: IdentityMap;
  catalog: LocalCatalog;
  logger?: Logger;
}

export class JobProcessor {
  private readonly handlers: EntityHandlers;
  private readonly identity: IdentityMap;
  private readonly catalog: LocalCatalog;
  private readonly logger: Logger;
  private readonly context: HandlerContext;

  constructor(deps: JobProcessorDependencies) {
    this.handlers = deps.handlers;
    this.identity = deps.identity;
    this.catalog = deps.catalog;
    this.logger = deps.logger ?? createLogger('job-processor');
    this.context = {
      resolveRemote: (entityType, localRef) => this.identity.resolveRemote(entityType, localRef),
    };
  }

  /**
   * @param holder - create-lease holder, unique to this claim of the job
   */
  async process(job: SyncJob, holder: string): Promise<Result<JobOutcome>> {
    const handler = this.handlers[job.entityType];

    if (job.direction === 'inbound') {
      return job.operation === 'delete' ? this.inboundDelete(job) : this.inboundUpsert(job, handler);
    }

    if (!handler.outbound) {
      return err(apiError('validation', `${job.entityType} changes are not pushed to the platform`));
    }
    switch (job.operation) {
      case 'delete':
        return this.outboundDelete(job, handler);
      case 'update':
        return this.outboundUpdate(job, handler, holder);
      default:
        return this.outboundCreate(job, handler, holder);
    }
  }

  // ============================================================================
  // Inbound
  // ============================================================================

  private async inboundUpsert(job: SyncJob, handler: EntityHandler): Promise<Result<JobOutcome>> {
    const remoteRef = job.remoteRef;
    if (!remoteRef) {
      return err(apiError('validation', `Inbound ${job.operation} job ${job.id} has no remote ref`));
    }

    const mapping = await this.identity.findByRemote(job.entityType, remoteRef);
    if (mapping && mapping.archivedAt !== null) {
      this.logger.debug({ jobId: job.id, remoteRef }, 'Mapping archived; inbound change discarded');
      return ok('skipped');
    }

    let fields: EntityFields;
    if (job.payload) {
      fields = job.payload;
    } else {
      const fetched = await handler.fetchRemote(remoteRef);
      if (!fetched.ok) {
        return fetched;
      }
      if (!fetched.value) {
        this.logger.info({ jobId: job.id, entityType: job.entityType, remoteRef }, 'Remote record no longer exists');
        return ok('skipped');
      }
      fields = fetched.value.fields;
    }

    const local = mapping ? await this.catalog.get(job.entityType, mapping.localRef) : null;

    if (mapping && local) {
      const merged = mergeFields(local.fields, fields);
      const hash = contentHash(merged, handler.ignoredFields);
      if (hash === mapping.contentHash) {
        return ok('unchanged');
      }
      await this.catalog.update(job.entityType, local.localRef, fields, 'sync');
      const saved = await this.identity.upsert({ ...mapping, contentHash: hash });
      return saved.ok ? ok('applied') : saved;
    }

    if (mapping) {
      // Mapped, but the local record vanished without a delete passing through
      this.logger.warn({ jobId: job.id, localRef: mapping.localRef, remoteRef }, 'Mapped local record missing; recreating');
      await this.identity.archive(job.entityType, mapping.localRef);
    }

    const created = await this.catalog.create(job.entityType, fields, 'sync');
    const saved = await this.identity.upsert({
      entityType: job.entityType,
      localRef: created.localRef,
      remoteRef,
      contentHash: contentHash(created.fields, handler.ignoredFields),
    });
    if (!saved.ok) {
      return saved;
    }
    this.logger.info({ jobId: job.id, entityType: job.entityType, localRef: created.localRef, remoteRef }, 'Imported');
    return ok('applied');
  }

  private async inboundDelete(job: SyncJob): Promise<Result<JobOutcome>> {
    const mapping = job.remoteRef ? await this.identity.findByRemote(job.entityType, job.remoteRef) : null;
    if (!mapping || mapping.archivedAt !== null) {
      return ok('skipped');
    }
    await this.catalog.delete(job.entityType, mapping.localRef, 'sync');
    await this.identity.archive(job.entityType, mapping.localRef);
    return ok('applied');
  }

  // ============================================================================
  // Outbound
  // ============================================================================

  private async outboundCreate(job: SyncJob, handler: EntityHandler, holder: string): Promise<Result<JobOutcome>> {
    const local = await this.localRecordOf(job);
    if (!local) {
      return ok('skipped');
    }
    const hash = contentHash(local.fields, handler.ignoredFields);

    const resolved = await this.identity.createOrResolve(job.entityType, local.localRef, holder, async () => {
      const created = await handler.createRemote(local.fields, this.context);
      return created.ok ? ok({ remoteRef: created.value, contentHash: hash }) : created;
    });
    if (!resolved.ok) {
      return resolved;
    }
    if (resolved.value.created) {
      return ok('applied');
    }
    return this.pushIfChanged(handler, resolved.value.mapping, local, hash);
  }

  private async outboundUpdate(job: SyncJob, handler: EntityHandler, holder: string): Promise<Result<JobOutcome>> {
    const local = await this.localRecordOf(job);
    if (!local) {
      return ok('skipped');
    }

    const mapping = await this.identity.findByLocal(job.entityType, local.localRef);
    if (!mapping) {
      return this.outboundCreate(job, handler, holder);
    }
    if (mapping.archivedAt !== null) {
      return ok('skipped');
    }
    return this.pushIfChanged(handler, mapping, local, contentHash(local.fields, handler.ignoredFields));
  }

  /**
   * The mapping was archived when the local delete committed; the job's remote
   * ref still names the object to remove.
   */
  private async outboundDelete(job: SyncJob, handler: EntityHandler): Promise<Result<JobOutcome>> {
    const localRef = job.localRef;
    const mapping = localRef ? await this.identity.findByLocal(job.entityType, localRef) : null;
    const remoteRef = job.remoteRef ?? mapping?.remoteRef ?? null;
    if (!localRef || !remoteRef) {
      return ok('skipped');
    }

    const deleted = await handler.deleteRemote(remoteRef, job.payload, this.context);
    if (!deleted.ok) {
      return deleted;
    }
    await this.identity.archive(job.entityType, localRef);
    return ok('applied');
  }

  private async pushIfChanged(
    handler: EntityHandler,
    mapping: IdentityMapping,
    local: LocalRecord,
    hash: string
  ): Promise<Result<JobOutcome>> {
    if (hash === mapping.contentHash) {
      return ok('unchanged');
    }
    const updated = await handler.updateRemote(mapping.remoteRef, local.fields, this.context);
    if (!updated.ok) {
      return updated;
    }
    const saved = await this.identity.upsert({ ...mapping, contentHash: hash });
    return saved.ok ? ok('applied') : saved;
  }

  private async localRecordOf(job: SyncJob): Promise<LocalRecord | null> {
    const record = job.localRef ? await this.catalog.get(job.entityType, job.localRef) : null;
    if (!record) {
      this.logger.info({ jobId: job.id, entityType: job.entityType, localRef: job.localRef }, 'Local record no longer exists');
    }
    return record;
  }
}
