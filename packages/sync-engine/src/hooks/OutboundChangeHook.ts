/**
 * Outbound Change Hook
 * Turns committed local writes into outbound jobs. Writes the engine made
 * itself carry origin 'sync' and are never echoed back to the platform.
 */

import { createLogger, type Logger } from '@commercesync/integrations';
import type { EntityHandlers } from '../entities/base.js';
import type { IdentityMap } from '../identity/IdentityMap.js';
import type { SyncJobQueue } from '../queue/SyncJobQueue.js';
import type { LocalCatalog, LocalChange } from '../types.js';

export interface OutboundChangeHookOptions {
  handlers: EntityHandlers;
  identity: IdentityMap;
  queue: SyncJobQueue;
  logger?: Logger;
  priority?: number;
}

const DEFAULT_LOCAL_CHANGE_PRIORITY = 20;

export class OutboundChangeHook {
  private readonly options: OutboundChangeHookOptions;
  private readonly logger: Logger;
  private readonly priority: number;
  private unsubscribe: (() => void) | null = null;

  constructor(options: OutboundChangeHookOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('outbound-hook');
    this.priority = options.priority ?? DEFAULT_LOCAL_CHANGE_PRIORITY;
  }

  attach(catalog: LocalCatalog): void {
    this.detach();
    this.unsubscribe = catalog.onChange(async (change) => {
      await this.handle(change);
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Enqueue the outbound job for one change. Resolves with the job id, or
   * null when the change needs none.
   */
  async handle(change: LocalChange): Promise<string | null> {
    if (change.origin === 'sync') {
      return null;
    }
    if (!this.options.handlers[change.entityType].outbound) {
      this.logger.debug({ entityType: change.entityType }, 'Local change on inbound-only type ignored');
      return null;
    }

    const { entityType, localRef } = change;
    const mapping = await this.options.identity.findByLocal(entityType, localRef);
    if (mapping && mapping.archivedAt !== null) {
      return null;
    }

    if (change.kind === 'delete') {
      if (!mapping) {
        return null;
      }
      // Archived now, so webhooks arriving before the remote delete are discarded
      await this.options.identity.archive(entityType, localRef);
      const result = await this.options.queue.enqueue({
        entityType,
        localRef,
        remoteRef: mapping.remoteRef,
        operation: 'delete',
        direction: 'outbound',
        priority: this.priority,
        payload: change.fields,
      });
      return result.jobId;
    }

    const result = await this.options.queue.enqueue(
      mapping
        ? { entityType, localRef, remoteRef: mapping.remoteRef, operation: 'update', direction: 'outbound', priority: this.priority }
        : { entityType, localRef, operation: 'create', direction: 'outbound', priority: this.priority }
    );
    return result.jobId;
  }
}
