/**
 * Queue ordering rules shared by every job store
 */

import { isRetryableKind } from '@commercesync/integrations';
import { mergeFields } from '../hash.js';
import type { EntityFields, NewSyncJob, SyncJob } from '../types.js';

type EntityKeyed = Pick<SyncJob, 'entityType' | 'localRef' | 'remoteRef'>;

/**
 * Jobs with equal keys that are both pending collapse into one
 */
export function coalescingKey(job: Pick<NewSyncJob, 'entityType' | 'localRef' | 'remoteRef' | 'operation' | 'direction'>): string {
  const ref = job.localRef ? `local:${job.localRef}` : `remote:${job.remoteRef ?? ''}`;
  return `${job.entityType}|${job.direction}|${job.operation}|${ref}`;
}

/**
 * Two jobs concern the same record when they share a local or a remote ref
 */
export function sameEntity(a: EntityKeyed, b: EntityKeyed): boolean {
  if (a.entityType !== b.entityType) {
    return false;
  }
  if (a.localRef && a.localRef === b.localRef) {
    return true;
  }
  return Boolean(a.remoteRef && a.remoteRef === b.remoteRef);
}

/** Creation order; ids break ties between jobs created in the same instant */
export function createdBefore(a: Pick<SyncJob, 'createdAt' | 'id'>, b: Pick<SyncJob, 'createdAt' | 'id'>): boolean {
  const delta = a.createdAt.getTime() - b.createdAt.getTime();
  return delta !== 0 ? delta < 0 : a.id < b.id;
}

/** Claim order: priority band first, FIFO within a band */
export function compareForClaim(a: SyncJob, b: SyncJob): number {
  if (a.priority !== b.priority) {
    return a.priority - b.priority;
  }
  if (a.createdAt.getTime() !== b.createdAt.getTime()) {
    return a.createdAt.getTime() - b.createdAt.getTime();
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

const PRECEDES_DELETE = new Set(['create', 'update', 'import']);

/**
 * Why `candidate` may not be claimed yet, or null when it may.
 *
 * - no job for the same record may be processing;
 * - a delete waits for every earlier create, update or import of the record
 *   that is still pending or processing.
 */
export function claimBlocker(candidate: SyncJob, active: readonly SyncJob[]): SyncJob | null {
  for (const other of active) {
    if (other.id === candidate.id || !sameEntity(candidate, other)) {
      continue;
    }
    if (other.status === 'processing') {
      return other;
    }
    if (
      candidate.operation === 'delete' &&
      other.status === 'pending' &&
      PRECEDES_DELETE.has(other.operation) &&
      createdBefore(other, candidate)
    ) {
      return other;
    }
  }
  return null;
}

/**
 * First claimable job among due pending candidates. `active` holds every
 * pending or processing job that could block one of them.
 */
export function selectNextClaimable(candidates: readonly SyncJob[], active: readonly SyncJob[]): SyncJob | null {
  const ordered = [...candidates].sort(compareForClaim);
  for (const candidate of ordered) {
    if (!claimBlocker(candidate, active)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Payload and priority of a pending job after another equivalent job merged
 * into it. Partial payloads merge field by field with the later one winning;
 * a null payload means "read the full remote state" and absorbs any partial
 * one. The more urgent priority wins.
 */
export function mergeCoalesced(
  existing: Pick<SyncJob, 'payload' | 'priority'>,
  incoming: Pick<NewSyncJob, 'payload'> & { priority: number }
): Pick<SyncJob, 'payload' | 'priority'> {
  return {
    payload: mergePayloads(existing.payload, incoming.payload),
    priority: Math.min(existing.priority, incoming.priority),
  };
}

function mergePayloads(existing: EntityFields | null, incoming: EntityFields | null | undefined): EntityFields | null {
  if (incoming === undefined) {
    return existing;
  }
  if (existing === null || incoming === null) {
    return null;
  }
  return mergeFields(existing, incoming);
}

/**
 * A failed job a retry sweep will move back to pending once its delay elapsed
 */
export function isRetryEligible(job: Pick<SyncJob, 'status' | 'errorKind' | 'retryCount' | 'maxRetries'>): boolean {
  return (
    job.status === 'failed' &&
    job.errorKind !== null &&
    isRetryableKind(job.errorKind) &&
    job.retryCount < job.maxRetries
  );
}
