/**
 * Sync Engine Event Bus
 * Typed EventEmitter for job lifecycle, credential and sweep notifications
 */

import { EventEmitter } from 'eventemitter3';
import { createLogger, type ApiError, type Logger } from '@commercesync/integrations';
import type { EntityType, JobStatus, SyncDirection, SyncJob, SyncOperation } from './types.js';
import type { SweepReport } from './reconciliation/ReconciliationSweeper.js';

// ============================================================================
// Event Types
// ============================================================================

export interface SyncEngineEvent<TType extends string, TPayload> {
  type: TType;
  payload: TPayload;
  timestamp: Date;
}

export type JobEnqueuedEvent = SyncEngineEvent<
  'job:enqueued',
  {
    jobId: string;
    coalesced: boolean;
    entityType: EntityType;
    operation: SyncOperation;
    direction: SyncDirection;
  }
>;

export type JobStatusEvent = SyncEngineEvent<'job:status', { jobId: string; status: JobStatus; workerId: string | null }>;

export type JobTerminalEvent = SyncEngineEvent<'job:terminal', { job: SyncJob; error: ApiError }>;

export type CredentialHaltedEvent = SyncEngineEvent<'credential:halted', { error: ApiError }>;

export type SweepCompletedEvent = SyncEngineEvent<'sweep:completed', SweepReport>;

export type WebhookReceivedEvent = SyncEngineEvent<
  'webhook:received',
  { topic: string; eventId: string; duplicate: boolean; jobIds: string[] }
>;

export interface SyncEngineEventMap {
  'job:enqueued': [JobEnqueuedEvent];
  'job:status': [JobStatusEvent];
  'job:terminal': [JobTerminalEvent];
  'credential:halted': [CredentialHaltedEvent];
  'sweep:completed': [SweepCompletedEvent];
  'webhook:received': [WebhookReceivedEvent];
}

export type SyncEngineEventType = keyof SyncEngineEventMap;

// ============================================================================
// Typed Event Bus
// ============================================================================

export class SyncEngineEventBus extends EventEmitter<SyncEngineEventMap> {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('event-bus')) {
    super();
    this.logger = logger;
  }

  emitJobEnqueued(payload: JobEnqueuedEvent['payload']): void {
    this.logger.trace({ event: 'job:enqueued', ...payload });
    this.emit('job:enqueued', { type: 'job:enqueued', payload, timestamp: new Date() });
  }

  emitJobStatus(jobId: string, status: JobStatus, workerId: string | null = null): void {
    this.logger.trace({ event: 'job:status', jobId, status, workerId });
    this.emit('job:status', { type: 'job:status', payload: { jobId, status, workerId }, timestamp: new Date() });
  }

  /**
   * A job failed and no retry sweep will pick it up again
   */
  emitJobTerminal(job: SyncJob, error: ApiError): void {
    this.emit('job:terminal', { type: 'job:terminal', payload: { job, error }, timestamp: new Date() });
  }

  emitCredentialHalted(error: ApiError): void {
    this.emit('credential:halted', { type: 'credential:halted', payload: { error }, timestamp: new Date() });
  }

  emitSweepCompleted(report: SweepReport): void {
    this.emit('sweep:completed', { type: 'sweep:completed', payload: report, timestamp: new Date() });
  }

  emitWebhookReceived(payload: WebhookReceivedEvent['payload']): void {
    this.emit('webhook:received', { type: 'webhook:received', payload, timestamp: new Date() });
  }

  /**
   * Subscribe to job status transitions
   */
  onJobStatus(listener: (event: JobStatusEvent) => void): this {
    return this.on('job:status', listener);
  }

  onJobTerminal(listener: (event: JobTerminalEvent) => void): this {
    return this.on('job:terminal', listener);
  }

  onCredentialHalted(listener: (event: CredentialHaltedEvent) => void): this {
    return this.on('credential:halted', listener);
  }

  onSweepCompleted(listener: (event: SweepCompletedEvent) => void): this {
    return this.on('sweep:completed', listener);
  }

  /**
   * Get listener count for an event type
   */
  getListenerCount(eventType: SyncEngineEventType): number {
    return this.listenerCount(eventType);
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createEventBus(logger?: Logger): SyncEngineEventBus {
  return new SyncEngineEventBus(logger);
}
