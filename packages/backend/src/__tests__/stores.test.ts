/**
 * Postgres Store Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { isUniqueViolation, jobIdOf, seqOf, toSyncJob } from '../stores/index.js';
import type { SyncJobRow } from '../db/schema.js';

const AT = new Date('2026-01-01T00:00:00.000Z');

describe('job ids', () => {
  it('pads the row sequence into the job id', () => {
    expect(jobIdOf(42)).toBe('job-00000042');
  });

  it('reads the sequence back from a job id', () => {
    expect(seqOf('job-00000042')).toBe(42);
    expect(seqOf('job-123456789')).toBe(123456789);
  });

  it('refuses ids it did not issue', () => {
    expect(seqOf('42')).toBeNull();
    expect(seqOf('job-abc')).toBeNull();
  });
});

describe('toSyncJob', () => {
  it('maps a row onto the engine job shape', () => {
    const row: SyncJobRow = {
      seq: 7,
      entityType: 'product',
      localRef: 'L1',
      remoteRef: null,
      operation: 'create',
      direction: 'outbound',
      priority: 20,
      status: 'failed',
      retryCount: 1,
      maxRetries: 5,
      lastError: 'throttle: Throttled',
      errorKind: 'throttle',
      payload: null,
      coalescingKey: 'product|outbound|create|local:L1',
      runAfter: AT,
      claimedBy: null,
      claimedAt: null,
      createdAt: AT,
      updatedAt: AT,
    };

    expect(toSyncJob(row)).toEqual({
      id: 'job-00000007',
      entityType: 'product',
      localRef: 'L1',
      remoteRef: null,
      operation: 'create',
      direction: 'outbound',
      priority: 20,
      status: 'failed',
      retryCount: 1,
      maxRetries: 5,
      lastError: 'throttle: Throttled',
      errorKind: 'throttle',
      payload: null,
      runAfter: AT,
      claimedBy: null,
      claimedAt: null,
      createdAt: AT,
      updatedAt: AT,
    });
  });
});

describe('isUniqueViolation', () => {
  it('recognizes the Postgres unique violation code', () => {
    expect(isUniqueViolation({ code: '23505', detail: 'Key already exists' })).toBe(true);
  });

  it('ignores other errors', () => {
    expect(isUniqueViolation({ code: '40001' })).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
