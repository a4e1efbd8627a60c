/**
 * Sync Job Queue Tests
 * Coalescing, claim order, same-record blocking and failure bookkeeping
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BackoffPolicy, CommerceApiError, ManualClock, apiError } from '@commercesync/integrations';
import { SyncJobQueue } from '../queue/SyncJobQueue.js';
import { MemoryJobStore } from '../stores/memory.js';
import { createEventBus } from '../events.js';
import type { JobStatus } from '../types.js';

describe('SyncJobQueue', () => {
  let clock: ManualClock;
  let store: MemoryJobStore;
  let queue: SyncJobQueue;

  beforeEach(() => {
    clock = new ManualClock(0);
    store = new MemoryJobStore();
    queue = new SyncJobQueue({
      store,
      clock,
      backoff: new BackoffPolicy({ random: () => 0, maxRetries: 3 }),
    });
  });

  describe('enqueue', () => {
    it('merges pending updates of one record into a single job with the latest payload', async () => {
      const base = { entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'inbound' } as const;

      const first = await queue.enqueue({ ...base, priority: 50, payload: { price: 1 } });
      const second = await queue.enqueue({ ...base, priority: 10, payload: { price: 2 } });
      const third = await queue.enqueue({ ...base, priority: 50, payload: { price: 3 } });

      expect(first).toEqual({ jobId: 'job-00000001', coalesced: false });
      expect(second).toEqual({ jobId: 'job-00000001', coalesced: true });
      expect(third).toEqual({ jobId: 'job-00000001', coalesced: true });

      const job = await queue.get('job-00000001');
      expect(job?.payload).toEqual({ price: 3 });
      expect(job?.priority).toBe(10);
      expect(await queue.countByStatus()).toEqual({ pending: 1, processing: 0, done: 0, failed: 0 });
    });

    it('keeps every field of partial payloads merged into one job', async () => {
      const base = { entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'inbound' } as const;

      await queue.enqueue({ ...base, priority: 10, payload: { price: 10 } });
      await queue.enqueue({ ...base, priority: 10, payload: { title: 'Tee' } });

      const job = await queue.get('job-00000001');
      expect(job?.payload).toEqual({ price: 10, title: 'Tee' });
    });

    it('lets a full remote read absorb a partial payload', async () => {
      const base = { entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'inbound' } as const;

      await queue.enqueue({ ...base, priority: 10, payload: { price: 10 } });
      await queue.enqueue({ ...base, priority: 10, payload: null });
      await queue.enqueue({ ...base, priority: 10, payload: { title: 'Tee' } });

      expect((await queue.get('job-00000001'))?.payload).toBeNull();
    });

    it('keeps jobs of different directions apart', async () => {
      await queue.enqueue({ entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'inbound' });
      const outbound = await queue.enqueue({
        entityType: 'product',
        localRef: 'L1',
        remoteRef: 'R1',
        operation: 'update',
        direction: 'outbound',
      });

      expect(outbound).toEqual({ jobId: 'job-00000002', coalesced: false });
    });

    it('does not merge into a job that is already processing', async () => {
      const job = { entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'outbound' } as const;
      await queue.enqueue(job);
      await queue.claimNext('w1');

      expect(await queue.enqueue(job)).toEqual({ jobId: 'job-00000002', coalesced: false });
    });

    it('rejects jobs without the references their operation needs', async () => {
      await expect(
        queue.enqueue({ entityType: 'product', operation: 'import', direction: 'inbound' })
      ).rejects.toThrow(CommerceApiError);
      await expect(
        queue.enqueue({ entityType: 'product', localRef: 'L1', operation: 'update', direction: 'outbound' })
      ).rejects.toThrow('update job for product needs both references');
    });

    it('emits the enqueue and its pending status', async () => {
      const events = createEventBus();
      const statuses: JobStatus[] = [];
      events.onJobStatus((event) => statuses.push(event.payload.status));
      const observed = new SyncJobQueue({ store, clock, events });

      await observed.enqueue({ entityType: 'product', localRef: 'L1', operation: 'create', direction: 'outbound' });
      await observed.enqueue({ entityType: 'product', localRef: 'L1', operation: 'create', direction: 'outbound' });

      expect(statuses).toEqual(['pending']);
    });
  });

  describe('claimNext', () => {
    it('claims by priority, then in creation order', async () => {
      await queue.enqueue({ entityType: 'product', localRef: 'A', operation: 'create', direction: 'outbound', priority: 50 });
      await queue.enqueue({ entityType: 'product', localRef: 'B', operation: 'create', direction: 'outbound', priority: 10 });
      await queue.enqueue({ entityType: 'product', localRef: 'C', operation: 'create', direction: 'outbound', priority: 10 });

      const order: Array<string | null | undefined> = [];
      for (let i = 0; i < 3; i++) {
        const job = await queue.claimNext('w1');
        order.push(job?.localRef);
      }

      expect(order).toEqual(['B', 'C', 'A']);
      expect(await queue.claimNext('w1')).toBeNull();
    });

    it('never hands out two jobs of the same record at once', async () => {
      await queue.enqueue({ entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'inbound' });
      await queue.enqueue({ entityType: 'product', localRef: 'L1', remoteRef: 'R1', operation: 'update', direction: 'outbound' });

      const first = await queue.claimNext('w1');
      expect(first?.id).toBe('job-00000001');
      expect(await queue.claimNext('w2')).toBeNull();

      await queue.markDone('job-00000001', 'w1');
      expect((await queue.claimNext('w2'))?.id).toBe('job-00000002');
    });

    it('holds a delete back until earlier writes of the record finished', async () => {
      await queue.enqueue({ entityType: 'product', localRef: 'L5', operation: 'create', direction: 'outbound', priority: 20 });
      await queue.enqueue({
        entityType: 'product',
        localRef: 'L5',
        remoteRef: 'R5',
        operation: 'delete',
        direction: 'outbound',
        priority: 10,
      });

      expect((await queue.claimNext('w1'))?.operation).toBe('create');
      expect(await queue.claimNext('w2')).toBeNull();

      await queue.markDone('job-00000001', 'w1');
      expect((await queue.claimNext('w2'))?.operation).toBe('delete');
    });
  });

  describe('failures', () => {
    beforeEach(async () => {
      await queue.enqueue({ entityType: 'product', localRef: 'L1', operation: 'create', direction: 'outbound' });
      await queue.claimNext('w1');
    });

    it('schedules a retryable failure after the backoff delay', async () => {
      const outcome = await queue.markFailed('job-00000001', 'w1', apiError('transient', 'Connection reset'));

      expect(outcome).toEqual({ recorded: true, retryable: true, runAfter: new Date(1000) });
      const job = await queue.get('job-00000001');
      expect(job?.status).toBe('failed');
      expect(job?.retryCount).toBe(1);
      expect(job?.lastError).toBe('transient: Connection reset');

      expect(await queue.requeueRetryable()).toEqual([]);
      clock.advance(1000);
      expect(await queue.requeueRetryable()).toEqual(['job-00000001']);
      expect((await queue.get('job-00000001'))?.status).toBe('pending');
    });

    it('uses the server retry hint as a floor', async () => {
      const outcome = await queue.markFailed(
        'job-00000001',
        'w1',
        apiError('throttle', 'Throttled', { retryAfterMs: 4500 })
      );

      expect(outcome.runAfter).toEqual(new Date(4500));
    });

    it('keeps terminal failures for the operator', async () => {
      const outcome = await queue.markFailed('job-00000001', 'w1', apiError('validation', "title: Title can't be blank"));

      expect(outcome.retryable).toBe(false);
      clock.advance(60000);
      expect(await queue.requeueRetryable()).toEqual([]);

      const failed = await queue.listFailed();
      expect(failed.map((job) => job.id)).toEqual(['job-00000001']);
      expect(failed[0]?.lastError).toBe("validation: title: Title can't be blank");
    });

    it('turns terminal once the retry budget is spent', async () => {
      for (let attempt = 1; attempt < 3; attempt++) {
        await queue.markFailed('job-00000001', 'w1', apiError('transient', 'Timeout'));
        clock.advance(60000);
        await queue.requeueRetryable();
        await queue.claimNext('w1');
      }
      const last = await queue.markFailed('job-00000001', 'w1', apiError('transient', 'Timeout'));

      expect(last.retryable).toBe(false);
      expect((await queue.get('job-00000001'))?.retryCount).toBe(3);
      expect((await queue.listFailed()).map((job) => job.id)).toEqual(['job-00000001']);
    });

    it('resets the retry budget on a manual retry', async () => {
      await queue.markFailed('job-00000001', 'w1', apiError('conflict', 'Mapping collides'));

      expect(await queue.retry('job-00000001')).toBe(true);
      const job = await queue.get('job-00000001');
      expect(job?.status).toBe('pending');
      expect(job?.retryCount).toBe(0);
      expect(await queue.retry('job-00000001')).toBe(false);
    });

    it('rejects transitions from a worker that no longer holds the claim', async () => {
      expect(await queue.markDone('job-00000001', 'w2')).toBe(false);
      expect(await queue.markFailed('job-00000001', 'w2', apiError('transient', 'Timeout'))).toEqual({
        recorded: false,
        retryable: false,
        runAfter: new Date(0),
      });
      expect((await queue.get('job-00000001'))?.status).toBe('processing');
    });

    it('returns stale claims to pending and refuses their late completion', async () => {
      clock.advance(30001);

      expect(await queue.releaseStaleClaims(30000)).toEqual(['job-00000001']);
      expect(await queue.markDone('job-00000001', 'w1')).toBe(false);
      expect((await queue.get('job-00000001'))?.status).toBe('pending');
    });
  });
});
