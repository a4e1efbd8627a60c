/**
 * Sync Engine Tests
 * End-to-end flows over in-memory stores and a fake remote
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { apiError } from '@commercesync/integrations';
import { contentHash } from '../hash.js';
import { START, createTestEngine, signedDelivery, type TestEngine } from '../__mocks__/test-engine.js';
import type { EntityFields, JobStatus } from '../types.js';

describe('SyncEngine', () => {
  let fixture: TestEngine;

  beforeEach(() => {
    fixture = createTestEngine();
  });

  async function seedMappedProduct(fields: EntityFields): Promise<string> {
    const remoteRef = fixture.remote.seed('product', fields);
    fixture.catalog.seed('product', 'L1', fields);
    await fixture.engine.identity.upsert({
      entityType: 'product',
      localRef: 'L1',
      remoteRef,
      contentHash: contentHash(fields),
    });
    return remoteRef;
  }

  describe('inbound webhook', () => {
    it('applies a partial update to the mapped local record', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt', price: 5 });
      const { rawBody, headers } = signedDelivery(
        'products/update',
        { admin_graphql_api_id: remoteRef, fields: { price: 10 } },
        'evt-1'
      );

      const received = await fixture.engine.receiveWebhook(rawBody, headers);
      const handled = await fixture.engine.drain();

      expect(received.ok && received.value.jobIds).toEqual(['job-00000001']);
      expect(handled).toBe(1);
      expect((await fixture.catalog.get('product', 'L1'))?.fields).toEqual({ title: 'Shirt', price: 10 });
      expect((await fixture.engine.identity.findByLocal('product', 'L1'))?.contentHash).toBe(
        contentHash({ title: 'Shirt', price: 10 })
      );
      // The sync write is not echoed back to the platform
      expect(fixture.remote.count('update')).toBe(0);
      expect(await fixture.jobs.countByStatus()).toEqual({ pending: 0, processing: 0, done: 1, failed: 0 });
    });

    it('processes a duplicate delivery once', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt', price: 5 });
      const { rawBody, headers } = signedDelivery(
        'products/update',
        { admin_graphql_api_id: remoteRef, fields: { price: 10 } },
        'evt-1'
      );

      await fixture.engine.receiveWebhook(rawBody, headers);
      await fixture.engine.drain();
      const redelivered = await fixture.engine.receiveWebhook(rawBody, headers);
      const handled = await fixture.engine.drain();

      expect(redelivered.ok && redelivered.value.duplicate).toBe(true);
      expect(handled).toBe(0);
      expect(fixture.jobs.all()).toHaveLength(1);
    });

    it('imports an unknown object and maps it', async () => {
      const { rawBody, headers } = signedDelivery('products/create', { id: 77, fields: { title: 'Lamp' } }, 'evt-1');

      await fixture.engine.receiveWebhook(rawBody, headers);
      await fixture.engine.drain();

      expect(await fixture.catalog.get('product', 'product-1')).toMatchObject({ fields: { title: 'Lamp' } });
      expect(await fixture.engine.identity.resolveRemote('product', 'product-1')).toBe('gid://shopify/Product/77');
      expect(fixture.remote.count('create')).toBe(0);
    });

    it('fetches the remote state when the delivery carries no fields', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt' });
      fixture.remote.edit(remoteRef, { title: 'Shirt v2' });
      const { rawBody, headers } = signedDelivery('products/update', { admin_graphql_api_id: remoteRef }, 'evt-1');

      await fixture.engine.receiveWebhook(rawBody, headers);
      await fixture.engine.drain();

      expect(fixture.remote.count('fetch')).toBe(1);
      expect((await fixture.catalog.get('product', 'L1'))?.fields).toEqual({ title: 'Shirt v2' });
    });

    it('deletes the local record and archives its mapping', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt' });
      const { rawBody, headers } = signedDelivery('products/delete', { admin_graphql_api_id: remoteRef }, 'evt-1');

      await fixture.engine.receiveWebhook(rawBody, headers);
      await fixture.engine.drain();

      expect(await fixture.catalog.get('product', 'L1')).toBeNull();
      expect((await fixture.engine.identity.findByLocal('product', 'L1'))?.archivedAt).toEqual(new Date(START));
      expect(fixture.remote.count('delete')).toBe(0);
    });
  });

  describe('outbound changes', () => {
    it('pushes a user edit once and ignores its echo', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt', price: 5 });

      await fixture.catalog.update('product', 'L1', { price: 7 }, 'user');
      await fixture.engine.drain();

      expect(fixture.remote.objects.get(remoteRef)?.fields).toEqual({ title: 'Shirt', price: 7 });

      fixture.clock.advance(1000);
      const { rawBody, headers } = signedDelivery(
        'products/update',
        { admin_graphql_api_id: remoteRef, fields: { title: 'Shirt', price: 7 } },
        'evt-echo'
      );
      await fixture.engine.receiveWebhook(rawBody, headers);
      await fixture.engine.drain();

      expect((await fixture.catalog.get('product', 'L1'))?.updatedAt).toEqual(new Date(START));
      expect(fixture.remote.count('update')).toBe(1);
      expect(await fixture.jobs.countByStatus()).toEqual({ pending: 0, processing: 0, done: 2, failed: 0 });
    });

    it('retries a throttled create until it succeeds', async () => {
      const statuses: JobStatus[] = [];
      fixture.engine.events.onJobStatus((event) => statuses.push(event.payload.status));
      fixture.remote.failNext('create', apiError('throttle', 'Throttled', { retryAfterMs: 2000 }), 2);

      await fixture.catalog.create('product', { title: 'Mug' }, 'user');
      await fixture.engine.drain();
      expect(await fixture.engine.runMaintenance()).toEqual({ requeued: 0, releasedClaims: 0, purgedReceipts: 0 });

      fixture.clock.advance(2000);
      expect((await fixture.engine.runMaintenance()).requeued).toBe(1);
      await fixture.engine.drain();

      fixture.clock.advance(3000);
      expect((await fixture.engine.runMaintenance()).requeued).toBe(1);
      await fixture.engine.drain();

      expect(statuses).toEqual([
        'pending',
        'processing',
        'failed',
        'pending',
        'processing',
        'failed',
        'pending',
        'processing',
        'done',
      ]);
      expect((await fixture.jobs.get('job-00000001'))?.retryCount).toBe(2);
      expect(fixture.remote.count('create')).toBe(3);
      expect(fixture.remote.ofType('product')).toEqual([{ remoteRef: 'gid://shopify/Product/1', fields: { title: 'Mug' } }]);
      expect(await fixture.engine.identity.resolveRemote('product', 'product-1')).toBe('gid://shopify/Product/1');
    });

    it('deletes the remote object of a deleted local record', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt' });

      await fixture.catalog.delete('product', 'L1', 'user');
      await fixture.engine.drain();

      expect(fixture.remote.objects.has(remoteRef)).toBe(false);
      expect(fixture.remote.calls.find((call) => call.method === 'delete')?.fields).toEqual({ title: 'Shirt' });
      expect(await fixture.engine.identity.resolveRemote('product', 'L1')).toBeNull();
    });

    it('discards updates of a deleted record that reach it before the remote delete', async () => {
      const remoteRef = await seedMappedProduct({ title: 'Shirt', price: 5 });
      const early = signedDelivery('products/update', { admin_graphql_api_id: remoteRef, fields: { price: 8 } }, 'evt-1');
      await fixture.engine.receiveWebhook(early.rawBody, early.headers);

      await fixture.catalog.delete('product', 'L1', 'user');
      const late = signedDelivery('products/update', { admin_graphql_api_id: remoteRef, fields: { price: 9 } }, 'evt-2');
      const received = await fixture.engine.receiveWebhook(late.rawBody, late.headers);
      const handled = await fixture.engine.drain();

      expect(received.ok && received.value.jobIds).toEqual([]);
      expect(handled).toBe(2);
      expect(await fixture.catalog.list('product')).toEqual([]);
      expect(fixture.remote.objects.has(remoteRef)).toBe(false);
      expect(fixture.remote.count('delete')).toBe(1);
      expect(await fixture.jobs.countByStatus()).toEqual({ pending: 0, processing: 0, done: 2, failed: 0 });
    });

    it('creates one remote object when a timed-out create is retried', async () => {
      fixture = createTestEngine({ jobTimeoutMs: 20 });
      fixture.remote.holdCreates();

      await fixture.catalog.create('product', { title: 'Mug' }, 'user');
      await fixture.engine.drain();
      expect((await fixture.jobs.get('job-00000001'))?.lastError).toBe('transient: Job timed out after 20ms');

      // The abandoned create still holds the lease
      fixture.clock.advance(5000);
      expect((await fixture.engine.runMaintenance()).requeued).toBe(1);
      await fixture.engine.drain();
      expect((await fixture.jobs.get('job-00000001'))?.lastError).toBe(
        'transient: Create of product product-1 already in progress'
      );

      fixture.remote.release();
      await new Promise((resolve) => setTimeout(resolve, 0));
      fixture.clock.advance(5000);
      expect((await fixture.engine.runMaintenance()).requeued).toBe(1);
      await fixture.engine.drain();

      expect(fixture.remote.count('create')).toBe(1);
      expect(fixture.remote.ofType('product')).toEqual([{ remoteRef: 'gid://shopify/Product/1', fields: { title: 'Mug' } }]);
      expect((await fixture.jobs.get('job-00000001'))?.status).toBe('done');
      expect(await fixture.engine.identity.resolveRemote('product', 'product-1')).toBe('gid://shopify/Product/1');
    });

    it('never pushes types the platform owns', async () => {
      fixture.catalog.seed('order', 'order-1', { name: '#1001' });

      await fixture.catalog.update('order', 'order-1', { email: 'buyer@example.com' }, 'user');

      expect(fixture.jobs.all()).toEqual([]);
    });
  });

  describe('failures', () => {
    it('halts on a rejected credential and parks the job for the operator', async () => {
      const halted: string[] = [];
      fixture.engine.events.onCredentialHalted((event) => halted.push(event.payload.error.message));
      fixture.remote.failNext('create', apiError('auth', 'Invalid API key', { statusCode: 401 }));

      await fixture.catalog.create('product', { title: 'Mug' }, 'user');
      await fixture.engine.drain();

      expect(halted).toEqual(['Invalid API key']);
      const failed = await fixture.engine.listFailedJobs();
      expect(failed.map((job) => [job.id, job.errorKind, job.lastError])).toEqual([
        ['job-00000001', 'auth', 'auth: Invalid API key'],
      ]);

      expect(await fixture.engine.retryJob('job-00000001')).toBe(true);
      await fixture.engine.drain();
      expect((await fixture.jobs.get('job-00000001'))?.status).toBe('done');
    });

    it('reports a terminal failure on the event bus', async () => {
      const terminal: string[] = [];
      fixture.engine.events.onJobTerminal((event) => terminal.push(event.payload.job.id));
      fixture.remote.failNext('create', apiError('validation', "title: Title can't be blank"));

      await fixture.catalog.create('product', {}, 'user');
      await fixture.engine.drain();

      expect(terminal).toEqual(['job-00000001']);
    });
  });

  describe('maintenance', () => {
    it('purges webhook receipts past retention', async () => {
      const { rawBody, headers } = signedDelivery('shop/update', {}, 'evt-1');
      await fixture.engine.receiveWebhook(rawBody, headers);

      fixture.clock.advance(7 * 24 * 60 * 60 * 1000 + 1);

      expect(await fixture.engine.runMaintenance()).toEqual({ requeued: 0, releasedClaims: 0, purgedReceipts: 1 });
      expect(fixture.webhooks.get('shop/update', 'evt-1')).toBeNull();
    });
  });

  describe('lifecycle', () => {
    it('processes queued work once started and settles on stop', async () => {
      await fixture.catalog.create('product', { title: 'Mug' }, 'user');
      const done = new Promise<void>((resolve) => {
        fixture.engine.events.onJobStatus((event) => {
          if (event.payload.status === 'done') {
            resolve();
          }
        });
      });

      fixture.engine.start();
      await done;
      await fixture.engine.stop();

      const status = await fixture.engine.getStatus();
      expect(status.state).toBe('stopped');
      expect(status.startedAt).toEqual(new Date(START));
      expect(status.halted).toBe(false);
      expect(status.pool).toEqual({ state: 'stopped', concurrency: 1, inFlight: 0, processed: 1, failed: 0 });
      expect(status.jobs).toEqual({ pending: 0, processing: 0, done: 1, failed: 0 });
    });

    it('refuses to drain while workers are running', async () => {
      fixture.engine.start();

      await expect(fixture.engine.drain()).rejects.toThrow('drain() needs a stopped worker pool');
      await fixture.engine.stop();
    });

    it('requires a webhook secret', () => {
      expect(() => createTestEngine({ webhookSecret: '' })).toThrow('A webhook secret is required');
    });
  });
});
