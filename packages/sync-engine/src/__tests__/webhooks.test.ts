/**
 * Webhook Ingestor Tests
 * Signature gate, receipt deduplication and topic translation
 */

import crypto from 'crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import { WEBHOOK_HEADERS } from '@commercesync/integrations';
import { parseTopic, remoteRefOf } from '../webhooks/WebhookIngestor.js';
import { START, createTestEngine, signedDelivery, type TestEngine } from '../__mocks__/test-engine.js';

describe('WebhookIngestor', () => {
  let fixture: TestEngine;

  beforeEach(() => {
    fixture = createTestEngine();
  });

  describe('signature', () => {
    it('rejects a delivery signed with another secret and records it apart', async () => {
      const { rawBody, headers } = signedDelivery('products/create', { id: 42 }, 'evt-1');
      headers[WEBHOOK_HEADERS.signature] = crypto.createHmac('sha256', 'other-secret').update(rawBody).digest('base64');

      const result = await fixture.engine.receiveWebhook(rawBody, headers);

      expect(result).toEqual({
        ok: false,
        error: { status: 'rejected', reason: 'unauthorized', message: 'Invalid signature' },
      });
      expect(fixture.webhooks.rejected).toHaveLength(1);
      expect(fixture.webhooks.get('products/create', 'evt-1')).toBeNull();
      expect(fixture.jobs.all()).toEqual([]);
    });

    it('rejects a delivery without a signature header', async () => {
      const { rawBody, headers } = signedDelivery('products/create', { id: 42 });
      delete headers[WEBHOOK_HEADERS.signature];

      const result = await fixture.engine.receiveWebhook(rawBody, headers);

      expect(!result.ok && result.error.message).toBe('Missing signature header');
    });

    it('a rejected delivery does not block the genuine one with the same event id', async () => {
      const genuine = signedDelivery('products/create', { id: 42 }, 'evt-1');
      await fixture.engine.receiveWebhook(genuine.rawBody, {
        ...genuine.headers,
        [WEBHOOK_HEADERS.signature]: 'forged',
      });

      const result = await fixture.engine.receiveWebhook(genuine.rawBody, genuine.headers);

      expect(result.ok && result.value.duplicate).toBe(false);
      expect(result.ok && result.value.jobIds).toEqual(['job-00000001']);
    });
  });

  describe('deduplication', () => {
    it('accepts a redelivery without enqueueing again', async () => {
      const { rawBody, headers } = signedDelivery('products/create', { id: 42 }, 'evt-1');

      const first = await fixture.engine.receiveWebhook(rawBody, headers);
      const second = await fixture.engine.receiveWebhook(rawBody, headers);

      expect(first).toEqual({
        ok: true,
        value: { status: 'accepted', topic: 'products/create', eventId: 'evt-1', duplicate: false, jobIds: ['job-00000001'] },
      });
      expect(second).toEqual({
        ok: true,
        value: { status: 'accepted', topic: 'products/create', eventId: 'evt-1', duplicate: true, jobIds: [] },
      });
      expect(fixture.jobs.all()).toHaveLength(1);
      expect(fixture.webhooks.get('products/create', 'evt-1')?.processed).toBe(true);
    });

    it('falls back to the webhook id header, then to a digest of topic and body', async () => {
      const byWebhookId = signedDelivery('products/create', { id: 1 });
      byWebhookId.headers[WEBHOOK_HEADERS.webhookId] = 'wh-9';
      const anonymous = signedDelivery('products/create', { id: 2 });

      const first = await fixture.engine.receiveWebhook(byWebhookId.rawBody, byWebhookId.headers);
      const second = await fixture.engine.receiveWebhook(anonymous.rawBody, anonymous.headers);

      expect(first.ok && first.value.eventId).toBe('wh-9');
      const digest = crypto.createHash('sha256').update(`products/create\n${anonymous.rawBody}`).digest('hex');
      expect(second.ok && second.value.eventId).toBe(digest);
    });

    it('treats an unprocessed receipt as in flight until the reclaim window passed', async () => {
      await fixture.webhooks.recordReceipt({
        eventId: 'evt-7',
        topic: 'products/create',
        receivedAt: new Date(START),
        signatureValid: true,
        processed: false,
      });
      const { rawBody, headers } = signedDelivery('products/create', { id: 42 }, 'evt-7');

      const inFlight = await fixture.engine.receiveWebhook(rawBody, headers);
      expect(inFlight.ok && inFlight.value.duplicate).toBe(true);

      fixture.clock.advance(5 * 60 * 1000);
      const reclaimed = await fixture.engine.receiveWebhook(rawBody, headers);
      expect(reclaimed.ok && reclaimed.value.duplicate).toBe(false);
      expect(reclaimed.ok && reclaimed.value.jobIds).toEqual(['job-00000001']);
      expect(fixture.webhooks.get('products/create', 'evt-7')?.processed).toBe(true);
    });
  });

  describe('topic translation', () => {
    it('imports a created object with its fields as payload', async () => {
      const { rawBody, headers } = signedDelivery('products/create', { id: 42, fields: { title: 'Mug' } }, 'evt-1');

      await fixture.engine.receiveWebhook(rawBody, headers);

      const [job] = fixture.jobs.all();
      expect(job).toMatchObject({
        entityType: 'product',
        localRef: null,
        remoteRef: 'gid://shopify/Product/42',
        operation: 'import',
        direction: 'inbound',
        priority: 10,
        payload: { title: 'Mug' },
      });
    });

    it('updates a mapped object and imports an unmapped one', async () => {
      await fixture.engine.identity.upsert({ entityType: 'order', localRef: 'order-1', remoteRef: 'gid://shopify/Order/5' });
      const mapped = signedDelivery('orders/paid', { admin_graphql_api_id: 'gid://shopify/Order/5' }, 'evt-1');
      const unmapped = signedDelivery('orders/updated', { admin_graphql_api_id: 'gid://shopify/Order/6' }, 'evt-2');

      await fixture.engine.receiveWebhook(mapped.rawBody, mapped.headers);
      await fixture.engine.receiveWebhook(unmapped.rawBody, unmapped.headers);

      expect(fixture.jobs.all().map((job) => [job.operation, job.localRef, job.remoteRef, job.payload])).toEqual([
        ['update', 'order-1', 'gid://shopify/Order/5', null],
        ['import', null, 'gid://shopify/Order/6', null],
      ]);
    });

    it('enqueues a delete only for a mapped object', async () => {
      await fixture.engine.identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'gid://shopify/Product/1' });
      const mapped = signedDelivery('products/delete', { id: 1 }, 'evt-1');
      const unmapped = signedDelivery('products/delete', { id: 2 }, 'evt-2');

      const first = await fixture.engine.receiveWebhook(mapped.rawBody, mapped.headers);
      const second = await fixture.engine.receiveWebhook(unmapped.rawBody, unmapped.headers);

      expect(first.ok && first.value.jobIds).toEqual(['job-00000001']);
      expect(second.ok && second.value.jobIds).toEqual([]);
      expect(fixture.jobs.all()[0]).toMatchObject({ operation: 'delete', localRef: 'L1', payload: null });
    });

    it('discards events for archived mappings', async () => {
      await fixture.engine.identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'gid://shopify/Product/1' });
      await fixture.engine.identity.archive('product', 'L1');
      const { rawBody, headers } = signedDelivery('products/update', { id: 1, fields: { title: 'Late' } }, 'evt-1');

      const result = await fixture.engine.receiveWebhook(rawBody, headers);

      expect(result.ok && result.value.jobIds).toEqual([]);
    });

    it('fans a product update out to the variants it lists', async () => {
      const { rawBody, headers } = signedDelivery(
        'products/update',
        {
          id: 1,
          fields: { title: 'Mug' },
          variants: [{ id: 11, fields: { price: 12 } }, { id: 12 }, 'not-an-object'],
        },
        'evt-1'
      );

      const result = await fixture.engine.receiveWebhook(rawBody, headers);

      expect(result.ok && result.value.jobIds).toEqual(['job-00000001', 'job-00000002', 'job-00000003']);
      expect(fixture.jobs.all().map((job) => [job.entityType, job.remoteRef, job.payload])).toEqual([
        ['product', 'gid://shopify/Product/1', { title: 'Mug' }],
        ['variant', 'gid://shopify/ProductVariant/11', { price: 12 }],
        ['variant', 'gid://shopify/ProductVariant/12', null],
      ]);
    });

    it('accepts unknown topics and malformed bodies without jobs', async () => {
      const unknown = signedDelivery('shop/update', { id: 1 }, 'evt-1');
      const malformed = { rawBody: '{"id": 1,', headers: { ...signedDelivery('products/create', {}).headers } };
      malformed.headers[WEBHOOK_HEADERS.signature] = crypto
        .createHmac('sha256', 'test-secret')
        .update(malformed.rawBody)
        .digest('base64');
      malformed.headers[WEBHOOK_HEADERS.eventId] = 'evt-2';

      const first = await fixture.engine.receiveWebhook(unknown.rawBody, unknown.headers);
      const second = await fixture.engine.receiveWebhook(malformed.rawBody, malformed.headers);

      expect(first.ok && first.value.jobIds).toEqual([]);
      expect(second.ok && second.value).toEqual({
        status: 'accepted',
        topic: 'products/create',
        eventId: 'evt-2',
        duplicate: false,
        jobIds: [],
      });
    });
  });
});

describe('parseTopic', () => {
  it('singularises the resource and maps product variants', () => {
    expect(parseTopic('products/update')).toEqual({ entityType: 'product', action: 'update' });
    expect(parseTopic('product_variants/delete')).toEqual({ entityType: 'variant', action: 'delete' });
    expect(parseTopic('inventory_levels/update')).toEqual({ entityType: 'inventory_level', action: 'update' });
    expect(parseTopic('Orders/Paid')).toEqual({ entityType: 'order', action: 'paid' });
  });

  it('returns null for unknown or incomplete topics', () => {
    expect(parseTopic('app/uninstalled')).toBeNull();
    expect(parseTopic('products')).toBeNull();
  });
});

describe('remoteRefOf', () => {
  it('prefers an explicit reference over the numeric id', () => {
    expect(remoteRefOf('customer', { remote_ref: 'gid://shopify/Customer/3', id: 4 })).toBe('gid://shopify/Customer/3');
    expect(remoteRefOf('customer', { id: '4' })).toBe('gid://shopify/Customer/4');
    expect(remoteRefOf('customer', { id: 'abc' })).toBeNull();
  });
});
