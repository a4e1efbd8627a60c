/**
 * Entity Handler Tests
 * Handlers against the in-process platform stand-in
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CommerceGraphQLClient, ManualClock } from '@commercesync/integrations';
import { MockCommercePlatform, type MockPlatformOptions } from '@commercesync/integrations/testing';
import { InventoryLevelHandler, OrderHandler, ProductHandler, VariantHandler, type HandlerContext } from '../entities/index.js';

const context: HandlerContext = {
  resolveRemote: async (_entityType, localRef) => (localRef === 'L-prod' ? 'gid://shopify/Product/1001' : null),
};

describe('entity handlers', () => {
  let clock: ManualClock;
  let platform: MockCommercePlatform;
  let client: CommerceGraphQLClient;

  function connect(options: MockPlatformOptions = {}): void {
    platform = new MockCommercePlatform(options);
    client = new CommerceGraphQLClient({
      shopDomain: 'test-shop.example.com',
      accessToken: 'test-token',
      httpClient: platform.http,
      clock,
    });
  }

  beforeEach(() => {
    clock = new ManualClock(0);
    connect();
  });

  describe('ProductHandler', () => {
    it('creates a product from the fields it sets', async () => {
      const handler = new ProductHandler(client);

      const result = await handler.createRemote({ title: 'Mug', status: 'DRAFT', vendor: null });

      expect(result).toEqual({ ok: true, value: 'gid://shopify/Product/1001' });
      const request = platform.transport.requests.find((entry) => entry.operationName === 'SyncProductCreate');
      expect(request?.variables).toEqual({ product: { title: 'Mug', status: 'DRAFT' } });
    });

    it('surfaces user errors as a validation failure', async () => {
      const result = await new ProductHandler(client).createRemote({});

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.message).toBe("title: Title can't be blank");
      }
    });

    it('lists only products modified after the cutoff', async () => {
      platform.seed('Product', { title: 'Old', updatedAt: '2026-01-01T00:00:00.000Z' });
      const fresh = platform.seed('Product', { title: 'New', updatedAt: '2026-01-02T00:00:00.000Z' });

      const result = await new ProductHandler(client).listRemote({ since: new Date('2026-01-01T12:00:00.000Z') });

      expect(result.ok && result.value.map((record) => record.remoteRef)).toEqual([fresh.id]);
      expect(result.ok && result.value[0]?.updatedAt).toEqual(new Date('2026-01-02T00:00:00.000Z'));
    });

    it('follows cursors across pages', async () => {
      connect({ pageSize: 1 });
      for (const title of ['A', 'B', 'C']) {
        platform.seed('Product', { title });
      }

      const result = await new ProductHandler(client).listRemote();

      expect(result.ok && result.value.map((record) => record.fields.title)).toEqual(['A', 'B', 'C']);
      expect(platform.calls('SyncProductsPage')).toBe(3);
    });

    it('exports the full collection through a bulk operation', async () => {
      connect({ bulkPollsBeforeComplete: 2 });
      platform.seed('Product', { title: 'A' });
      platform.seed('Product', { title: 'B' });

      const result = await new ProductHandler(client).listRemote({ full: true });

      expect(result.ok && result.value.map((record) => record.fields.title)).toEqual(['A', 'B']);
      expect(platform.calls('SyncBulkRun')).toBe(1);
      expect(platform.calls('SyncBulkStatus')).toBe(3);
      expect(clock.sleeps).toEqual([1000, 1500]);
    });
  });

  describe('VariantHandler', () => {
    it('creates a variant under the product its local ref resolves to', async () => {
      platform.seed('Product', { title: 'Mug' });
      const handler = new VariantHandler(client);

      const created = await handler.createRemote({ productRef: 'L-prod', title: 'Large', price: 12.5 }, context);
      expect(created).toEqual({ ok: true, value: 'gid://shopify/ProductVariant/1002' });

      const fetched = await handler.fetchRemote('gid://shopify/ProductVariant/1002');
      expect(fetched.ok && fetched.value?.fields).toEqual({
        productRef: 'gid://shopify/Product/1001',
        sku: null,
        title: 'Large',
        price: 12.5,
        barcode: null,
      });
    });

    it('retries later while the product is not synced yet', async () => {
      const result = await new VariantHandler(client).createRemote({ productRef: 'L-missing' }, context);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('transient');
        expect(result.error.message).toBe('Product L-missing of variant is not synced yet');
        expect(result.error.retryAfterMs).toBe(5000);
      }
    });

    it('treats a variant that is already gone as deleted', async () => {
      const result = await new VariantHandler(client).deleteRemote('gid://shopify/ProductVariant/999', null, context);

      expect(result).toEqual({ ok: true, value: undefined });
      expect(platform.calls('SyncVariant')).toBe(1);
      expect(platform.calls('SyncVariantsDelete')).toBe(0);
    });
  });

  describe('InventoryLevelHandler', () => {
    it('sets the available quantity at the level position', async () => {
      const level = platform.seed('InventoryLevel', {
        inventoryItemId: 'gid://shopify/InventoryItem/5',
        locationId: 'gid://shopify/Location/1',
        available: 3,
        sku: 'SKU-1',
      });
      const handler = new InventoryLevelHandler(client);

      const updated = await handler.updateRemote(level.id, {
        inventoryItemRef: 'gid://shopify/InventoryItem/5',
        locationRef: 'gid://shopify/Location/1',
        available: 8,
      });

      expect(updated.ok).toBe(true);
      const request = platform.transport.requests.find((entry) => entry.operationName === 'SyncInventorySet');
      expect(request?.variables).toEqual({
        input: {
          name: 'available',
          reason: 'correction',
          ignoreCompareQuantity: true,
          quantities: [{ inventoryItemId: 'gid://shopify/InventoryItem/5', locationId: 'gid://shopify/Location/1', quantity: 8 }],
        },
      });
      const fetched = await handler.fetchRemote(level.id);
      expect(fetched.ok && fetched.value?.fields.available).toBe(8);
    });
  });

  describe('OrderHandler', () => {
    it('refuses writes', async () => {
      const result = await new OrderHandler(client).createRemote({});

      expect(!result.ok && result.error.message).toBe('order records are read-only; cannot create');
      expect(platform.transport.requests).toEqual([]);
    });
  });
});
