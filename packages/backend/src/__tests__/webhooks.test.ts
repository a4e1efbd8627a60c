/**
 * Webhook Routes Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { computeWebhookSignature, WEBHOOK_HEADERS } from '@commercesync/integrations';
import { TEST_SECRET, signedDelivery } from '@commercesync/sync-engine/testing';
import { createTestApp, type TestApp } from './utils/app.js';

describe('POST /webhooks', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
    await ctx.fixture.engine.close();
  });

  function deliver(rawBody: string, headers: Record<string, string>) {
    return ctx.app.inject({
      method: 'POST',
      url: '/webhooks',
      headers: { 'content-type': 'application/json', ...headers },
      payload: rawBody,
    });
  }

  it('accepts a signed delivery and enqueues its job', async () => {
    const { rawBody, headers } = signedDelivery('products/create', { id: 77, fields: { title: 'Lamp' } }, 'evt-1');

    const response = await deliver(rawBody, headers);

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'accepted' });
    expect(
      ctx.fixture.jobs.all().map((job) => [job.operation, job.direction, job.remoteRef, job.payload])
    ).toEqual([['import', 'inbound', 'gid://shopify/Product/77', { title: 'Lamp' }]]);
  });

  it('verifies the signature over the bytes exactly as sent', async () => {
    const rawBody = '{ "id": 5,  "fields": { "title": "Café" } }';
    const headers = {
      [WEBHOOK_HEADERS.topic]: 'products/create',
      [WEBHOOK_HEADERS.signature]: computeWebhookSignature(rawBody, TEST_SECRET),
      [WEBHOOK_HEADERS.eventId]: 'evt-raw',
    };

    const response = await deliver(rawBody, headers);

    expect(response.statusCode).toBe(200);
    expect(ctx.fixture.jobs.all().map((job) => job.payload)).toEqual([{ title: 'Café' }]);
  });

  it('rejects a delivery with a wrong signature without enqueueing', async () => {
    const { rawBody, headers } = signedDelivery('products/create', { id: 77 }, 'evt-1');

    const response = await deliver(rawBody, { ...headers, [WEBHOOK_HEADERS.signature]: computeWebhookSignature(rawBody, 'other-secret') });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ status: 'rejected', message: 'Invalid signature' });
    expect(ctx.fixture.jobs.all()).toEqual([]);
    expect(ctx.fixture.webhooks.rejected.map((receipt) => receipt.eventId)).toEqual(['evt-1']);
  });

  it('rejects a delivery without a signature header', async () => {
    const response = await deliver('{"id":77}', { [WEBHOOK_HEADERS.topic]: 'products/create' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ status: 'rejected', message: 'Missing signature header' });
  });

  it('acknowledges a redelivery without enqueueing again', async () => {
    const { rawBody, headers } = signedDelivery('products/create', { id: 77, fields: { title: 'Lamp' } }, 'evt-1');

    const first = await deliver(rawBody, headers);
    const second = await deliver(rawBody, headers);

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
    expect(second.json()).toEqual({ status: 'accepted' });
    expect(ctx.fixture.jobs.all()).toHaveLength(1);
  });

  it('accepts an unknown topic with no jobs', async () => {
    const { rawBody, headers } = signedDelivery('shop/update', {}, 'evt-shop');

    const response = await deliver(rawBody, headers);

    expect(response.statusCode).toBe(200);
    expect(ctx.fixture.jobs.all()).toEqual([]);
  });
});
