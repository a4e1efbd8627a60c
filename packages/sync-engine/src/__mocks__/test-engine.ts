/**
 * Engine fixture over in-memory stores, a fake remote and a manual clock
 */

import { CommerceGraphQLClient, ManualClock, computeWebhookSignature, WEBHOOK_HEADERS } from '@commercesync/integrations';
import { createScriptedTransport } from '@commercesync/integrations/testing';
import { SyncEngine, type SyncEngineOptions } from '../engine.js';
import { MemoryIdentityStore, MemoryJobStore, MemoryLocalCatalog, MemoryWebhookEventStore } from '../stores/memory.js';
import { FakeRemote } from './fake-remote.js';

export const TEST_SECRET = 'test-secret';
export const START = Date.parse('2026-01-01T00:00:00.000Z');

export interface TestEngine {
  engine: SyncEngine;
  remote: FakeRemote;
  clock: ManualClock;
  jobs: MemoryJobStore;
  identityStore: MemoryIdentityStore;
  webhooks: MemoryWebhookEventStore;
  catalog: MemoryLocalCatalog;
  client: CommerceGraphQLClient;
}

export function createTestEngine(options: Partial<SyncEngineOptions> = {}): TestEngine {
  const clock = new ManualClock(START);
  const remote = new FakeRemote(() => new Date(clock.now()));
  const jobs = new MemoryJobStore();
  const identityStore = new MemoryIdentityStore();
  const webhooks = new MemoryWebhookEventStore();
  const catalog = new MemoryLocalCatalog(clock);
  // Handlers are replaced by the fake remote; the client is never called
  const client = new CommerceGraphQLClient({
    shopDomain: 'test-shop.example.com',
    accessToken: 'test-token',
    httpClient: createScriptedTransport([]).http,
    clock,
  });

  const engine = new SyncEngine(
    { concurrency: 1, webhookSecret: TEST_SECRET, ...options },
    {
      stores: { jobs, identity: identityStore, webhooks, catalog },
      client,
      handlers: remote.handlers(),
      clock,
    }
  );
  return { engine, remote, clock, jobs, identityStore, webhooks, catalog, client };
}

/**
 * Body and headers of a signed delivery
 */
export function signedDelivery(
  topic: string,
  body: Record<string, unknown>,
  eventId?: string
): { rawBody: string; headers: Record<string, string> } {
  const rawBody = JSON.stringify(body);
  const headers: Record<string, string> = {
    [WEBHOOK_HEADERS.topic]: topic,
    [WEBHOOK_HEADERS.signature]: computeWebhookSignature(rawBody, TEST_SECRET),
  };
  if (eventId) {
    headers[WEBHOOK_HEADERS.eventId] = eventId;
  }
  return { rawBody, headers };
}

export { FakeRemote, type FakeCall, type FakeMethod } from './fake-remote.js';
