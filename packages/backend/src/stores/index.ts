import type { SyncEngineStores } from '@commercesync/sync-engine';
import type { Clock } from '@commercesync/integrations';
import type { Database } from '../db/index.js';
import { DrizzleLocalCatalog } from './catalog.js';
import { DrizzleIdentityStore } from './identity.js';
import { DrizzleJobStore } from './jobs.js';
import { DrizzleWebhookEventStore } from './webhooks.js';

export { DrizzleJobStore, jobIdOf, seqOf, toSyncJob } from './jobs.js';
export { DrizzleIdentityStore, isUniqueViolation } from './identity.js';
export { DrizzleWebhookEventStore } from './webhooks.js';
export { DrizzleLocalCatalog } from './catalog.js';

/**
 * Every store the engine needs, over one database
 */
export function createPostgresStores(db: Database, clock?: Clock): SyncEngineStores {
  return {
    jobs: new DrizzleJobStore(db),
    identity: new DrizzleIdentityStore(db),
    webhooks: new DrizzleWebhookEventStore(db),
    catalog: new DrizzleLocalCatalog(db, clock),
  };
}
