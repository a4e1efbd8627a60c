// Main exports file for @commercesync/backend package
// Re-exports the application factory, persistence and scheduling for embedding

// Application
export { buildApp, type BuildAppOptions } from './app.js';

// Database exports
export {
  createDatabase,
  checkDatabaseConnection,
  closeDatabaseConnection,
  runMigrations,
  type Database,
  type DatabaseHandle,
} from './db/index.js';

// Schema exports (tables and enums)
export {
  syncJobs,
  identityMappings,
  identityLocks,
  webhookEvents,
  localRecords,
  entityTypeEnum,
  syncOperationEnum,
  syncDirectionEnum,
  jobStatusEnum,
  errorKindEnum,
} from './db/schema.js';

export type {
  SyncJobRow,
  NewSyncJobRow,
  IdentityMappingRow,
  IdentityLockRow,
  WebhookEventRow,
  LocalRecordRow,
} from './db/schema.js';

// Postgres stores
export {
  createPostgresStores,
  DrizzleJobStore,
  DrizzleIdentityStore,
  DrizzleWebhookEventStore,
  DrizzleLocalCatalog,
} from './stores/index.js';

// All types from types module
export * from './types/index.js';

// Config
export { loadConfig, ConfigError, type Config } from './config/index.js';

// Operator auth middleware
export { requireOperatorToken, bearerToken } from './middleware/auth.js';

// Scheduling
export {
  SyncScheduler,
  createRedisConnection,
  SCHEDULE_QUEUE,
  type ScheduledJobData,
  type ScheduledJobResult,
  type SyncSchedulerOptions,
} from './queues/index.js';

// Routes
export * from './routes/index.js';
