import { createLogger } from '@commercesync/integrations';
import { createSyncEngine } from '@commercesync/sync-engine';
import type { FastifyInstance } from 'fastify';
import type { Redis } from 'ioredis';
import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { checkDatabaseConnection, closeDatabaseConnection, createDatabase, runMigrations } from './db/index.js';
import { SyncScheduler, createRedisConnection } from './queues/index.js';
import { createPostgresStores } from './stores/index.js';

const logger = createLogger('server');

// Start server
async function start(): Promise<void> {
  const config = loadConfig();

  const { pool, db } = createDatabase(config.DATABASE_URL);
  await runMigrations(pool);

  const engine = createSyncEngine({
    config: {
      workerId: config.WORKER_ID,
      concurrency: config.WORKER_CONCURRENCY,
      jobTimeoutMs: config.JOB_TIMEOUT_MS,
      maxRetries: config.SYNC_MAX_RETRIES,
      webhookSecret: config.WEBHOOK_SECRET,
    },
    integration: {
      shopDomain: config.SHOP_DOMAIN,
      accessToken: config.SHOP_ACCESS_TOKEN,
      apiVersion: config.SHOP_API_VERSION,
      requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    },
    stores: createPostgresStores(db),
  });

  const app: FastifyInstance = await buildApp({
    engine,
    config,
    checkDatabase: () => checkDatabaseConnection(pool),
  });

  engine.start();

  // Scheduling needs Redis; the HTTP surface and workers run without it
  const redis: Redis = createRedisConnection(config.REDIS_URL);
  const scheduler = new SyncScheduler({
    connection: redis,
    engine,
    sweepEntityTypes: config.SWEEP_ENTITY_TYPES,
    sweepIntervalMs: config.SWEEP_INTERVAL_MS,
    fullSweepIntervalMs: config.FULL_SWEEP_INTERVAL_MS,
    maintenanceIntervalMs: config.MAINTENANCE_INTERVAL_MS,
  });
  scheduler.start().catch((error: unknown) => {
    app.log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start scheduler');
    app.log.warn('The server will continue without periodic sweeps');
  });

  // Start listening
  const address = await app.listen({
    port: config.PORT,
    host: config.HOST,
  });

  app.log.info(`Commerce Sync running at ${address}`);
  app.log.info(`Environment: ${config.NODE_ENV}`);

  // Graceful shutdown handler
  let shuttingDown = false;
  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    app.log.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
      // Close HTTP server
      await app.close();
      app.log.info('HTTP server closed');

      // Stop timers, then let in-flight jobs finish
      await scheduler.stop();
      await redis.quit();
      app.log.info('Scheduler closed');

      await engine.close();
      app.log.info('Sync engine stopped');

      // Close database connection
      await closeDatabaseConnection(pool);
      app.log.info('Database connection closed');

      process.exit(0);
    } catch (error) {
      app.log.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
      process.exit(1);
    }
  }

  // Register shutdown handlers
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
}

start().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
  process.exit(1);
});
