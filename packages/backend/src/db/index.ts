import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { createLogger } from '@commercesync/integrations';
import * as schema from './schema.js';

const logger = createLogger('db');

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

// Create connection pool and drizzle instance
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    max: 20, // Maximum number of clients in the pool
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  // Handle pool errors
  pool.on('error', (error) => {
    logger.error({ error: error.message }, 'Unexpected error on idle database client');
  });

  return { pool, db: drizzle(pool, { schema }) };
}

// Export schema for convenience
export * from './schema.js';

// Health check function
export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    return true;
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Database connection check failed');
    return false;
  }
}

const MIGRATIONS: readonly string[] = [
  // Enum types (idempotent)
  `DO $$ BEGIN CREATE TYPE entity_type AS ENUM ('product', 'variant', 'inventory_level', 'order', 'customer'); EXCEPTION WHEN duplicate_object THEN null; END $$`,
  `DO $$ BEGIN CREATE TYPE sync_operation AS ENUM ('create', 'update', 'delete', 'import'); EXCEPTION WHEN duplicate_object THEN null; END $$`,
  `DO $$ BEGIN CREATE TYPE sync_direction AS ENUM ('inbound', 'outbound'); EXCEPTION WHEN duplicate_object THEN null; END $$`,
  `DO $$ BEGIN CREATE TYPE job_status AS ENUM ('pending', 'processing', 'done', 'failed'); EXCEPTION WHEN duplicate_object THEN null; END $$`,
  `DO $$ BEGIN CREATE TYPE error_kind AS ENUM ('validation', 'auth', 'throttle', 'transient', 'conflict', 'bulk_timeout'); EXCEPTION WHEN duplicate_object THEN null; END $$`,

  // Tables
  `CREATE TABLE IF NOT EXISTS sync_jobs (seq BIGSERIAL PRIMARY KEY, entity_type entity_type NOT NULL, local_ref VARCHAR(255), remote_ref VARCHAR(255), operation sync_operation NOT NULL, direction sync_direction NOT NULL, priority INTEGER NOT NULL, status job_status NOT NULL DEFAULT 'pending', retry_count INTEGER NOT NULL DEFAULT 0, max_retries INTEGER NOT NULL, last_error TEXT, error_kind error_kind, payload JSONB, coalescing_key TEXT NOT NULL, run_after TIMESTAMP WITH TIME ZONE NOT NULL, claimed_by VARCHAR(255), claimed_at TIMESTAMP WITH TIME ZONE, created_at TIMESTAMP WITH TIME ZONE NOT NULL, updated_at TIMESTAMP WITH TIME ZONE NOT NULL)`,
  `CREATE TABLE IF NOT EXISTS identity_mappings (id BIGSERIAL PRIMARY KEY, entity_type entity_type NOT NULL, local_ref VARCHAR(255) NOT NULL, remote_ref VARCHAR(255) NOT NULL, last_synced_at TIMESTAMP WITH TIME ZONE NOT NULL, content_hash VARCHAR(64), archived_at TIMESTAMP WITH TIME ZONE)`,
  `CREATE TABLE IF NOT EXISTS identity_locks (entity_type entity_type NOT NULL, local_ref VARCHAR(255) NOT NULL, holder VARCHAR(255) NOT NULL, expires_at TIMESTAMP WITH TIME ZONE NOT NULL, PRIMARY KEY (entity_type, local_ref))`,
  `CREATE TABLE IF NOT EXISTS webhook_events (id BIGSERIAL PRIMARY KEY, event_id VARCHAR(255) NOT NULL, topic VARCHAR(255) NOT NULL, received_at TIMESTAMP WITH TIME ZONE NOT NULL, signature_valid BOOLEAN NOT NULL, processed BOOLEAN NOT NULL DEFAULT false)`,
  `CREATE TABLE IF NOT EXISTS local_records (entity_type entity_type NOT NULL, local_ref VARCHAR(255) NOT NULL, fields JSONB NOT NULL, updated_at TIMESTAMP WITH TIME ZONE NOT NULL, created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL, PRIMARY KEY (entity_type, local_ref))`,

  // Indexes
  `CREATE INDEX IF NOT EXISTS idx_sync_jobs_status_run_after ON sync_jobs(status, run_after)`,
  `CREATE INDEX IF NOT EXISTS idx_sync_jobs_pending_key ON sync_jobs(coalescing_key) WHERE status = 'pending'`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_identity_active_local ON identity_mappings(entity_type, local_ref) WHERE archived_at IS NULL`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_identity_active_remote ON identity_mappings(entity_type, remote_ref) WHERE archived_at IS NULL`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_webhook_events_valid ON webhook_events(topic, event_id) WHERE signature_valid`,
  `CREATE INDEX IF NOT EXISTS idx_webhook_events_received_at ON webhook_events(received_at)`,
  `CREATE INDEX IF NOT EXISTS idx_local_records_updated_at ON local_records(entity_type, updated_at)`,
];

// Run database migrations on startup
export async function runMigrations(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    logger.info('Running database migrations...');
    for (const statement of MIGRATIONS) {
      await client.query(statement);
    }
    logger.info({ statements: MIGRATIONS.length }, 'Database migrations completed');
  } finally {
    client.release();
  }
}

// Graceful shutdown
export async function closeDatabaseConnection(pool: Pool): Promise<void> {
  await pool.end();
}
