/**
 * Postgres local catalog
 * The local system of record. Listeners run after each write commits and are
 * awaited before the write resolves, matching the in-memory catalog.
 */

import { randomUUID } from 'crypto';
import { and, asc, eq, gt, sql } from 'drizzle-orm';
import { systemClock, type Clock } from '@commercesync/integrations';
import type {
  EntityFields,
  EntityType,
  LocalCatalog,
  LocalChange,
  LocalChangeListener,
  LocalRecord,
  WriteOrigin,
} from '@commercesync/sync-engine';
import type { Database } from '../db/index.js';
import { localRecords, type LocalRecordRow } from '../db/schema.js';

function toRecord(row: LocalRecordRow): LocalRecord {
  return { entityType: row.entityType, localRef: row.localRef, fields: row.fields, updatedAt: row.updatedAt };
}

export class DrizzleLocalCatalog implements LocalCatalog {
  private readonly listeners = new Set<LocalChangeListener>();

  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  async get(entityType: EntityType, localRef: string): Promise<LocalRecord | null> {
    const [row] = await this.db.select().from(localRecords).where(this.recordKey(entityType, localRef)).limit(1);
    return row ? toRecord(row) : null;
  }

  async list(entityType: EntityType, options: { modifiedSince?: Date } = {}): Promise<LocalRecord[]> {
    const rows = await this.db
      .select()
      .from(localRecords)
      .where(
        and(
          eq(localRecords.entityType, entityType),
          options.modifiedSince ? gt(localRecords.updatedAt, options.modifiedSince) : undefined
        )
      )
      .orderBy(asc(localRecords.updatedAt), asc(localRecords.localRef));
    return rows.map(toRecord);
  }

  async create(entityType: EntityType, fields: EntityFields, origin: WriteOrigin): Promise<LocalRecord> {
    const now = new Date(this.clock.now());
    const [row] = await this.db
      .insert(localRecords)
      .values({ entityType, localRef: `${entityType}-${randomUUID()}`, fields, updatedAt: now })
      .returning();
    if (!row) {
      throw new Error('Local record insert returned no row');
    }
    const record = toRecord(row);
    await this.notify({ entityType, localRef: record.localRef, kind: 'create', fields: record.fields, origin, at: now });
    return record;
  }

  async update(
    entityType: EntityType,
    localRef: string,
    fields: EntityFields,
    origin: WriteOrigin
  ): Promise<LocalRecord | null> {
    const now = new Date(this.clock.now());
    const [row] = await this.db
      .update(localRecords)
      .set({ fields: sql`${localRecords.fields} || ${JSON.stringify(fields)}::jsonb`, updatedAt: now })
      .where(this.recordKey(entityType, localRef))
      .returning();
    if (!row) {
      return null;
    }
    const record = toRecord(row);
    await this.notify({ entityType, localRef, kind: 'update', fields: record.fields, origin, at: now });
    return record;
  }

  async delete(entityType: EntityType, localRef: string, origin: WriteOrigin): Promise<boolean> {
    const [row] = await this.db
      .delete(localRecords)
      .where(this.recordKey(entityType, localRef))
      .returning({ fields: localRecords.fields });
    if (!row) {
      return false;
    }
    await this.notify({
      entityType,
      localRef,
      kind: 'delete',
      fields: row.fields,
      origin,
      at: new Date(this.clock.now()),
    });
    return true;
  }

  onChange(listener: LocalChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private recordKey(entityType: EntityType, localRef: string) {
    return and(eq(localRecords.entityType, entityType), eq(localRecords.localRef, localRef));
  }

  private async notify(change: LocalChange): Promise<void> {
    for (const listener of [...this.listeners]) {
      await listener(change);
    }
  }
}
