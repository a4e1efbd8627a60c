/**
 * Postgres identity store
 * Partial unique indexes keep one active mapping per local and per remote ref.
 */

import { and, desc, eq, isNull, lte, or } from 'drizzle-orm';
import type {
  EntityType,
  IdentityMapping,
  IdentityStore,
  InsertOutcome,
  UpdateOutcome,
} from '@commercesync/sync-engine';
import type { Database } from '../db/index.js';
import { identityLocks, identityMappings, type IdentityMappingRow } from '../db/schema.js';

const UNIQUE_VIOLATION = '23505';

function toMapping(row: IdentityMappingRow): IdentityMapping {
  return {
    entityType: row.entityType,
    localRef: row.localRef,
    remoteRef: row.remoteRef,
    lastSyncedAt: row.lastSyncedAt,
    contentHash: row.contentHash,
    archivedAt: row.archivedAt,
  };
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class DrizzleIdentityStore implements IdentityStore {
  constructor(private readonly db: Database) {}

  async findByLocal(entityType: EntityType, localRef: string): Promise<IdentityMapping | null> {
    // NULL sorts first under DESC, so the active row wins over archived ones
    const [row] = await this.db
      .select()
      .from(identityMappings)
      .where(and(eq(identityMappings.entityType, entityType), eq(identityMappings.localRef, localRef)))
      .orderBy(desc(identityMappings.archivedAt))
      .limit(1);
    return row ? toMapping(row) : null;
  }

  async findByRemote(entityType: EntityType, remoteRef: string): Promise<IdentityMapping | null> {
    const [row] = await this.db
      .select()
      .from(identityMappings)
      .where(and(eq(identityMappings.entityType, entityType), eq(identityMappings.remoteRef, remoteRef)))
      .orderBy(desc(identityMappings.archivedAt))
      .limit(1);
    return row ? toMapping(row) : null;
  }

  async insert(mapping: IdentityMapping): Promise<InsertOutcome> {
    const rows = await this.db
      .insert(identityMappings)
      .values({
        entityType: mapping.entityType,
        localRef: mapping.localRef,
        remoteRef: mapping.remoteRef,
        lastSyncedAt: mapping.lastSyncedAt,
        contentHash: mapping.contentHash,
        archivedAt: null,
      })
      .onConflictDoNothing()
      .returning({ id: identityMappings.id });
    return rows.length > 0 ? 'inserted' : 'conflict';
  }

  async update(mapping: IdentityMapping): Promise<UpdateOutcome> {
    try {
      const rows = await this.db
        .update(identityMappings)
        .set({
          remoteRef: mapping.remoteRef,
          contentHash: mapping.contentHash,
          lastSyncedAt: mapping.lastSyncedAt,
        })
        .where(
          and(
            eq(identityMappings.entityType, mapping.entityType),
            eq(identityMappings.localRef, mapping.localRef),
            isNull(identityMappings.archivedAt)
          )
        )
        .returning({ id: identityMappings.id });
      return rows.length > 0 ? 'updated' : 'missing';
    } catch (error) {
      if (isUniqueViolation(error)) {
        return 'conflict';
      }
      throw error;
    }
  }

  async archive(entityType: EntityType, localRef: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(identityMappings)
      .set({ archivedAt: at })
      .where(
        and(
          eq(identityMappings.entityType, entityType),
          eq(identityMappings.localRef, localRef),
          isNull(identityMappings.archivedAt)
        )
      )
      .returning({ id: identityMappings.id });
    return rows.length > 0;
  }

  async list(entityType: EntityType): Promise<IdentityMapping[]> {
    const rows = await this.db
      .select()
      .from(identityMappings)
      .where(eq(identityMappings.entityType, entityType))
      .orderBy(identityMappings.id);
    return rows.map(toMapping);
  }

  async acquireCreateLock(
    entityType: EntityType,
    localRef: string,
    holder: string,
    expiresAt: Date,
    now: Date
  ): Promise<boolean> {
    // The conflicting row is only replaced when the caller already holds it or it expired
    const rows = await this.db
      .insert(identityLocks)
      .values({ entityType, localRef, holder, expiresAt })
      .onConflictDoUpdate({
        target: [identityLocks.entityType, identityLocks.localRef],
        set: { holder, expiresAt },
        setWhere: or(eq(identityLocks.holder, holder), lte(identityLocks.expiresAt, now)),
      })
      .returning({ holder: identityLocks.holder });
    return rows.length > 0;
  }

  async releaseCreateLock(entityType: EntityType, localRef: string, holder: string): Promise<void> {
    await this.db
      .delete(identityLocks)
      .where(
        and(
          eq(identityLocks.entityType, entityType),
          eq(identityLocks.localRef, localRef),
          eq(identityLocks.holder, holder)
        )
      );
  }
}
