/**
 * Entity Handlers
 * Per-type adapters between the engine's flat field sets and the Admin API.
 * Every handler shares the read path (single fetch, modified-since pages, bulk
 * export); writes are type specific.
 */

import {
  apiError,
  err,
  ENTITY_RESOURCE_TYPES,
  fromGid,
  ok,
  paginate,
  DEFAULT_PAGE_SIZE,
  type CommerceGraphQLClient,
  type Connection,
  type EntityType,
  type Result,
} from '@commercesync/integrations';
import type { EntityFields, JsonValue } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface RemoteRecord {
  remoteRef: string;
  fields: EntityFields;
  updatedAt: Date | null;
}

export interface ListRemoteOptions {
  /** Only records modified after this instant */
  since?: Date;
  /** Export everything through a bulk operation instead of paging */
  full?: boolean;
}

/**
 * Lookups a handler needs from the rest of the engine
 */
export interface HandlerContext {
  resolveRemote(entityType: EntityType, localRef: string): Promise<string | null>;
}

export interface EntityHandler {
  readonly entityType: EntityType;
  /** False for types the platform owns; local edits are never pushed */
  readonly outbound: boolean;
  /** Fields left out of content hashes */
  readonly ignoredFields: readonly string[];
  fetchRemote(remoteRef: string): Promise<Result<RemoteRecord | null>>;
  listRemote(options?: ListRemoteOptions): Promise<Result<RemoteRecord[]>>;
  createRemote(fields: EntityFields, ctx: HandlerContext): Promise<Result<string>>;
  updateRemote(remoteRef: string, fields: EntityFields, ctx: HandlerContext): Promise<Result<void>>;
  deleteRemote(remoteRef: string, fields: EntityFields | null, ctx: HandlerContext): Promise<Result<void>>;
}

export type EntityHandlers = Record<EntityType, EntityHandler>;

// ============================================================================
// Value helpers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isRecord(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        out[key] = toJsonValue(entry);
      }
    }
    return out;
  }
  return null;
}

export function readString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function readNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

/** `id` of a nested `{ id }` object */
export function readNestedId(value: unknown): string | null {
  return isRecord(value) ? readString(value.id) : null;
}

export function parseTimestamp(value: unknown): Date | null {
  const text = readString(value);
  if (!text) {
    return null;
  }
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Copy the listed fields that are present, skipping nulls. Mutation inputs
 * omit what the record does not set.
 */
export function definedInput(fields: EntityFields, names: readonly string[]): Record<string, JsonValue> {
  const input: Record<string, JsonValue> = {};
  for (const name of names) {
    const value = fields[name];
    if (value !== undefined && value !== null) {
      input[name] = value;
    }
  }
  return input;
}

export function readOnlyError(entityType: EntityType, action: string): Result<never> {
  return err(apiError('validation', `${entityType} records are read-only; cannot ${action}`));
}

/** Search filter for modified-since listings */
export function updatedSinceFilter(since: Date | undefined): string | null {
  return since ? `updated_at:>'${since.toISOString()}'` : null;
}

// ============================================================================
// Base handler
// ============================================================================

interface ReadDocuments {
  byId: string;
  page: string;
  bulk: string;
}

/**
 * Shared read path. Subclasses map one API node to a record and implement
 * the writes their type supports.
 */
export abstract class BaseEntityHandler implements EntityHandler {
  abstract readonly entityType: EntityType;
  abstract readonly outbound: boolean;
  readonly ignoredFields: readonly string[] = [];

  constructor(
    protected readonly client: CommerceGraphQLClient,
    private readonly documents: ReadDocuments
  ) {}

  /**
   * Map an API node to a record, or null when the node is of another type
   * (bulk exports interleave parent objects)
   */
  protected abstract toRecord(node: Record<string, unknown>): RemoteRecord | null;

  abstract createRemote(fields: EntityFields, ctx: HandlerContext): Promise<Result<string>>;
  abstract updateRemote(remoteRef: string, fields: EntityFields, ctx: HandlerContext): Promise<Result<void>>;
  abstract deleteRemote(remoteRef: string, fields: EntityFields | null, ctx: HandlerContext): Promise<Result<void>>;

  async fetchRemote(remoteRef: string): Promise<Result<RemoteRecord | null>> {
    const result = await this.client.execute<{ node: Record<string, unknown> | null }>(
      this.documents.byId,
      { id: remoteRef },
      { cost: 1 }
    );
    if (!result.ok) {
      return result;
    }
    return ok(result.value.node ? this.toRecord(result.value.node) : null);
  }

  async listRemote(options: ListRemoteOptions = {}): Promise<Result<RemoteRecord[]>> {
    if (options.full) {
      return this.exportAll();
    }

    const filter = updatedSinceFilter(options.since);
    const extra = await this.pageVariables();
    if (!extra.ok) {
      return extra;
    }

    const nodes = await paginate<Record<string, unknown>>(async (cursor) => {
      const page = await this.client.execute<Record<string, unknown>>(this.documents.page, {
        ...extra.value,
        first: DEFAULT_PAGE_SIZE,
        after: cursor,
        query: filter,
      });
      if (!page.ok) {
        return page;
      }
      return ok(this.connectionOf(page.value));
    });
    if (!nodes.ok) {
      return nodes;
    }
    return ok(this.mapRecords(nodes.value));
  }

  /**
   * Extra variables of the page query
   */
  protected async pageVariables(): Promise<Result<Record<string, unknown>>> {
    return ok({});
  }

  /**
   * Pick the connection out of a page response
   */
  protected abstract connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>>;

  private async exportAll(): Promise<Result<RemoteRecord[]>> {
    const handle = await this.client.bulkOperationRun(this.documents.bulk);
    if (!handle.ok) {
      return handle;
    }
    const url = await this.client.pollBulkOperation(handle.value);
    if (!url.ok) {
      return url;
    }
    if (url.value === null) {
      return ok([]);
    }
    const rows = await this.client.downloadBulkResults(url.value);
    if (!rows.ok) {
      return rows;
    }
    return ok(this.mapRecords(rows.value));
  }

  private mapRecords(nodes: Record<string, unknown>[]): RemoteRecord[] {
    const records: RemoteRecord[] = [];
    for (const node of nodes) {
      const record = this.toRecord(node);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  /** True when `id` is a global id of this handler's resource type */
  protected ownsId(id: unknown): id is string {
    const parsed = typeof id === 'string' ? fromGid(id) : null;
    return parsed?.type === ENTITY_RESOURCE_TYPES[this.entityType];
  }
}

/**
 * Read `{ nodes, pageInfo }` from an untyped response value
 */
export function readConnection(value: unknown): Connection<Record<string, unknown>> {
  if (!isRecord(value)) {
    return { nodes: [], pageInfo: { hasNextPage: false } };
  }
  const nodes = Array.isArray(value.nodes) ? value.nodes.filter(isRecord) : [];
  const pageInfo = isRecord(value.pageInfo) ? value.pageInfo : {};
  return {
    nodes,
    pageInfo: {
      hasNextPage: pageInfo.hasNextPage === true,
      endCursor: readString(pageInfo.endCursor),
    },
  };
}
