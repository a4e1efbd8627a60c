/**
 * Customer handler. Customers are read from the platform only.
 */

import {
  queries,
  type CommerceGraphQLClient,
  type Connection,
  type Result,
} from '@commercesync/integrations';
import type { EntityFields } from '../types.js';
import {
  BaseEntityHandler,
  parseTimestamp,
  readConnection,
  readOnlyError,
  toJsonValue,
  type RemoteRecord,
} from './base.js';

const CUSTOMER_FIELDS = ['email', 'firstName', 'lastName', 'phone'] as const;

export class CustomerHandler extends BaseEntityHandler {
  readonly entityType = 'customer' as const;
  readonly outbound = false;

  constructor(client: CommerceGraphQLClient) {
    super(client, {
      byId: queries.CUSTOMER_BY_ID_QUERY,
      page: queries.CUSTOMERS_PAGE_QUERY,
      bulk: queries.CUSTOMERS_BULK_QUERY,
    });
  }

  protected toRecord(node: Record<string, unknown>): RemoteRecord | null {
    const id = node.id;
    if (!this.ownsId(id)) {
      return null;
    }
    const fields: EntityFields = {};
    for (const name of CUSTOMER_FIELDS) {
      fields[name] = toJsonValue(node[name]);
    }
    return { remoteRef: id, fields, updatedAt: parseTimestamp(node.updatedAt) };
  }

  protected connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>> {
    return readConnection(data.customers);
  }

  async createRemote(_fields: EntityFields): Promise<Result<string>> {
    return readOnlyError(this.entityType, 'create');
  }

  async updateRemote(_remoteRef: string, _fields: EntityFields): Promise<Result<void>> {
    return readOnlyError(this.entityType, 'update');
  }

  async deleteRemote(_remoteRef: string): Promise<Result<void>> {
    return readOnlyError(this.entityType, 'delete');
  }
}
