/**
 * Product handler
 */

import {
  apiError,
  err,
  ok,
  queries,
  type CommerceGraphQLClient,
  type Connection,
  type MutationPayload,
  type Result,
} from '@commercesync/integrations';
import type { EntityFields } from '../types.js';
import {
  BaseEntityHandler,
  definedInput,
  parseTimestamp,
  readConnection,
  readString,
  toJsonValue,
  type RemoteRecord,
} from './base.js';

const PRODUCT_FIELDS = ['title', 'handle', 'status', 'vendor', 'productType', 'tags'] as const;

type ProductCreatePayload = MutationPayload & { product?: { id: string } | null };

export class ProductHandler extends BaseEntityHandler {
  readonly entityType = 'product' as const;
  readonly outbound = true;

  constructor(client: CommerceGraphQLClient) {
    super(client, {
      byId: queries.PRODUCT_BY_ID_QUERY,
      page: queries.PRODUCTS_PAGE_QUERY,
      bulk: queries.PRODUCTS_BULK_QUERY,
    });
  }

  protected toRecord(node: Record<string, unknown>): RemoteRecord | null {
    const id = node.id;
    if (!this.ownsId(id)) {
      return null;
    }
    const fields: EntityFields = {};
    for (const name of PRODUCT_FIELDS) {
      fields[name] = toJsonValue(node[name]);
    }
    return { remoteRef: id, fields, updatedAt: parseTimestamp(node.updatedAt) };
  }

  protected connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>> {
    return readConnection(data.products);
  }

  async createRemote(fields: EntityFields): Promise<Result<string>> {
    const result = await this.client.mutate<ProductCreatePayload>(
      queries.PRODUCT_CREATE_MUTATION,
      { product: definedInput(fields, PRODUCT_FIELDS) },
      'productCreate'
    );
    if (!result.ok) {
      return result;
    }
    const id = readString(result.value.product?.id);
    return id ? ok(id) : err(apiError('validation', 'productCreate returned no product id'));
  }

  async updateRemote(remoteRef: string, fields: EntityFields): Promise<Result<void>> {
    const result = await this.client.mutate<MutationPayload>(
      queries.PRODUCT_UPDATE_MUTATION,
      { product: { id: remoteRef, ...definedInput(fields, PRODUCT_FIELDS) } },
      'productUpdate'
    );
    return result.ok ? ok(undefined) : result;
  }

  async deleteRemote(remoteRef: string): Promise<Result<void>> {
    const result = await this.client.mutate<MutationPayload>(
      queries.PRODUCT_DELETE_MUTATION,
      { input: { id: remoteRef } },
      'productDelete'
    );
    return result.ok ? ok(undefined) : result;
  }
}
