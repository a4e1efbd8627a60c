/**
 * Order handler. Orders are owned by the platform and only flow inbound.
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
  isRecord,
  parseTimestamp,
  readConnection,
  readNestedId,
  readOnlyError,
  toJsonValue,
  type RemoteRecord,
} from './base.js';

export class OrderHandler extends BaseEntityHandler {
  readonly entityType = 'order' as const;
  readonly outbound = false;

  constructor(client: CommerceGraphQLClient) {
    super(client, {
      byId: queries.ORDER_BY_ID_QUERY,
      page: queries.ORDERS_PAGE_QUERY,
      bulk: queries.ORDERS_BULK_QUERY,
    });
  }

  protected toRecord(node: Record<string, unknown>): RemoteRecord | null {
    const id = node.id;
    if (!this.ownsId(id)) {
      return null;
    }
    const priceSet: Record<string, unknown> = isRecord(node.totalPriceSet) ? node.totalPriceSet : {};
    const money: Record<string, unknown> = isRecord(priceSet.shopMoney) ? priceSet.shopMoney : {};
    return {
      remoteRef: id,
      fields: {
        name: toJsonValue(node.name),
        email: toJsonValue(node.email),
        financialStatus: toJsonValue(node.displayFinancialStatus),
        fulfillmentStatus: toJsonValue(node.displayFulfillmentStatus),
        cancelledAt: toJsonValue(node.cancelledAt),
        totalPrice: toJsonValue(money.amount),
        currency: toJsonValue(money.currencyCode),
        customerRef: readNestedId(node.customer),
      },
      updatedAt: parseTimestamp(node.updatedAt),
    };
  }

  protected connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>> {
    return readConnection(data.orders);
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
