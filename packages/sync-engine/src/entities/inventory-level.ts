/**
 * Inventory level handler
 * One row per (inventory item, location); only the available quantity syncs.
 */

import {
  apiError,
  err,
  isGid,
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
  isRecord,
  parseTimestamp,
  readConnection,
  readNestedId,
  readNumber,
  readString,
  type RemoteRecord,
} from './base.js';

type ActivatePayload = MutationPayload & { inventoryLevel?: { id: string } | null };

interface StockPosition {
  inventoryItemId: string;
  locationId: string;
}

export class InventoryLevelHandler extends BaseEntityHandler {
  readonly entityType = 'inventory_level' as const;
  readonly outbound = true;

  private defaultLocationId: string | null = null;

  constructor(client: CommerceGraphQLClient) {
    super(client, {
      byId: queries.INVENTORY_LEVEL_BY_ID_QUERY,
      page: queries.INVENTORY_LEVELS_PAGE_QUERY,
      bulk: queries.INVENTORY_LEVELS_BULK_QUERY,
    });
  }

  protected toRecord(node: Record<string, unknown>): RemoteRecord | null {
    const id = node.id;
    if (!this.ownsId(id)) {
      return null;
    }
    const quantities = Array.isArray(node.quantities) ? node.quantities.filter(isRecord) : [];
    const available = quantities.find((entry) => entry.name === 'available');
    return {
      remoteRef: id,
      fields: {
        inventoryItemRef: readNestedId(node.item),
        locationRef: readNestedId(node.location),
        sku: readItemSku(node.item),
        available: available ? readNumber(available.quantity) : null,
      },
      updatedAt: parseTimestamp(node.updatedAt),
    };
  }

  protected connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>> {
    const location = data.location;
    return readConnection(isRecord(location) ? location.inventoryLevels : null);
  }

  protected async pageVariables(): Promise<Result<Record<string, unknown>>> {
    const locationId = await this.locationId();
    return locationId.ok ? ok({ locationId: locationId.value }) : locationId;
  }

  async createRemote(fields: EntityFields): Promise<Result<string>> {
    const inventoryItemId = readString(fields.inventoryItemRef);
    if (!inventoryItemId || !isGid(inventoryItemId)) {
      return err(apiError('validation', 'Inventory level needs the global id of its inventory item'));
    }
    const locationId = await this.locationId(readString(fields.locationRef));
    if (!locationId.ok) {
      return locationId;
    }

    const result = await this.client.mutate<ActivatePayload>(
      queries.INVENTORY_ACTIVATE_MUTATION,
      { inventoryItemId, locationId: locationId.value, available: readNumber(fields.available) },
      'inventoryActivate'
    );
    if (!result.ok) {
      return result;
    }
    const id = readString(result.value.inventoryLevel?.id);
    return id ? ok(id) : err(apiError('validation', 'inventoryActivate returned no inventory level id'));
  }

  async updateRemote(remoteRef: string, fields: EntityFields): Promise<Result<void>> {
    const quantity = readNumber(fields.available);
    if (quantity === null) {
      return err(apiError('validation', 'Inventory level has no available quantity'));
    }
    const position = await this.positionOf(remoteRef, fields);
    if (!position.ok) {
      return position;
    }

    const result = await this.client.mutate<MutationPayload>(
      queries.INVENTORY_SET_QUANTITIES_MUTATION,
      {
        input: {
          name: 'available',
          reason: 'correction',
          ignoreCompareQuantity: true,
          quantities: [{ ...position.value, quantity }],
        },
      },
      'inventorySetQuantities'
    );
    return result.ok ? ok(undefined) : result;
  }

  async deleteRemote(remoteRef: string): Promise<Result<void>> {
    const result = await this.client.mutate<MutationPayload>(
      queries.INVENTORY_DEACTIVATE_MUTATION,
      { inventoryLevelId: remoteRef },
      'inventoryDeactivate'
    );
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Item and location of a level, from the record when it carries both
   */
  private async positionOf(remoteRef: string, fields: EntityFields): Promise<Result<StockPosition>> {
    const inventoryItemId = readString(fields.inventoryItemRef);
    const locationId = readString(fields.locationRef);
    if (inventoryItemId && locationId && isGid(inventoryItemId) && isGid(locationId)) {
      return ok({ inventoryItemId, locationId });
    }

    const current = await this.fetchRemote(remoteRef);
    if (!current.ok) {
      return current;
    }
    const remoteItem = current.value ? readString(current.value.fields.inventoryItemRef) : null;
    const remoteLocation = current.value ? readString(current.value.fields.locationRef) : null;
    if (!remoteItem || !remoteLocation) {
      return err(apiError('validation', `Inventory level ${remoteRef} no longer exists`));
    }
    return ok({ inventoryItemId: remoteItem, locationId: remoteLocation });
  }

  private async locationId(preferred: string | null = null): Promise<Result<string>> {
    if (preferred && isGid(preferred)) {
      return ok(preferred);
    }
    if (this.defaultLocationId) {
      return ok(this.defaultLocationId);
    }

    const result = await this.client.execute<{ locations?: { nodes?: Array<{ id?: string }> } }>(
      queries.FIRST_LOCATION_QUERY,
      {},
      { cost: 1 }
    );
    if (!result.ok) {
      return result;
    }
    const id = readString(result.value.locations?.nodes?.[0]?.id);
    if (!id) {
      return err(apiError('validation', 'Shop has no location'));
    }
    this.defaultLocationId = id;
    return ok(id);
  }
}

function readItemSku(item: unknown): string | null {
  return isRecord(item) ? readString(item.sku) : null;
}
