/**
 * Global ID helpers
 * Converts between numeric resource ids and GraphQL global ids
 */

import type { EntityType } from '../types.js';

export type RemoteResourceType =
  | 'Product'
  | 'ProductVariant'
  | 'InventoryLevel'
  | 'InventoryItem'
  | 'Order'
  | 'Customer'
  | 'Location'
  | 'BulkOperation';

export const ENTITY_RESOURCE_TYPES: Record<EntityType, RemoteResourceType> = {
  product: 'Product',
  variant: 'ProductVariant',
  inventory_level: 'InventoryLevel',
  order: 'Order',
  customer: 'Customer',
};

const GID_PATTERN = /^gid:\/\/shopify\/(\w+)\/([^/?]+)(\?.*)?$/;

/**
 * Build a global id, e.g. `gid://shopify/Product/123`
 */
export function toGid(type: RemoteResourceType, id: number | string): string {
  return `gid://shopify/${type}/${id}`;
}

/**
 * Split a global id into its resource type and id. Returns null for anything
 * that is not a global id.
 */
export function fromGid(gid: string): { type: string; id: string } | null {
  const match = GID_PATTERN.exec(gid);
  if (!match) {
    return null;
  }
  return { type: match[1], id: match[2] };
}

export function isGid(value: string): boolean {
  return GID_PATTERN.test(value);
}

/**
 * Normalize a remote reference for an entity type. Numeric ids become global
 * ids; global ids pass through unchanged.
 */
export function normalizeRemoteRef(entityType: EntityType, ref: string | number): string {
  const value = String(ref);
  if (isGid(value)) {
    return value;
  }
  return toGid(ENTITY_RESOURCE_TYPES[entityType], value);
}
