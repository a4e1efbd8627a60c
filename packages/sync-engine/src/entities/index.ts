import type { CommerceGraphQLClient } from '@commercesync/integrations';
import type { EntityHandlers } from './base.js';
import { CustomerHandler } from './customer.js';
import { InventoryLevelHandler } from './inventory-level.js';
import { OrderHandler } from './order.js';
import { ProductHandler } from './product.js';
import { VariantHandler } from './variant.js';

export * from './base.js';
export { ProductHandler, VariantHandler, InventoryLevelHandler, OrderHandler, CustomerHandler };

/**
 * Handlers for every entity type, all sharing one client and its rate limiter
 */
export function createEntityHandlers(client: CommerceGraphQLClient): EntityHandlers {
  return {
    product: new ProductHandler(client),
    variant: new VariantHandler(client),
    inventory_level: new InventoryLevelHandler(client),
    order: new OrderHandler(client),
    customer: new CustomerHandler(client),
  };
}
