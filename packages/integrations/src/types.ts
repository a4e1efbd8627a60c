/**
 * Common types for the commerce platform integration
 */

export type EntityType = 'product' | 'variant' | 'inventory_level' | 'order' | 'customer';

export const ENTITY_TYPES: readonly EntityType[] = [
  'product',
  'variant',
  'inventory_level',
  'order',
  'customer',
] as const;

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

export interface IntegrationConfig {
  /** Shop domain, e.g. `example.myshopify.com` */
  shopDomain: string;
  accessToken: string;
  apiVersion?: string;
}

// ============================================================================
// GraphQL wire types
// ============================================================================

export interface ThrottleStatus {
  maximumAvailable: number;
  currentlyAvailable: number;
  restoreRate: number;
}

export interface CostExtension {
  requestedQueryCost?: number;
  actualQueryCost?: number | null;
  throttleStatus?: ThrottleStatus;
}

export interface GraphQLErrorEntry {
  message: string;
  path?: Array<string | number>;
  extensions?: {
    code?: string;
    [key: string]: unknown;
  };
}

export interface GraphQLResponse<T> {
  data?: T | null;
  errors?: GraphQLErrorEntry[];
  extensions?: {
    cost?: CostExtension;
  };
}

export interface UserError {
  field?: string[] | null;
  message: string;
  code?: string | null;
}

// ============================================================================
// Bulk operations
// ============================================================================

export type BulkOperationStatus =
  | 'CREATED'
  | 'RUNNING'
  | 'COMPLETED'
  | 'CANCELING'
  | 'CANCELED'
  | 'FAILED'
  | 'EXPIRED';

export interface BulkHandle {
  id: string;
  submittedAt: Date;
}

export interface BulkOperationNode {
  id: string;
  status: BulkOperationStatus;
  errorCode?: string | null;
  objectCount?: string | null;
  url?: string | null;
}
