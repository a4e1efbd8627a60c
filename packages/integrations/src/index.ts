/**
 * Commerce Sync - Integrations Package
 * Admin GraphQL API client, cost-based rate limiting, backoff and webhook
 * verification for the remote commerce platform
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export {
  ENTITY_TYPES,
  isEntityType,
  type EntityType,
  type IntegrationConfig,
  type ThrottleStatus,
  type CostExtension,
  type GraphQLErrorEntry,
  type GraphQLResponse,
  type UserError,
  type BulkOperationStatus,
  type BulkHandle,
  type BulkOperationNode,
} from './types.js';

// ============================================================================
// GraphQL Transport
// ============================================================================

export * from './graphql/index.js';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils/index.js';
