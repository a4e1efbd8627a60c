/**
 * GraphQL transport exports
 */

export {
  CommerceGraphQLClient,
  createGraphQLClient,
  DEFAULT_API_VERSION,
  DEFAULT_BULK_POLL_OPTIONS,
  type GraphQLClientConfig,
  type BulkPollOptions,
  type RequestOptions,
  type MutationPayload,
  type BulkRecord,
} from './client.js';

export {
  toGid,
  fromGid,
  isGid,
  normalizeRemoteRef,
  ENTITY_RESOURCE_TYPES,
  type RemoteResourceType,
} from './gid.js';

export {
  paginate,
  getNextCursor,
  DEFAULT_PAGE_SIZE,
  type PageInfo,
  type Connection,
} from './pagination.js';

export {
  verifyWebhookSignature,
  computeWebhookSignature,
  WEBHOOK_HEADERS,
  type WebhookValidationResult,
} from './webhooks.js';

export * as queries from './queries.js';
