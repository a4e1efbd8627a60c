/**
 * Admin GraphQL API Client
 * Cost-aware transport: every call reserves query cost with the rate limiter,
 * settles it from the response's cost extension, and classifies the outcome
 * into a `Result` tagged with an error kind.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { createLogger, type Logger } from '../utils/logger.js';
import { CostRateLimiter } from '../utils/rate-limiter.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { apiError, err, ok, type ApiError, type Result } from '../utils/result.js';
import {
  BULK_OPERATION_RUN_QUERY_MUTATION,
  BULK_OPERATION_STATUS_QUERY,
} from './queries.js';
import type {
  BulkHandle,
  BulkOperationNode,
  CostExtension,
  GraphQLErrorEntry,
  GraphQLResponse,
  IntegrationConfig,
  UserError,
} from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface BulkPollOptions {
  initialIntervalMs: number;
  /** Multiplier applied to the poll interval after every poll */
  intervalFactor: number;
  maxIntervalMs: number;
  /** Wall-clock limit measured from submission */
  timeoutMs: number;
}

export interface GraphQLClientConfig extends IntegrationConfig {
  /** Per-request timeout; keep it below the worker job timeout */
  requestTimeoutMs?: number;
  /** Cost reserved for a call that does not state its own */
  defaultQueryCost?: number;
  bulk?: Partial<BulkPollOptions>;
  limiter?: CostRateLimiter;
  clock?: Clock;
  /** Preconfigured transport, e.g. one with a custom adapter */
  httpClient?: AxiosInstance;
  logger?: Logger;
}

export interface RequestOptions {
  /** Estimated query cost to reserve */
  cost?: number;
}

export interface MutationPayload {
  userErrors?: UserError[] | null;
}

export type BulkRecord = Record<string, unknown>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_API_VERSION = '2025-01';

export const DEFAULT_BULK_POLL_OPTIONS: BulkPollOptions = {
  initialIntervalMs: 1000,
  intervalFactor: 1.5,
  maxIntervalMs: 30000,
  timeoutMs: 30 * 60 * 1000,
};

const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const DEFAULT_QUERY_COST = 10;
const DEFAULT_THROTTLE_RETRY_MS = 1000;

const AUTH_ERROR_CODES = new Set(['ACCESS_DENIED', 'UNAUTHENTICATED', 'FORBIDDEN']);
const TRANSIENT_ERROR_CODES = new Set(['INTERNAL_SERVER_ERROR', 'SERVICE_UNAVAILABLE', 'TIMEOUT']);

// ============================================================================
// Client
// ============================================================================

export class CommerceGraphQLClient {
  private readonly http: AxiosInstance;
  private readonly downloads: AxiosInstance;
  private readonly limiter: CostRateLimiter;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaultQueryCost: number;
  private readonly bulkOptions: BulkPollOptions;
  private haltedWith: ApiError | null = null;

  constructor(config: GraphQLClientConfig) {
    const apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    const timeout = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    this.clock = config.clock ?? systemClock;
    this.limiter = config.limiter ?? new CostRateLimiter({ clock: this.clock });
    this.logger = config.logger ?? createLogger('graphql-client', { shop: config.shopDomain });
    this.defaultQueryCost = config.defaultQueryCost ?? DEFAULT_QUERY_COST;
    this.bulkOptions = { ...DEFAULT_BULK_POLL_OPTIONS, ...config.bulk };

    this.http =
      config.httpClient ??
      axios.create({
        baseURL: `https://${config.shopDomain}/admin/api/${apiVersion}/graphql.json`,
        timeout,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'X-Shopify-Access-Token': config.accessToken,
        },
      });

    // Status codes are classified here rather than thrown by axios
    this.http.defaults.validateStatus = () => true;

    // Bulk results live on a storage host that must never see the access token
    this.downloads = axios.create({
      timeout: this.http.defaults.timeout,
      adapter: this.http.defaults.adapter,
      validateStatus: () => true,
    });
  }

  // ============================================================================
  // Credential state
  // ============================================================================

  /**
   * True once an auth error was seen; every call short-circuits until resume()
   */
  isHalted(): boolean {
    return this.haltedWith !== null;
  }

  resume(): void {
    if (this.haltedWith) {
      this.logger.info('Credential resumed');
    }
    this.haltedWith = null;
  }

  getRateLimiter(): CostRateLimiter {
    return this.limiter;
  }

  // ============================================================================
  // Queries & mutations
  // ============================================================================

  async execute<T>(
    query: string,
    variables: Record<string, unknown> = {},
    options: RequestOptions = {}
  ): Promise<Result<T>> {
    if (this.haltedWith) {
      return err(this.haltedWith);
    }

    const reservation = await this.limiter.acquire(options.cost ?? this.defaultQueryCost);
    if (!reservation.ok) {
      this.logger.debug({ retryAfterMs: reservation.error.retryAfterMs }, 'Local cost budget exhausted');
      return reservation;
    }

    let response: AxiosResponse<GraphQLResponse<T> | string>;
    try {
      response = await this.http.post<GraphQLResponse<T> | string>('', { query, variables });
    } catch (error) {
      // The request may or may not have been charged; keep the local estimate
      this.limiter.observe(undefined, reservation.value);
      return err(classifyTransportError(error));
    }

    const body = typeof response.data === 'object' && response.data !== null ? response.data : null;
    this.limiter.observe(body?.extensions?.cost, reservation.value);

    const result = this.classifyResponse(response, body);
    if (!result.ok) {
      this.logger.warn(
        { kind: result.error.kind, status: result.error.statusCode, code: result.error.code },
        result.error.message
      );
      if (result.error.kind === 'auth') {
        this.halt(result.error);
      }
    }
    return result;
  }

  /**
   * Run a mutation and surface its `userErrors` as a validation error
   */
  async mutate<T extends MutationPayload>(
    query: string,
    variables: Record<string, unknown>,
    rootField: string,
    options: RequestOptions = {}
  ): Promise<Result<T>> {
    const result = await this.execute<Record<string, T | null | undefined>>(query, variables, options);
    if (!result.ok) {
      return result;
    }

    const payload = result.value[rootField];
    if (!payload) {
      return err(apiError('validation', `Mutation returned no ${rootField} payload`));
    }

    const userErrors = payload.userErrors ?? [];
    if (userErrors.length > 0) {
      return err(
        apiError('validation', formatUserErrors(userErrors), {
          code: userErrors[0]?.code ?? undefined,
          details: userErrors,
        })
      );
    }

    return ok(payload);
  }

  // ============================================================================
  // Bulk operations
  // ============================================================================

  async bulkOperationRun(bulkQuery: string): Promise<Result<BulkHandle>> {
    const result = await this.mutate<{ bulkOperation?: { id: string } | null } & MutationPayload>(
      BULK_OPERATION_RUN_QUERY_MUTATION,
      { query: bulkQuery },
      'bulkOperationRunQuery'
    );

    if (!result.ok) {
      // Only one bulk query per shop may run at a time
      if (result.error.kind === 'validation' && /already in progress/i.test(result.error.message)) {
        return err({ ...result.error, kind: 'transient' });
      }
      return result;
    }

    const operation = result.value.bulkOperation;
    if (!operation) {
      return err(apiError('validation', 'Bulk operation was not created'));
    }

    this.logger.info({ bulkOperationId: operation.id }, 'Bulk operation submitted');
    return ok({ id: operation.id, submittedAt: new Date(this.clock.now()) });
  }

  /**
   * Poll until the operation finishes. Resolves with the result file URL, or
   * null when the operation completed without matching any object.
   */
  async pollBulkOperation(handle: BulkHandle): Promise<Result<string | null>> {
    const { initialIntervalMs, intervalFactor, maxIntervalMs, timeoutMs } = this.bulkOptions;
    const deadline = handle.submittedAt.getTime() + timeoutMs;
    let interval = initialIntervalMs;

    for (;;) {
      const status = await this.execute<{ node: BulkOperationNode | null }>(
        BULK_OPERATION_STATUS_QUERY,
        { id: handle.id },
        { cost: 1 }
      );
      if (!status.ok) {
        return status;
      }

      const node = status.value.node;
      if (!node) {
        return err(apiError('validation', `Bulk operation ${handle.id} not found`));
      }

      switch (node.status) {
        case 'COMPLETED':
          this.logger.info({ bulkOperationId: node.id, objectCount: node.objectCount }, 'Bulk operation completed');
          return ok(node.url ?? null);
        case 'FAILED':
        case 'CANCELED':
        case 'CANCELING':
        case 'EXPIRED':
          return err(classifyBulkFailure(node));
        default:
          break;
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return err(
          apiError('bulk_timeout', `Bulk operation ${handle.id} still ${node.status} after ${timeoutMs}ms`, {
            code: node.status,
          })
        );
      }

      await this.clock.sleep(Math.min(interval, remaining));
      interval = Math.min(maxIntervalMs, interval * intervalFactor);
    }
  }

  /**
   * Download and parse a JSONL result file
   */
  async downloadBulkResults(url: string): Promise<Result<BulkRecord[]>> {
    let response: AxiosResponse<string>;
    try {
      response = await this.downloads.get<string>(url, {
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
      });
    } catch (error) {
      return err(classifyTransportError(error));
    }

    if (response.status < 200 || response.status >= 300) {
      return err(
        apiError('transient', `Bulk result download failed with status ${response.status}`, {
          statusCode: response.status,
        })
      );
    }

    const records: BulkRecord[] = [];
    const lines = String(response.data).split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') {
        continue;
      }
      const parsed = parseJsonObject(line);
      if (!parsed) {
        return err(apiError('validation', `Malformed bulk result line ${index + 1}`));
      }
      records.push(parsed);
    }

    return ok(records);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private halt(error: ApiError): void {
    if (!this.haltedWith) {
      this.logger.error({ code: error.code, status: error.statusCode }, 'Credential rejected; halting API calls');
    }
    this.haltedWith = error;
  }

  private classifyResponse<T>(
    response: AxiosResponse<unknown>,
    body: GraphQLResponse<T> | null
  ): Result<T> {
    const statusCode = response.status;

    if (statusCode === 401 || statusCode === 403) {
      return err(apiError('auth', `Authentication failed with status ${statusCode}`, { statusCode }));
    }

    if (statusCode === 429) {
      return err(
        apiError('throttle', 'Rate limited by remote API', {
          statusCode,
          retryAfterMs: parseRetryAfter(readHeader(response, 'retry-after')) ?? DEFAULT_THROTTLE_RETRY_MS,
        })
      );
    }

    if (statusCode >= 500) {
      return err(apiError('transient', `Remote API returned status ${statusCode}`, { statusCode }));
    }

    if (statusCode >= 400) {
      return err(
        apiError('validation', `Remote API rejected the request with status ${statusCode}`, {
          statusCode,
          details: body ?? response.data,
        })
      );
    }

    if (!body) {
      return err(apiError('transient', 'Remote API returned a non-JSON response', { statusCode }));
    }

    if (body.errors && body.errors.length > 0) {
      return err(classifyGraphQLErrors(body.errors, body.extensions?.cost));
    }

    if (body.data === undefined || body.data === null) {
      return err(apiError('transient', 'Remote API returned no data', { statusCode }));
    }

    return ok(body.data);
  }
}

// ============================================================================
// Classification helpers
// ============================================================================

function classifyGraphQLErrors(errors: GraphQLErrorEntry[], cost: CostExtension | undefined): ApiError {
  const message = errors.map((entry) => entry.message).join('; ');
  const codes = errors
    .map((entry) => entry.extensions?.code)
    .filter((code): code is string => typeof code === 'string');

  if (codes.includes('THROTTLED')) {
    return apiError('throttle', message, { code: 'THROTTLED', retryAfterMs: throttleDelay(cost) });
  }

  const authCode = codes.find((code) => AUTH_ERROR_CODES.has(code));
  if (authCode) {
    return apiError('auth', message, { code: authCode });
  }

  const transientCode = codes.find((code) => TRANSIENT_ERROR_CODES.has(code));
  if (transientCode) {
    return apiError('transient', message, { code: transientCode });
  }

  return apiError('validation', message, { code: codes[0], details: errors });
}

/**
 * Time until the bucket holds the cost the rejected query asked for
 */
function throttleDelay(cost: CostExtension | undefined): number {
  const status = cost?.throttleStatus;
  const requested = cost?.requestedQueryCost;
  if (!status || requested === undefined || status.restoreRate <= 0) {
    return DEFAULT_THROTTLE_RETRY_MS;
  }
  const deficit = Math.max(0, requested - status.currentlyAvailable);
  return Math.max(DEFAULT_THROTTLE_RETRY_MS, Math.ceil((deficit / status.restoreRate) * 1000));
}

function classifyBulkFailure(node: BulkOperationNode): ApiError {
  const code = node.errorCode ?? node.status;
  const message = `Bulk operation ${node.id} ended ${node.status}${node.errorCode ? ` (${node.errorCode})` : ''}`;

  switch (node.errorCode) {
    case 'ACCESS_DENIED':
      return apiError('auth', message, { code });
    case 'TIMEOUT':
      return apiError('bulk_timeout', message, { code });
    case 'INTERNAL_SERVER_ERROR':
      return apiError('transient', message, { code });
    default:
      // Canceled or expired operations can simply be resubmitted
      return node.status === 'FAILED'
        ? apiError('validation', message, { code })
        : apiError('transient', message, { code });
  }
}

function classifyTransportError(error: unknown): ApiError {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return apiError('transient', 'Request timed out', { code: error.code });
    }
    return apiError('transient', `Network error: ${error.message}`, { code: error.code });
  }
  return apiError('transient', error instanceof Error ? error.message : 'Unknown transport error');
}

function formatUserErrors(userErrors: UserError[]): string {
  return userErrors
    .map((userError) =>
      userError.field && userError.field.length > 0
        ? `${userError.field.join('.')}: ${userError.message}`
        : userError.message
    )
    .join('; ');
}

function readHeader(response: AxiosResponse<unknown>, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
}

function parseJsonObject(line: string): BulkRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function createGraphQLClient(config: GraphQLClientConfig): CommerceGraphQLClient {
  return new CommerceGraphQLClient(config);
}
