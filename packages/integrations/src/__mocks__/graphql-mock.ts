/**
 * Mock Commerce Platform
 * In-process stand-in for the Admin GraphQL API, served through a custom
 * axios adapter so the real client code runs unchanged in tests.
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { vi, type Mock } from 'vitest';
import type { CostExtension, ThrottleStatus } from '../types.js';

// ============================================================================
// Transport
// ============================================================================

export interface RecordedRequest {
  method: string;
  url: string;
  operationName: string | null;
  query: string;
  variables: Record<string, unknown>;
  headers: Record<string, string>;
}

export type MockReply =
  | { status?: number; data?: unknown; headers?: Record<string, string> }
  | { networkError: string; code?: string };

export type MockHandler = (request: RecordedRequest) => MockReply | Promise<MockReply>;

export interface MockTransport {
  http: AxiosInstance;
  requests: RecordedRequest[];
  handler: Mock<MockHandler>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function readRecordArray(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function parseRequestBody(data: unknown): { query: string; variables: Record<string, unknown> } {
  let parsed: unknown = data;
  if (typeof data === 'string' && data !== '') {
    parsed = JSON.parse(data);
  }
  if (!isRecord(parsed)) {
    return { query: '', variables: {} };
  }
  return {
    query: readString(parsed.query) ?? '',
    variables: isRecord(parsed.variables) ? parsed.variables : {},
  };
}

export function operationNameOf(query: string): string | null {
  const match = /\b(?:query|mutation)\s+(\w+)/.exec(query);
  return match?.[1] ?? null;
}

function flattenHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON())) {
    if (typeof value === 'string') {
      headers[name.toLowerCase()] = value;
    }
  }
  return headers;
}

/**
 * Axios instance whose requests are answered by `handler` in-process
 */
export function createMockTransport(handler: MockHandler): MockTransport {
  const requests: RecordedRequest[] = [];
  const spy = vi.fn(handler);

  const http = axios.create({
    baseURL: 'https://test-shop.example.com/admin/api/2025-01/graphql.json',
    headers: { 'X-Shopify-Access-Token': 'test-token' },
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const { query, variables } = parseRequestBody(config.data);
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        operationName: operationNameOf(query),
        query,
        variables,
        headers: flattenHeaders(config),
      };
      requests.push(request);

      const reply = await spy(request);
      if ('networkError' in reply) {
        throw new AxiosError(reply.networkError, reply.code ?? 'ECONNRESET', config);
      }

      return {
        data: reply.data ?? '',
        status: reply.status ?? 200,
        statusText: String(reply.status ?? 200),
        headers: reply.headers ?? {},
        config,
      };
    },
  });

  return { http, requests, handler: spy };
}

/**
 * Transport answering with the given replies in order; extra requests get a 500
 */
export function createScriptedTransport(replies: MockReply[]): MockTransport {
  const queue = [...replies];
  return createMockTransport(() => queue.shift() ?? { status: 500, data: { errors: [{ message: 'No scripted reply' }] } });
}

// ============================================================================
// Reply builders
// ============================================================================

export const DEFAULT_THROTTLE_STATUS: ThrottleStatus = {
  maximumAvailable: 1000,
  currentlyAvailable: 990,
  restoreRate: 50,
};

export function costExtension(
  actualQueryCost = 10,
  throttleStatus: ThrottleStatus = DEFAULT_THROTTLE_STATUS
): CostExtension {
  return { requestedQueryCost: actualQueryCost, actualQueryCost, throttleStatus };
}

export function dataReply(data: unknown, cost: CostExtension = costExtension()): MockReply {
  return { status: 200, data: { data, extensions: { cost } } };
}

export function errorsReply(errors: Array<{ message: string; code?: string }>, cost?: CostExtension): MockReply {
  return {
    status: 200,
    data: {
      errors: errors.map((entry) => ({
        message: entry.message,
        extensions: entry.code ? { code: entry.code } : {},
      })),
      ...(cost ? { extensions: { cost } } : {}),
    },
  };
}

export function throttledReply(requestedQueryCost = 50, currentlyAvailable = 0): MockReply {
  return errorsReply([{ message: 'Throttled', code: 'THROTTLED' }], {
    requestedQueryCost,
    actualQueryCost: null,
    throttleStatus: { maximumAvailable: 1000, currentlyAvailable, restoreRate: 50 },
  });
}

// ============================================================================
// Mock platform
// ============================================================================

type NodeType = 'Product' | 'ProductVariant' | 'InventoryLevel' | 'Order' | 'Customer';

export interface MockNode {
  id: string;
  __typename: NodeType;
  updatedAt: string;
  [field: string]: unknown;
}

interface MockBulkOperation {
  id: string;
  nodeType: NodeType;
  pollsRemaining: number;
  status: 'RUNNING' | 'COMPLETED' | 'FAILED';
  errorCode: string | null;
}

export interface MockPlatformOptions {
  /** Status polls answered RUNNING before a bulk operation completes */
  bulkPollsBeforeComplete?: number;
  /** Page size for connection queries; all results in one page when unset */
  pageSize?: number;
  now?: () => Date;
}

const BULK_RESULT_HOST = 'https://storage.test/bulk';
const LOCATION_ID = 'gid://shopify/Location/1';

/**
 * Small in-memory store of platform objects answering the operations issued
 * by the sync handlers. Scripted replies queued with `failNext` take
 * precedence over the store.
 */
export class MockCommercePlatform {
  readonly nodes = new Map<string, MockNode>();
  readonly transport: MockTransport;
  private readonly scripted = new Map<string, MockReply[]>();
  private readonly callCounts = new Map<string, number>();
  private readonly bulkOperations = new Map<string, MockBulkOperation>();
  private readonly options: MockPlatformOptions;
  private sequence = 1000;

  constructor(options: MockPlatformOptions = {}) {
    this.options = options;
    this.transport = createMockTransport((request) => this.handle(request));
  }

  get http(): AxiosInstance {
    return this.transport.http;
  }

  /**
   * Answer the next `times` calls of an operation with `reply`
   */
  failNext(operationName: string, reply: MockReply, times = 1): void {
    const queue = this.scripted.get(operationName) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(reply);
    }
    this.scripted.set(operationName, queue);
  }

  calls(operationName: string): number {
    return this.callCounts.get(operationName) ?? 0;
  }

  seed(type: NodeType, fields: Record<string, unknown>, id?: string): MockNode {
    const nodeId = id ?? this.nextId(type);
    const node: MockNode = {
      ...fields,
      id: nodeId,
      __typename: type,
      updatedAt: readString(fields.updatedAt) ?? this.timestamp(),
    };
    this.nodes.set(nodeId, node);
    return node;
  }

  nodesOfType(type: NodeType): MockNode[] {
    return [...this.nodes.values()].filter((node) => node.__typename === type);
  }

  private async handle(request: RecordedRequest): Promise<MockReply> {
    if (request.method === 'GET' && request.url.startsWith(BULK_RESULT_HOST)) {
      return this.bulkDownload(request.url);
    }

    const name = request.operationName ?? 'anonymous';
    this.callCounts.set(name, this.calls(name) + 1);

    const scripted = this.scripted.get(name);
    const next = scripted?.shift();
    if (next) {
      return next;
    }

    return this.dispatch(name, request.variables);
  }

  private dispatch(name: string, variables: Record<string, unknown>): MockReply {
    switch (name) {
      case 'SyncProduct':
      case 'SyncVariant':
      case 'SyncInventoryLevel':
      case 'SyncOrder':
      case 'SyncCustomer':
        return dataReply({ node: this.render(readString(variables.id)) }, costExtension(1));
      case 'SyncProductsPage':
        return this.page('products', 'Product', variables);
      case 'SyncVariantsPage':
        return this.page('productVariants', 'ProductVariant', variables);
      case 'SyncOrdersPage':
        return this.page('orders', 'Order', variables);
      case 'SyncCustomersPage':
        return this.page('customers', 'Customer', variables);
      case 'SyncInventoryLevelsPage': {
        const page = this.connection('InventoryLevel', variables);
        return dataReply({ location: { inventoryLevels: page } });
      }
      case 'SyncFirstLocation':
        return dataReply({ locations: { nodes: [{ id: LOCATION_ID }] } }, costExtension(1));
      case 'SyncProductCreate':
        return this.productCreate(variables);
      case 'SyncProductUpdate':
        return this.productUpdate(variables);
      case 'SyncProductDelete':
        return this.productDelete(variables);
      case 'SyncVariantsCreate':
        return this.variantsCreate(variables);
      case 'SyncVariantsUpdate':
        return this.variantsUpdate(variables);
      case 'SyncVariantsDelete':
        return this.variantsDelete(variables);
      case 'SyncInventoryActivate':
        return this.inventoryActivate(variables);
      case 'SyncInventorySet':
        return this.inventorySet(variables);
      case 'SyncInventoryDeactivate':
        return this.inventoryDeactivate(variables);
      case 'SyncBulkRun':
        return this.bulkRun(variables);
      case 'SyncBulkStatus':
        return this.bulkStatus(variables);
      default:
        return errorsReply([{ message: `Unknown operation ${name}` }]);
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  private render(id: string | undefined): Record<string, unknown> | null {
    const node = id ? this.nodes.get(id) : undefined;
    if (!node) {
      return null;
    }
    if (node.__typename === 'ProductVariant') {
      const { productId, ...rest } = node;
      return { ...rest, product: { id: productId } };
    }
    if (node.__typename === 'InventoryLevel') {
      const { available, inventoryItemId, sku, locationId, ...rest } = node;
      return {
        ...rest,
        quantities: [{ name: 'available', quantity: available }],
        item: { id: inventoryItemId, sku },
        location: { id: locationId },
      };
    }
    return { ...node };
  }

  private connection(type: NodeType, variables: Record<string, unknown>): {
    nodes: Array<Record<string, unknown>>;
    pageInfo: { hasNextPage: boolean; endCursor: string | null };
  } {
    const since = parseUpdatedSince(readString(variables.query));
    const matching = this.nodesOfType(type)
      .filter((node) => !since || node.updatedAt > since)
      .map((node) => this.render(node.id))
      .filter(isRecord);

    const offset = Number(readString(variables.after) ?? '0');
    const size = this.options.pageSize ?? matching.length;
    const slice = matching.slice(offset, offset + Math.max(size, 1));
    const end = offset + slice.length;

    return {
      nodes: slice,
      pageInfo: { hasNextPage: end < matching.length, endCursor: end < matching.length ? String(end) : null },
    };
  }

  private page(root: string, type: NodeType, variables: Record<string, unknown>): MockReply {
    return dataReply({ [root]: this.connection(type, variables) });
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  private productCreate(variables: Record<string, unknown>): MockReply {
    const input = isRecord(variables.product) ? variables.product : {};
    if (!readString(input.title)) {
      return userErrorsReply('productCreate', [{ field: ['title'], message: "Title can't be blank" }]);
    }
    const node = this.seed('Product', { tags: [], status: 'ACTIVE', ...input });
    return dataReply({ productCreate: { product: { id: node.id }, userErrors: [] } });
  }

  private productUpdate(variables: Record<string, unknown>): MockReply {
    const input = isRecord(variables.product) ? variables.product : {};
    const node = this.nodes.get(readString(input.id) ?? '');
    if (!node) {
      return userErrorsReply('productUpdate', [{ field: ['id'], message: 'Product does not exist' }]);
    }
    this.nodes.set(node.id, { ...node, ...input, id: node.id, __typename: node.__typename, updatedAt: this.timestamp() });
    return dataReply({ productUpdate: { product: { id: node.id }, userErrors: [] } });
  }

  private productDelete(variables: Record<string, unknown>): MockReply {
    const input = isRecord(variables.input) ? variables.input : {};
    const id = readString(input.id) ?? '';
    if (!this.nodes.delete(id)) {
      return userErrorsReply('productDelete', [{ field: ['id'], message: 'Product does not exist' }]);
    }
    for (const variant of this.nodesOfType('ProductVariant')) {
      if (variant.productId === id) {
        this.nodes.delete(variant.id);
      }
    }
    return dataReply({ productDelete: { deletedProductId: id, userErrors: [] } });
  }

  private variantsCreate(variables: Record<string, unknown>): MockReply {
    const productId = readString(variables.productId) ?? '';
    if (!this.nodes.has(productId)) {
      return userErrorsReply('productVariantsBulkCreate', [{ field: ['productId'], message: 'Product does not exist' }]);
    }
    const created = readRecordArray(variables.variants).map((input) =>
      this.seed('ProductVariant', { productId, ...variantFields(input) })
    );
    return dataReply({
      productVariantsBulkCreate: { productVariants: created.map((node) => ({ id: node.id })), userErrors: [] },
    });
  }

  private variantsUpdate(variables: Record<string, unknown>): MockReply {
    for (const input of readRecordArray(variables.variants)) {
      const node = this.nodes.get(readString(input.id) ?? '');
      if (!node) {
        return userErrorsReply('productVariantsBulkUpdate', [{ field: ['variants', 'id'], message: 'Variant does not exist' }]);
      }
      this.nodes.set(node.id, { ...node, ...variantFields(input), updatedAt: this.timestamp() });
    }
    return dataReply({ productVariantsBulkUpdate: { productVariants: [], userErrors: [] } });
  }

  private variantsDelete(variables: Record<string, unknown>): MockReply {
    const ids = Array.isArray(variables.variantsIds) ? variables.variantsIds : [];
    for (const id of ids) {
      if (typeof id === 'string') {
        this.nodes.delete(id);
      }
    }
    return dataReply({ productVariantsBulkDelete: { product: { id: variables.productId }, userErrors: [] } });
  }

  private inventoryActivate(variables: Record<string, unknown>): MockReply {
    const node = this.seed('InventoryLevel', {
      inventoryItemId: variables.inventoryItemId,
      locationId: variables.locationId,
      available: typeof variables.available === 'number' ? variables.available : 0,
      sku: null,
    });
    return dataReply({ inventoryActivate: { inventoryLevel: { id: node.id }, userErrors: [] } });
  }

  private inventorySet(variables: Record<string, unknown>): MockReply {
    const input = isRecord(variables.input) ? variables.input : {};
    for (const quantity of readRecordArray(input.quantities)) {
      const level = this.nodesOfType('InventoryLevel').find(
        (node) => node.inventoryItemId === quantity.inventoryItemId && node.locationId === quantity.locationId
      );
      if (!level) {
        return userErrorsReply('inventorySetQuantities', [{ field: ['quantities'], message: 'Item is not stocked at location' }]);
      }
      this.nodes.set(level.id, { ...level, available: quantity.quantity, updatedAt: this.timestamp() });
    }
    return dataReply({ inventorySetQuantities: { inventoryAdjustmentGroup: { id: this.nextId('InventoryAdjustmentGroup') }, userErrors: [] } });
  }

  private inventoryDeactivate(variables: Record<string, unknown>): MockReply {
    this.nodes.delete(readString(variables.inventoryLevelId) ?? '');
    return dataReply({ inventoryDeactivate: { userErrors: [] } });
  }

  // ---------------------------------------------------------------------------
  // Bulk operations
  // ---------------------------------------------------------------------------

  private bulkRun(variables: Record<string, unknown>): MockReply {
    const bulkQuery = readString(variables.query) ?? '';
    const operation: MockBulkOperation = {
      id: this.nextId('BulkOperation'),
      nodeType: bulkNodeType(bulkQuery),
      pollsRemaining: this.options.bulkPollsBeforeComplete ?? 0,
      status: 'RUNNING',
      errorCode: null,
    };
    this.bulkOperations.set(operation.id, operation);
    return dataReply({ bulkOperationRunQuery: { bulkOperation: { id: operation.id, status: 'CREATED' }, userErrors: [] } });
  }

  private bulkStatus(variables: Record<string, unknown>): MockReply {
    const operation = this.bulkOperations.get(readString(variables.id) ?? '');
    if (!operation) {
      return dataReply({ node: null }, costExtension(1));
    }
    if (operation.status === 'RUNNING') {
      if (operation.pollsRemaining > 0) {
        operation.pollsRemaining--;
      } else {
        operation.status = 'COMPLETED';
      }
    }
    const count = this.nodesOfType(operation.nodeType).length;
    return dataReply(
      {
        node: {
          id: operation.id,
          status: operation.status,
          errorCode: operation.errorCode,
          objectCount: String(count),
          url: operation.status === 'COMPLETED' && count > 0 ? `${BULK_RESULT_HOST}/${encodeURIComponent(operation.id)}.jsonl` : null,
        },
      },
      costExtension(1)
    );
  }

  private bulkDownload(url: string): MockReply {
    const id = decodeURIComponent(url.slice(BULK_RESULT_HOST.length + 1).replace(/\.jsonl$/, ''));
    const operation = this.bulkOperations.get(id);
    if (!operation) {
      return { status: 404, data: 'Not Found' };
    }
    const lines = this.nodesOfType(operation.nodeType).map((node) => JSON.stringify(this.render(node.id)));
    return { status: 200, data: `${lines.join('\n')}\n` };
  }

  private nextId(type: string): string {
    this.sequence++;
    return `gid://shopify/${type}/${this.sequence}`;
  }

  private timestamp(): string {
    return (this.options.now?.() ?? new Date()).toISOString();
  }
}

function userErrorsReply(rootField: string, userErrors: Array<{ field: string[]; message: string }>): MockReply {
  return dataReply({ [rootField]: { userErrors } });
}

function variantFields(input: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if ('price' in input) fields.price = input.price;
  if ('barcode' in input) fields.barcode = input.barcode;
  if (isRecord(input.inventoryItem) && 'sku' in input.inventoryItem) {
    fields.sku = input.inventoryItem.sku;
  }
  const option = readRecordArray(input.optionValues)[0];
  if (option && typeof option.name === 'string') {
    fields.title = option.name;
  }
  return fields;
}

function parseUpdatedSince(query: string | undefined): string | null {
  const match = query ? /updated_at:>'([^']+)'/.exec(query) : null;
  return match?.[1] ?? null;
}

function bulkNodeType(bulkQuery: string): NodeType {
  if (/productVariants/.test(bulkQuery)) return 'ProductVariant';
  if (/inventoryLevels/.test(bulkQuery)) return 'InventoryLevel';
  if (/orders/.test(bulkQuery)) return 'Order';
  if (/customers/.test(bulkQuery)) return 'Customer';
  return 'Product';
}
