/**
 * Global ID and Pagination Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { fromGid, isGid, normalizeRemoteRef, toGid } from '../graphql/gid.js';
import { paginate, type Connection } from '../graphql/pagination.js';
import { apiError, err, ok, type Result } from '../utils/result.js';

describe('global ids', () => {
  it('builds and splits global ids', () => {
    expect(toGid('Product', 42)).toBe('gid://shopify/Product/42');
    expect(fromGid('gid://shopify/ProductVariant/7')).toEqual({ type: 'ProductVariant', id: '7' });
  });

  it('keeps the id of a global id carrying query parameters', () => {
    expect(fromGid('gid://shopify/InventoryLevel/9?inventory_item_id=3')).toEqual({
      type: 'InventoryLevel',
      id: '9',
    });
  });

  it('returns null for plain identifiers', () => {
    expect(fromGid('42')).toBeNull();
    expect(isGid('local-1')).toBe(false);
  });

  it('normalizes numeric ids per entity type', () => {
    expect(normalizeRemoteRef('variant', 7)).toBe('gid://shopify/ProductVariant/7');
    expect(normalizeRemoteRef('order', 'gid://shopify/Order/5')).toBe('gid://shopify/Order/5');
  });
});

describe('paginate', () => {
  it('follows cursors until the last page', async () => {
    const pages: Record<string, Connection<number>> = {
      start: { nodes: [1, 2], pageInfo: { hasNextPage: true, endCursor: 'c1' } },
      c1: { nodes: [3], pageInfo: { hasNextPage: true, endCursor: 'c2' } },
      c2: { nodes: [4], pageInfo: { hasNextPage: false, endCursor: 'c3' } },
    };
    const fetchPage = vi.fn(async (cursor: string | null): Promise<Result<Connection<number>>> => {
      const page = pages[cursor ?? 'start'];
      return page ? ok(page) : err(apiError('validation', 'unknown cursor'));
    });

    const result = await paginate(fetchPage);

    expect(result).toEqual({ ok: true, value: [1, 2, 3, 4] });
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual([null, 'c1', 'c2']);
  });

  it('stops at the first error', async () => {
    const fetchPage = vi
      .fn<(cursor: string | null) => Promise<Result<Connection<number>>>>()
      .mockResolvedValueOnce(ok({ nodes: [1], pageInfo: { hasNextPage: true, endCursor: 'c1' } }))
      .mockResolvedValueOnce(err(apiError('transient', 'Remote API returned status 502', { statusCode: 502 })));

    const result = await paginate(fetchPage);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'transient', message: 'Remote API returned status 502', statusCode: 502 },
    });
  });

  it('honours maxPages', async () => {
    const fetchPage = vi.fn(async (): Promise<Result<Connection<number>>> =>
      ok({ nodes: [1], pageInfo: { hasNextPage: true, endCursor: 'next' } })
    );

    const result = await paginate(fetchPage, { maxPages: 3 });

    expect(result).toEqual({ ok: true, value: [1, 1, 1] });
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });
});
