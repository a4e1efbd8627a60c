/**
 * GraphQL Pagination Utilities
 * Cursor-based pagination over connection fields
 */

import { ok, type Result } from '../utils/result.js';

export interface PageInfo {
  hasNextPage: boolean;
  endCursor?: string | null;
}

export interface Connection<T> {
  nodes: T[];
  pageInfo: PageInfo;
}

/** Largest page the Admin API accepts */
export const DEFAULT_PAGE_SIZE = 250;

export function getNextCursor(pageInfo: PageInfo): string | null {
  if (!pageInfo.hasNextPage) {
    return null;
  }
  return pageInfo.endCursor ?? null;
}

/**
 * Fetch every page of a connection. `fetchPage` receives the cursor of the
 * next page (null for the first) and returns the connection or an error; the
 * first error stops the walk and is returned as-is.
 */
export async function paginate<T>(
  fetchPage: (cursor: string | null) => Promise<Result<Connection<T>>>,
  options: { maxPages?: number } = {}
): Promise<Result<T[]>> {
  const items: T[] = [];
  let cursor: string | null = null;
  let pages = 0;

  do {
    const page = await fetchPage(cursor);
    if (!page.ok) {
      return page;
    }

    items.push(...page.value.nodes);
    cursor = getNextCursor(page.value.pageInfo);
    pages++;
  } while (cursor !== null && (options.maxPages === undefined || pages < options.maxPages));

  return ok(items);
}
