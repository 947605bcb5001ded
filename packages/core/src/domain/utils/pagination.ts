import type { PageRequest } from '../entities/common.js';

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export function paginate<T>(items: T[], request: PageRequest = {}, defaultLimit = DEFAULT_PAGE_LIMIT): Page<T> {
  const limit = Math.min(Math.max(request.limit ?? defaultLimit, 1), MAX_PAGE_LIMIT);
  const offset = Math.max(request.offset ?? 0, 0);
  return {
    items: items.slice(offset, offset + limit),
    total: items.length,
    limit,
    offset,
    hasMore: offset + limit < items.length,
  };
}

export function mapPage<T, U>(page: Page<T>, mapper: (item: T) => U): Page<U> {
  return { ...page, items: page.items.map(mapper) };
}
