import type { PaginatedView } from "./types";

export function emptyPage<T>(pageSize: number): PaginatedView<T> {
  return {
    items: [],
    pageNumber: 1,
    pageSize: Math.max(0, pageSize),
    totalPages: 0,
    totalItems: 0,
    hasNext: false,
    hasPrev: false,
  };
}

/**
 * 1-based page slice. A page past the end has no items but real totals;
 * an empty list, page < 1 or pageSize <= 0 gives the empty view (page 1, zero totals).
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): PaginatedView<T> {
  if (items.length === 0 || page < 1 || pageSize <= 0) return emptyPage(pageSize);

  const totalPages = Math.ceil(items.length / pageSize);
  const start = (page - 1) * pageSize;

  return {
    items: items.slice(start, start + pageSize),
    pageNumber: page,
    pageSize,
    totalPages,
    totalItems: items.length,
    hasNext: page < totalPages,
    hasPrev: page > 1,
  };
}
