/**
 * Slice a listing into fixed-size pages.
 */

/**
 * Rows per page in the listing table.
 */
export const DEFAULT_PAGE_SIZE = 5;

/**
 * Pagination info.
 */
export interface PaginationInfo {
  /** Current page (1-indexed) */
  page: number;
  /** Items per page */
  pageSize: number;
  /** Total items */
  totalItems: number;
  /** Total pages */
  totalPages: number;
  /** Has previous page */
  hasPrevious: boolean;
  /** Has next page */
  hasNext: boolean;
}

export interface Page<T> {
  items: T[];
  pagination: PaginationInfo;
}

/**
 * Return one page of `items`. The page is clamped to [1, totalPages]
 * (page 1 when there are no items).
 */
export function paginate<T>(items: readonly T[], page = 1, pageSize = DEFAULT_PAGE_SIZE): Page<T> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const totalItems = items.length;
  const totalPages = Math.ceil(totalItems / pageSize);
  const requested = Number.isFinite(page) ? Math.floor(page) : 1;
  const current = Math.min(Math.max(1, requested), Math.max(1, totalPages));

  const startIndex = (current - 1) * pageSize;

  return {
    items: items.slice(startIndex, startIndex + pageSize),
    pagination: {
      page: current,
      pageSize,
      totalItems,
      totalPages,
      hasPrevious: current > 1,
      hasNext: current < totalPages,
    },
  };
}
