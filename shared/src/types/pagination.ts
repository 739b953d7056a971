/**
 * Pagination cursor type
 */
export type PaginationCursor = string;

/**
 * Pagination state encoded in an offset cursor
 */
export interface PaginationState {
  /** Offset of the first item of the page */
  offset: number;

  /** Maximum number of items in the page */
  limit: number;

  /** Optional hash of applied filters for cursor validation */
  filterHash?: string;
}

/**
 * Pagination metadata describing a loaded page
 */
export interface PaginationMetadata {
  /** Number of items in the page */
  count: number;

  /** Total count of all items (may be undefined when the source does not know it) */
  total?: number;

  /** Cursor to fetch the next page (null if at end) */
  nextCursor: PaginationCursor | null;

  /** Cursor to fetch the previous page (null if at start) */
  prevCursor: PaginationCursor | null;

  /** Whether more items are available */
  hasMore: boolean;
}
