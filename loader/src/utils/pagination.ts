/**
 * Offset cursor utilities
 *
 * Uses base64url-encoded JSON to carry an offset page position in an opaque
 * page token. Supports filter consistency checking through a filter hash.
 */

import { createHash } from 'crypto';
import type { PaginationCursor, PaginationState, PaginationMetadata } from '@pageflow/shared';

/**
 * Largest page size a cursor may carry
 */
export const MAX_PAGE_SIZE = 1000;

/**
 * Page size used when none (or NaN) is given
 */
export const DEFAULT_PAGE_SIZE = 20;

/**
 * Encode pagination state into an opaque cursor
 * @returns Base64url-encoded cursor string
 */
export function encodeCursor(state: PaginationState): PaginationCursor {
  const json = JSON.stringify(state);
  return Buffer.from(json, 'utf-8').toString('base64url');
}

/**
 * Decode pagination cursor into state
 * @throws Error if cursor is invalid
 */
export function decodeCursor(cursor: PaginationCursor): PaginationState {
  try {
    const json = Buffer.from(cursor, 'base64url').toString('utf-8');
    const parsed: unknown = JSON.parse(json);

    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('Cursor is not an object');
    }

    const fields: Record<string, unknown> = { ...parsed };
    const { offset, limit, filterHash } = fields;

    if (typeof offset !== 'number' || !Number.isInteger(offset) || offset < 0) {
      throw new Error('Invalid offset in cursor');
    }

    if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
      throw new Error('Invalid limit in cursor');
    }

    if (filterHash !== undefined && typeof filterHash !== 'string') {
      throw new Error('Invalid filter hash in cursor');
    }

    const state: PaginationState = { offset, limit };
    if (filterHash !== undefined) state.filterHash = filterHash;
    return state;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid pagination cursor: ${message}`);
  }
}

/**
 * Check that a page token decodes and was built for the given filters
 * @param filterHash - Filter hash of the helper, when it applies filters
 */
export function validateCursor(
  cursor: PaginationCursor,
  filterHash?: string
): { valid: boolean; error?: string } {
  let state: PaginationState;
  try {
    state = decodeCursor(cursor);
  } catch (err) {
    return { valid: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (state.filterHash !== filterHash) {
    return {
      valid: false,
      error: 'Cursor filter mismatch - filters changed between requests. Start a new query.',
    };
  }
  return { valid: true };
}

/**
 * Fingerprint of a filter set: sha256 of its key-sorted JSON, 16 hex chars
 */
export function createFilterHash(filters: Record<string, unknown>): string {
  const canonical = Object.fromEntries(
    Object.keys(filters)
      .sort()
      .map((key) => [key, filters[key]])
  );
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}

/**
 * Describe a loaded page along with the page tokens of its neighbours
 *
 * Without a known total, a full page is taken to mean more items follow.
 */
export function createPaginationMetadata(page: {
  /** Items in the page */
  count: number;
  /** Items in the whole source, when known */
  total?: number;
  offset: number;
  limit: number;
  filterHash?: string;
}): PaginationMetadata {
  const { count, total, offset, limit, filterHash } = page;
  const end = offset + count;
  const hasMore = total === undefined ? count === limit : end < total;
  const tokenAt = (at: number): PaginationCursor =>
    encodeCursor(filterHash ? { offset: at, limit, filterHash } : { offset: at, limit });

  const metadata: PaginationMetadata = {
    count,
    nextCursor: hasMore ? tokenAt(end) : null,
    prevCursor: offset > 0 ? tokenAt(Math.max(0, offset - limit)) : null,
    hasMore,
  };
  if (total !== undefined) metadata.total = total;
  return metadata;
}

/**
 * Clamp a requested page size to 1..MAX_PAGE_SIZE. NaN gives DEFAULT_PAGE_SIZE.
 */
export function clampPageSize(pageSize: number): number {
  if (Number.isNaN(pageSize)) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.max(Math.trunc(pageSize), 1), MAX_PAGE_SIZE);
}
