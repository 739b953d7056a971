/**
 * Page Load Model
 *
 * A page load is described by the page it targets (an opaque token defined
 * by the loader helper) and the reason it was requested. The reason decides
 * which page cursors a successful load updates:
 * - initial-page: both next and previous
 * - next-page: next only
 * - previous-page: previous only
 * - sync: none
 */

/**
 * Why a page is being loaded
 */
export enum LoadReason {
  INITIAL_PAGE = 'initial-page',
  NEXT_PAGE = 'next-page',
  PREVIOUS_PAGE = 'previous-page',
  /** Bulk reconciliation of a collection range. Reconciliation itself is not defined. */
  SYNC = 'sync',
}

/**
 * What to do with a new page load when others are queued or in progress
 */
export enum ConcurrentLoadBehavior {
  /** Queue the new load after all the queued loads */
  QUEUE = 'queue',
  /** Cancel all queued loads except the current one, then queue the new load */
  REPLACE_QUEUE = 'replace-queue',
  /** Cancel all queued loads and the current one, then queue the new load */
  CANCEL_ALL_OTHER = 'cancel-all-other',

  /** Skip the new load if any load is queued or in progress */
  SKIP = 'skip',
  /** Skip the new load if one with the same page and reason is queued or in progress */
  SKIP_SAME = 'skip-same',
  /** Skip the new load if one with the same reason is queued or in progress */
  SKIP_SAME_REASON = 'skip-same-reason',
  /** Skip the new load if one for the same page is queued or in progress */
  SKIP_SAME_PAGE_INFO = 'skip-same-page-info',
}

/**
 * All valid concurrent load behaviors
 */
export const CONCURRENT_LOAD_BEHAVIORS: readonly ConcurrentLoadBehavior[] = Object.values(ConcurrentLoadBehavior);

/**
 * Validates that a value is a ConcurrentLoadBehavior
 */
export function isConcurrentLoadBehavior(value: unknown): value is ConcurrentLoadBehavior {
  return CONCURRENT_LOAD_BEHAVIORS.some((behavior) => behavior === value);
}

/**
 * Identifies one page load attempt
 */
export interface PageLoadDescription<PageToken> {
  readonly pageToken: PageToken;
  readonly reason: LoadReason;
}

/**
 * Page token equality. Defaults to strict equality.
 */
export type PageTokenEquality<PageToken> = (a: PageToken, b: PageToken) => boolean;

/**
 * Default page token equality
 */
export function strictTokenEquality<PageToken>(a: PageToken, b: PageToken): boolean {
  return a === b;
}

/**
 * Create an immutable page load description
 */
export function describePageLoad<PageToken>(
  pageToken: PageToken,
  reason: LoadReason
): PageLoadDescription<PageToken> {
  return Object.freeze({ pageToken, reason });
}

/**
 * Structural equality of two page load descriptions (same page, same reason)
 */
export function isSameLoad<PageToken>(
  a: PageLoadDescription<PageToken>,
  b: PageLoadDescription<PageToken>,
  isSamePage: PageTokenEquality<PageToken> = strictTokenEquality
): boolean {
  return a.reason === b.reason && isSamePage(a.pageToken, b.pageToken);
}

/**
 * Outcome of a page load
 */
export type LoadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/**
 * Build a successful load result
 */
export function success<T>(value: T): LoadResult<T> {
  return { ok: true, value };
}

/**
 * Build a failed load result
 */
export function failure<T = never>(error: Error): LoadResult<T> {
  return { ok: false, error };
}
