/**
 * Load admission policy
 *
 * Decides, from the requested concurrent load behavior and the loads already
 * current or pending, whether a new load is admitted and which existing loads
 * must be cancelled first. Pure: cancelling is left to the caller.
 */

import {
  ConcurrentLoadBehavior,
  isSameLoad,
  strictTokenEquality,
  type PageLoadDescription,
  type PageTokenEquality,
} from '@pageflow/shared';

/**
 * Which existing loads to cancel before admitting a new one
 */
export type CancellationScope = 'none' | 'pending' | 'all';

/**
 * Admission decision
 */
export type AdmissionDecision =
  | { admit: true; cancel: CancellationScope }
  | { admit: false };

/**
 * Admission request
 */
export interface AdmissionRequest<PageToken> {
  behavior: ConcurrentLoadBehavior;
  candidate: PageLoadDescription<PageToken>;
  current?: PageLoadDescription<PageToken>;
  pending: readonly PageLoadDescription<PageToken>[];
  isSamePage?: PageTokenEquality<PageToken>;
}

const ADMIT: AdmissionDecision = { admit: true, cancel: 'none' };
const SKIP: AdmissionDecision = { admit: false };

export function decideAdmission<PageToken>(request: AdmissionRequest<PageToken>): AdmissionDecision {
  const { behavior, candidate, current, pending } = request;
  const isSamePage = request.isSamePage ?? strictTokenEquality;
  const active = current ? [current, ...pending] : pending;

  switch (behavior) {
    case ConcurrentLoadBehavior.QUEUE:
      return ADMIT;
    case ConcurrentLoadBehavior.REPLACE_QUEUE:
      return { admit: true, cancel: 'pending' };
    case ConcurrentLoadBehavior.CANCEL_ALL_OTHER:
      return { admit: true, cancel: 'all' };

    case ConcurrentLoadBehavior.SKIP:
      return active.length === 0 ? ADMIT : SKIP;
    case ConcurrentLoadBehavior.SKIP_SAME:
      return active.some((load) => isSameLoad(load, candidate, isSamePage)) ? SKIP : ADMIT;
    case ConcurrentLoadBehavior.SKIP_SAME_REASON:
      return active.some((load) => load.reason === candidate.reason) ? SKIP : ADMIT;
    case ConcurrentLoadBehavior.SKIP_SAME_PAGE_INFO:
      return active.some((load) => isSamePage(load.pageToken, candidate.pageToken)) ? SKIP : ADMIT;
  }
}
