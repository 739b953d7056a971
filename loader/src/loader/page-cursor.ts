/**
 * Page Cursor State
 *
 * Next and previous page tokens of a collection loader. Only a successful
 * load updates them, and the load reason decides which ones.
 */

import { LoadReason, type PageLoadDescription } from '@pageflow/shared';

/**
 * Derives neighbouring page tokens from a load's results
 */
export interface PageTokenDerivation<PageToken, CompletionResults> {
  nextPageToken(results: CompletionResults, from: PageToken): PageToken | undefined;
  previousPageToken(results: CompletionResults, from: PageToken): PageToken | undefined;
}

export class PageCursorState<PageToken> {
  private nextToken?: PageToken;
  private previousToken?: PageToken;

  get next(): PageToken | undefined {
    return this.nextToken;
  }

  get previous(): PageToken | undefined {
    return this.previousToken;
  }

  /**
   * Apply the results of a successful load
   */
  record<CompletionResults>(
    description: PageLoadDescription<PageToken>,
    results: CompletionResults,
    derivation: PageTokenDerivation<PageToken, CompletionResults>
  ): void {
    const from = description.pageToken;

    switch (description.reason) {
      case LoadReason.INITIAL_PAGE:
        this.nextToken = derivation.nextPageToken(results, from);
        this.previousToken = derivation.previousPageToken(results, from);
        break;
      case LoadReason.NEXT_PAGE:
        this.nextToken = derivation.nextPageToken(results, from);
        break;
      case LoadReason.PREVIOUS_PAGE:
        this.previousToken = derivation.previousPageToken(results, from);
        break;
      case LoadReason.SYNC:
        break;
    }
  }
}
