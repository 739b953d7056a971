/**
 * Collection Loader Delegate
 *
 * Receives the lifecycle notifications of a collection loader. Every admitted
 * page load gets exactly one willStartLoading (unless its fetch task could
 * not be built) and exactly one didFinishLoading.
 */

import type { LoadResult, PageLoadDescription } from '@pageflow/shared';
import type { CancellationCheck } from '../helpers/helper.js';

export interface CollectionLoaderDelegate<
  PageToken,
  CompletionResults,
  PreCompletionResults = unknown,
  FetchedObject = unknown,
> {
  /** Called on the coordination executor when the load becomes current */
  willStartLoading(description: PageLoadDescription<PageToken>): void;

  /** Called on the coordination executor once the load is over, whatever the outcome */
  didFinishLoading(description: PageLoadDescription<PageToken>, result: LoadResult<CompletionResults>): void;

  /**
   * Whether an object missing from a freshly loaded initial page may be
   * removed from the local collection. Defaults to true.
   */
  canDelete?(object: FetchedObject): boolean;

  /**
   * Called from the fetch task, after the import and before completion.
   * Throwing fails the load.
   */
  willFinishLoading?(
    description: PageLoadDescription<PageToken>,
    results: PreCompletionResults,
    throwIfCancelled: CancellationCheck
  ): void;
}

/**
 * Callbacks accepted by CallbackLoaderDelegate. All are optional.
 */
export interface LoaderDelegateCallbacks<
  PageToken,
  CompletionResults,
  PreCompletionResults = unknown,
  FetchedObject = unknown,
> {
  willStartLoading?: (description: PageLoadDescription<PageToken>) => void;
  didFinishLoading?: (description: PageLoadDescription<PageToken>, result: LoadResult<CompletionResults>) => void;
  canDelete?: (object: FetchedObject) => boolean;
  willFinishLoading?: (
    description: PageLoadDescription<PageToken>,
    results: PreCompletionResults,
    throwIfCancelled: CancellationCheck
  ) => void;
}

/**
 * Delegate built from individual callbacks
 */
export class CallbackLoaderDelegate<
  PageToken,
  CompletionResults,
  PreCompletionResults = unknown,
  FetchedObject = unknown,
> implements CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> {
  constructor(
    private readonly callbacks: LoaderDelegateCallbacks<PageToken, CompletionResults, PreCompletionResults, FetchedObject> = {}
  ) {}

  willStartLoading(description: PageLoadDescription<PageToken>): void {
    this.callbacks.willStartLoading?.(description);
  }

  didFinishLoading(description: PageLoadDescription<PageToken>, result: LoadResult<CompletionResults>): void {
    this.callbacks.didFinishLoading?.(description, result);
  }

  canDelete(object: FetchedObject): boolean {
    return this.callbacks.canDelete?.(object) ?? true;
  }

  willFinishLoading(
    description: PageLoadDescription<PageToken>,
    results: PreCompletionResults,
    throwIfCancelled: CancellationCheck
  ): void {
    this.callbacks.willFinishLoading?.(description, results, throwIfCancelled);
  }
}
