/**
 * Collection Loader Helper Contract
 *
 * The collection loader does not load anything itself. A helper knows how
 * to build a fetch task for a page token, how to read the task's results,
 * and how to derive the neighbouring page tokens from them. Helpers also
 * expose the objects of the local collection so that an initial page load
 * can remove objects that are no longer part of the collection.
 */

import type { LoadResult, PageTokenEquality } from '@pageflow/shared';
import type { FetchContext } from '../pipeline/loading-pipeline.js';

/**
 * Cancellation check handed to import hooks. Throws a CancellationError when
 * the load was cancelled.
 */
export type CancellationCheck = () => void;

/**
 * Checkpoints a fetch task reports to while it runs
 *
 * Built by the collection loader for every admitted load.
 */
export interface LoadingOperationDelegate<PreCompletionResults> {
  /** Call just before going remote. Throwing fails the load. */
  onRemoteOperationWillStart(throwIfCancelled: CancellationCheck): void;

  /**
   * Call before importing the fetched results.
   * When this returns false the results must not be imported, but the load
   * finishes successfully. Throwing fails the load.
   */
  onOperationWillImportResults(throwIfCancelled: CancellationCheck): boolean;

  /** Call right after the import. Throwing fails the load. */
  onOperationDidFinishImport(results: PreCompletionResults, throwIfCancelled: CancellationCheck): void;
}

/**
 * A page fetch built by a helper
 *
 * Implementations must call context.throwIfCancelled() at safe checkpoints.
 * Throwing (or rejecting) fails the load with the thrown error.
 */
export interface FetchTask {
  execute(context: FetchContext): Promise<void>;
}

export interface CollectionLoaderHelper<
  PageToken,
  CompletionResults,
  PreCompletionResults = unknown,
  FetchedObject = unknown,
  Fetch extends FetchTask = FetchTask,
> {
  /** Token of the page loaded when nothing is known, or for a full reload */
  initialPageToken(): PageToken;

  /**
   * Build the fetch task for a page
   * @throws when the task cannot be built; the load then fails without being queued
   */
  createFetchTask(pageToken: PageToken, delegate: LoadingOperationDelegate<PreCompletionResults>): Fetch;

  /** Results of a fetch task whose execute() resolved */
  resultOf(finishedTask: Fetch): LoadResult<CompletionResults>;

  nextPageToken(results: CompletionResults, from: PageToken): PageToken | undefined;
  previousPageToken(results: CompletionResults, from: PageToken): PageToken | undefined;

  /** Objects currently in the local collection */
  currentObjects(): readonly FetchedObject[];
  /** Objects imported by a load */
  objectsFrom(results: PreCompletionResults): readonly FetchedObject[];
  /** Remove an object from the local collection */
  deleteObject(object: FetchedObject): void;

  /** Page token equality (default: strict equality) */
  isSamePage?: PageTokenEquality<PageToken>;
}
