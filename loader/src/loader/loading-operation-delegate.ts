/**
 * Loading operation delegate built by the collection loader for each load
 *
 * Runs inside the fetch task. After an initial page has been imported, the
 * objects of the local collection that the page no longer contains are
 * removed (when the delegate allows it), then the delegate gets its
 * willFinishLoading checkpoint.
 */

import { LoadReason, type PageLoadDescription } from '@pageflow/shared';
import type {
  CancellationCheck,
  CollectionLoaderHelper,
  LoadingOperationDelegate,
} from '../helpers/helper.js';
import type { CollectionLoaderDelegate } from './delegate.js';

export class PageLoadOperationDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject>
  implements LoadingOperationDelegate<PreCompletionResults>
{
  constructor(
    private readonly description: PageLoadDescription<PageToken>,
    private readonly helper: CollectionLoaderHelper<PageToken, CompletionResults, PreCompletionResults, FetchedObject>,
    private readonly delegate:
      | CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject>
      | undefined
  ) {}

  onRemoteOperationWillStart(throwIfCancelled: CancellationCheck): void {
    throwIfCancelled();
  }

  onOperationWillImportResults(throwIfCancelled: CancellationCheck): boolean {
    throwIfCancelled();
    return true;
  }

  onOperationDidFinishImport(results: PreCompletionResults, throwIfCancelled: CancellationCheck): void {
    if (this.description.reason === LoadReason.INITIAL_PAGE) {
      this.removeObjectsMissingFrom(results, throwIfCancelled);
    }
    this.delegate?.willFinishLoading?.(this.description, results, throwIfCancelled);
  }

  /**
   * Remove the local objects the freshly loaded initial page does not contain
   * @returns Number of removed objects
   */
  removeObjectsMissingFrom(results: PreCompletionResults, throwIfCancelled: CancellationCheck): number {
    const kept = new Set(this.helper.objectsFrom(results));
    // Snapshot: deleting mutates the helper's collection
    const candidates = [...this.helper.currentObjects()];
    let removed = 0;

    for (const object of candidates) {
      throwIfCancelled();
      if (kept.has(object)) {
        continue;
      }
      if (this.delegate?.canDelete?.(object) ?? true) {
        this.helper.deleteObject(object);
        removed++;
      }
    }

    return removed;
  }
}
