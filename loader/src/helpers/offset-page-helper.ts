/**
 * Offset Page Helper
 *
 * Collection loader helper for sources paged by offset and limit. Page
 * tokens are opaque offset cursors; loaded items are kept in a local
 * collection ordered by their absolute position in the source.
 */

import {
  failure,
  success,
  type LoadResult,
  type PaginationCursor,
  type PaginationMetadata,
  type PaginationState,
} from '@pageflow/shared';
import { FetchError } from '../errors.js';
import type { FetchContext } from '../pipeline/loading-pipeline.js';
import {
  DEFAULT_PAGE_SIZE,
  clampPageSize,
  createFilterHash,
  createPaginationMetadata,
  decodeCursor,
  encodeCursor,
  validateCursor,
} from '../utils/pagination.js';
import type { CollectionLoaderHelper, FetchTask, LoadingOperationDelegate } from './helper.js';

/**
 * A page returned by an offset source
 */
export interface OffsetPage<Item> {
  items: Item[];
  /** Total number of items in the source, when known */
  total?: number;
}

/**
 * Fetches one page. Should stop early when context.signal aborts.
 */
export type OffsetPageSource<Item> = (state: PaginationState, context: FetchContext) => Promise<OffsetPage<Item>>;

/**
 * Results of a finished offset page load
 */
export interface OffsetPageResults<Item> {
  /** Items of the page as imported (empty when the import was declined) */
  items: Item[];
  metadata: PaginationMetadata;
}

/**
 * Offset page helper configuration
 */
export interface OffsetPageHelperConfig<Item> {
  source: OffsetPageSource<Item>;
  /** Stable identity of an item across loads */
  identify: (item: Item) => string;
  /** Page size (default: 20, clamped to 1..1000) */
  pageSize?: number;
  /** Filters applied by the source; hashed into every cursor */
  filters?: Record<string, unknown>;
}

interface StoredItem<Item> {
  item: Item;
  position: number;
}

/**
 * Fetch task for one offset page
 */
export class OffsetFetchTask<Item> implements FetchTask {
  private outcome?: OffsetPageResults<Item>;

  constructor(
    readonly state: PaginationState,
    private readonly helper: OffsetPageHelper<Item>,
    private readonly delegate: LoadingOperationDelegate<Item[]>
  ) {}

  async execute(context: FetchContext): Promise<void> {
    const check = (): void => context.throwIfCancelled();

    check();
    this.delegate.onRemoteOperationWillStart(check);

    const page = await this.helper.source(this.state, context);
    check();

    let imported: Item[] = [];
    if (this.delegate.onOperationWillImportResults(check)) {
      imported = this.helper.importPage(this.state.offset, page.items, check);
      this.delegate.onOperationDidFinishImport(imported, check);
    }

    const metadata: Parameters<typeof createPaginationMetadata>[0] = {
      count: page.items.length,
      offset: this.state.offset,
      limit: this.state.limit,
    };
    if (page.total !== undefined) metadata.total = page.total;
    if (this.state.filterHash !== undefined) metadata.filterHash = this.state.filterHash;

    this.outcome = { items: imported, metadata: createPaginationMetadata(metadata) };
  }

  get results(): OffsetPageResults<Item> | undefined {
    return this.outcome;
  }
}

export class OffsetPageHelper<Item>
  implements CollectionLoaderHelper<PaginationCursor, OffsetPageResults<Item>, Item[], Item, OffsetFetchTask<Item>>
{
  readonly source: OffsetPageSource<Item>;
  readonly pageSize: number;
  readonly filterHash?: string;
  private readonly identify: (item: Item) => string;
  private readonly collection: Map<string, StoredItem<Item>> = new Map();

  constructor(config: OffsetPageHelperConfig<Item>) {
    this.source = config.source;
    this.identify = config.identify;
    this.pageSize = clampPageSize(config.pageSize ?? DEFAULT_PAGE_SIZE);
    if (config.filters) {
      this.filterHash = createFilterHash(config.filters);
    }
  }

  initialPageToken(): PaginationCursor {
    const state: PaginationState = { offset: 0, limit: this.pageSize };
    if (this.filterHash) state.filterHash = this.filterHash;
    return encodeCursor(state);
  }

  createFetchTask(pageToken: PaginationCursor, delegate: LoadingOperationDelegate<Item[]>): OffsetFetchTask<Item> {
    const validation = validateCursor(pageToken, this.filterHash);
    if (!validation.valid) {
      throw new Error(validation.error ?? 'Invalid pagination cursor');
    }
    return new OffsetFetchTask(decodeCursor(pageToken), this, delegate);
  }

  resultOf(finishedTask: OffsetFetchTask<Item>): LoadResult<OffsetPageResults<Item>> {
    const results = finishedTask.results;
    if (!results) {
      return failure(new FetchError('Offset fetch task has no results', finishedTask.state));
    }
    return success(results);
  }

  nextPageToken(results: OffsetPageResults<Item>): PaginationCursor | undefined {
    return results.metadata.nextCursor ?? undefined;
  }

  previousPageToken(results: OffsetPageResults<Item>): PaginationCursor | undefined {
    return results.metadata.prevCursor ?? undefined;
  }

  currentObjects(): readonly Item[] {
    return this.objects();
  }

  objectsFrom(results: Item[]): readonly Item[] {
    return results;
  }

  deleteObject(item: Item): void {
    const id = this.identify(item);
    if (this.collection.get(id)?.item === item) {
      this.collection.delete(id);
    }
  }

  /**
   * Items of the local collection, ordered by position
   */
  objects(): Item[] {
    return [...this.collection.values()]
      .sort((a, b) => a.position - b.position)
      .map((stored) => stored.item);
  }

  get size(): number {
    return this.collection.size;
  }

  /**
   * Store the items of a page at their absolute positions
   * @returns The stored items
   */
  importPage(offset: number, items: Item[], throwIfCancelled: () => void): Item[] {
    items.forEach((item, index) => {
      throwIfCancelled();
      this.collection.set(this.identify(item), { item, position: offset + index });
    });
    return items;
  }
}
