/**
 * Collection Loader
 *
 * Loads a collection page by page through a helper. The loader does not
 * fetch anything itself: the fetch tasks built by the helper do. It makes
 * sure only one page load is current at a time, that loads run and finish in
 * the order they were admitted, and it keeps track of the next and previous
 * page tokens.
 *
 * The helper and the delegate are captured when a load is admitted and stay
 * referenced until that load has finished.
 */

import { EventEmitter } from 'events';
import {
  ConcurrentLoadBehavior,
  DEFAULT_LOADER_CONFIG,
  LoadReason,
  LoaderEventType,
  describePageLoad,
  failure,
  type CollectionLoaderConfiguration,
  type LoadCancelledEvent,
  type LoadFinishedEvent,
  type LoadQueuedEvent,
  type LoadResult,
  type LoadSkippedEvent,
  type LoadStartedEvent,
  type LoaderEvent,
  type PageLoadDescription,
} from '@pageflow/shared';
import { ConstructionError, invariant } from '../errors.js';
import type { CollectionLoaderHelper, FetchTask } from '../helpers/helper.js';
import { ConcurrentExecutor, SerialExecutor, type Executor } from '../pipeline/executors.js';
import { LoadingPipeline } from '../pipeline/loading-pipeline.js';
import type { Task } from '../pipeline/task.js';
import {
  CallbackLoaderDelegate,
  type CollectionLoaderDelegate,
  type LoaderDelegateCallbacks,
} from './delegate.js';
import { decideAdmission } from './load-policy.js';
import { PageLoadOperationDelegate } from './loading-operation-delegate.js';
import { PageCursorState } from './page-cursor.js';

/**
 * Collection loader configuration
 */
export interface CollectionLoaderConfig extends Partial<CollectionLoaderConfiguration> {
  /** Executor running fetch tasks; may be shared between loaders */
  fetchExecutor?: Executor;
  /** Executor running prestart and completion stages */
  coordinationExecutor?: Executor;
}

/**
 * Collection loader class
 *
 * Events emitted:
 * - 'load:queued' (LoadQueuedEvent): When a load is admitted
 * - 'load:skipped' (LoadSkippedEvent): When the concurrent load behavior drops a load
 * - 'load:started' (LoadStartedEvent): When a load becomes current
 * - 'load:cancelled' (LoadCancelledEvent): When cancellation is requested for a load
 * - 'load:finished' (LoadFinishedEvent): After the delegate was told a load finished
 */
export class CollectionLoader<
  PageToken,
  CompletionResults,
  PreCompletionResults = unknown,
  FetchedObject = unknown,
> extends EventEmitter {
  readonly helper: CollectionLoaderHelper<PageToken, CompletionResults, PreCompletionResults, FetchedObject>;
  private readonly config: CollectionLoaderConfiguration;
  private readonly fetchExecutor: Executor;
  private readonly coordinationExecutor: Executor;
  private readonly cursor = new PageCursorState<PageToken>();

  // Only touched from the caller's turn and from coordination executor jobs
  private currentPipeline?: LoadingPipeline<PageToken, CompletionResults>;
  private pendingPipelines: LoadingPipeline<PageToken, CompletionResults>[] = [];

  private delegateRef?: CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject>;

  constructor(
    helper: CollectionLoaderHelper<PageToken, CompletionResults, PreCompletionResults, FetchedObject>,
    config: CollectionLoaderConfig = {}
  ) {
    super();
    this.helper = helper;
    this.config = {
      loaderId: config.loaderId ?? DEFAULT_LOADER_CONFIG.loaderId,
      debug: config.debug ?? DEFAULT_LOADER_CONFIG.debug,
    };
    this.fetchExecutor = config.fetchExecutor ?? new ConcurrentExecutor({ name: `fetch:${this.config.loaderId}` });
    this.coordinationExecutor = config.coordinationExecutor ?? new SerialExecutor(`coordination:${this.config.loaderId}`);
  }

  get loaderId(): string {
    return this.config.loaderId;
  }

  get delegate():
    | CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject>
    | undefined {
    return this.delegateRef;
  }

  /**
   * Loads already admitted keep the delegate they were admitted with
   */
  set delegate(
    delegate: CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> | undefined
  ) {
    this.delegateRef = delegate;
  }

  /**
   * Install a delegate built from individual callbacks
   */
  setDelegateCallbacks(
    callbacks: LoaderDelegateCallbacks<PageToken, CompletionResults, PreCompletionResults, FetchedObject>
  ): CallbackLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> {
    const delegate = new CallbackLoaderDelegate(callbacks);
    this.delegateRef = delegate;
    return delegate;
  }

  get nextPageToken(): PageToken | undefined {
    return this.cursor.next;
  }

  get previousPageToken(): PageToken | undefined {
    return this.cursor.previous;
  }

  /**
   * Description of the load currently running, if any
   */
  get currentPageLoad(): PageLoadDescription<PageToken> | undefined {
    return this.currentPipeline?.description;
  }

  /**
   * Descriptions of the loads waiting to start, in order
   */
  get pendingPageLoads(): PageLoadDescription<PageToken>[] {
    return this.pendingPipelines.map((pipeline) => pipeline.description);
  }

  get isLoading(): boolean {
    return this.currentPipeline !== undefined || this.pendingPipelines.length > 0;
  }

  /**
   * Load the initial page: the one loaded when no page token is known, or
   * for a complete reload. Every other load is cancelled.
   *
   * Not named "first page": in a bidirectional collection the initial page
   * need not be the first one.
   */
  loadInitialPage(): string | undefined {
    const description = describePageLoad(this.helper.initialPageToken(), LoadReason.INITIAL_PAGE);
    return this.load(description, ConcurrentLoadBehavior.CANCEL_ALL_OTHER);
  }

  /**
   * Load the page after the last loaded one. No-op without a next page token.
   */
  loadNextPage(): string | undefined {
    const nextPageToken = this.cursor.next;
    if (nextPageToken === undefined) {
      return undefined;
    }
    const description = describePageLoad(nextPageToken, LoadReason.NEXT_PAGE);
    return this.load(description, ConcurrentLoadBehavior.SKIP_SAME_REASON);
  }

  /**
   * Load the page before the first loaded one. No-op without a previous page token.
   */
  loadPreviousPage(): string | undefined {
    const previousPageToken = this.cursor.previous;
    if (previousPageToken === undefined) {
      return undefined;
    }
    const description = describePageLoad(previousPageToken, LoadReason.PREVIOUS_PAGE);
    return this.load(description, ConcurrentLoadBehavior.SKIP_SAME_REASON);
  }

  /**
   * Cancel the current load and every pending one. They still finish and
   * notify the delegate.
   */
  cancelAll(): void {
    if (this.currentPipeline) {
      this.cancelPipeline(this.currentPipeline, true);
    }
    for (const pipeline of this.pendingPipelines) {
      this.cancelPipeline(pipeline, false);
    }
  }

  /**
   * Admit a page load
   *
   * Only one page load runs at a time: an admitted load waits for the
   * completion of the load admitted before it.
   *
   * @param extraDependencies - Tasks that must finish before the load starts
   * @returns Load ID, or undefined when the load was skipped or its fetch task could not be built
   */
  load(
    description: PageLoadDescription<PageToken>,
    behavior: ConcurrentLoadBehavior = ConcurrentLoadBehavior.QUEUE,
    extraDependencies: Iterable<Task> = []
  ): string | undefined {
    // Same helper and delegate for every callback of this load
    const helper = this.helper;
    const delegate = this.delegateRef;
    const isSamePage = helper.isSamePage;

    const decision = decideAdmission<PageToken>({
      behavior,
      candidate: description,
      current: this.currentPipeline?.description,
      pending: this.pendingPageLoads,
      isSamePage: isSamePage && ((a, b) => isSamePage.call(helper, a, b)),
    });

    if (!decision.admit) {
      this.debug(`Skipping ${description.reason} load (${behavior})`);
      const event: LoadSkippedEvent = {
        type: LoaderEventType.LOAD_SKIPPED,
        timestamp: new Date().toISOString(),
        loaderId: this.config.loaderId,
        reason: description.reason,
        behavior,
      };
      this.emitSafely('load:skipped', event);
      return undefined;
    }

    if (decision.cancel === 'all' && this.currentPipeline) {
      this.cancelPipeline(this.currentPipeline, true);
    }
    if (decision.cancel !== 'none') {
      for (const pipeline of this.pendingPipelines) {
        this.cancelPipeline(pipeline, false);
      }
    }

    const operationDelegate = new PageLoadOperationDelegate(description, helper, delegate);
    let fetchTask: FetchTask;
    try {
      fetchTask = helper.createFetchTask(description.pageToken, operationDelegate);
    } catch (error) {
      const constructionError = new ConstructionError(
        `Could not build the fetch task for a ${description.reason} load`,
        error
      );
      this.finishLoad(delegate, description, failure(constructionError), undefined, Date.now());
      return undefined;
    }

    const pipeline = new LoadingPipeline<PageToken, CompletionResults>({
      description,
      coordinationExecutor: this.coordinationExecutor,
      fetchExecutor: this.fetchExecutor,
      stages: {
        prestart: (started) => this.startPipeline(started, delegate),
        fetch: async (context) => {
          await fetchTask.execute(context);
          return helper.resultOf(fetchTask);
        },
        completion: (finished, result) => this.completePipeline(finished, result, delegate),
      },
    });

    pipeline.chainAfter(this.pendingPipelines.at(-1) ?? this.currentPipeline);
    pipeline.addPrestartDependencies(extraDependencies);
    this.pendingPipelines.push(pipeline);
    pipeline.schedule();

    this.debug(`Queued ${description.reason} load ${pipeline.id} (${behavior})`);
    const event: LoadQueuedEvent = {
      type: LoaderEventType.LOAD_QUEUED,
      timestamp: new Date().toISOString(),
      loaderId: this.config.loaderId,
      reason: description.reason,
      loadId: pipeline.id,
      behavior,
      queueDepth: this.pendingPipelines.length + (this.currentPipeline ? 1 : 0),
    };
    this.emitSafely('load:queued', event);

    return pipeline.id;
  }

  /**
   * Resolves once every load admitted so far has finished
   */
  async whenIdle(): Promise<void> {
    const last = this.pendingPipelines.at(-1) ?? this.currentPipeline;
    if (!last) {
      return;
    }
    await last.finished;
    // Loads admitted while waiting
    await this.whenIdle();
  }

  private startPipeline(
    pipeline: LoadingPipeline<PageToken, CompletionResults>,
    delegate: CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> | undefined
  ): void {
    this.notifyDelegate('willStartLoading', () => delegate?.willStartLoading(pipeline.description));

    invariant(this.currentPipeline === undefined, `Load ${pipeline.id} started while another load is current`);
    const head = this.pendingPipelines.shift();
    invariant(head === pipeline, `Load ${pipeline.id} started but is not at the head of the pending queue`);
    this.currentPipeline = pipeline;

    this.debug(`Started ${pipeline.description.reason} load ${pipeline.id}`);
    const event: LoadStartedEvent = {
      type: LoaderEventType.LOAD_STARTED,
      timestamp: new Date().toISOString(),
      loaderId: this.config.loaderId,
      reason: pipeline.description.reason,
      loadId: pipeline.id,
    };
    this.emitSafely('load:started', event);
  }

  private completePipeline(
    pipeline: LoadingPipeline<PageToken, CompletionResults>,
    result: LoadResult<CompletionResults>,
    delegate: CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> | undefined
  ): void {
    if (result.ok) {
      this.cursor.record(pipeline.description, result.value, this.helper);
    }

    invariant(this.currentPipeline === pipeline, `Load ${pipeline.id} completed but is not the current load`);
    this.currentPipeline = undefined;

    this.finishLoad(delegate, pipeline.description, result, pipeline.id, pipeline.createdAt);
  }

  private finishLoad(
    delegate: CollectionLoaderDelegate<PageToken, CompletionResults, PreCompletionResults, FetchedObject> | undefined,
    description: PageLoadDescription<PageToken>,
    result: LoadResult<CompletionResults>,
    loadId: string | undefined,
    startedAt: number
  ): void {
    this.notifyDelegate('didFinishLoading', () => delegate?.didFinishLoading(description, result));

    this.debug(
      `Finished ${description.reason} load ${loadId ?? '(not constructed)'}: ${result.ok ? 'ok' : result.error.name}`
    );
    const event: LoadFinishedEvent = {
      type: LoaderEventType.LOAD_FINISHED,
      timestamp: new Date().toISOString(),
      loaderId: this.config.loaderId,
      reason: description.reason,
      loadId,
      succeeded: result.ok,
      durationMs: Date.now() - startedAt,
    };
    if (!result.ok) {
      event.errorName = result.error.name;
      event.errorMessage = result.error.message;
    }
    this.emitSafely('load:finished', event);
  }

  private cancelPipeline(pipeline: LoadingPipeline<PageToken, CompletionResults>, wasCurrent: boolean): void {
    if (pipeline.isCancelled) {
      return;
    }
    pipeline.cancel();

    this.debug(`Cancelled ${pipeline.description.reason} load ${pipeline.id}`);
    const event: LoadCancelledEvent = {
      type: LoaderEventType.LOAD_CANCELLED,
      timestamp: new Date().toISOString(),
      loaderId: this.config.loaderId,
      reason: pipeline.description.reason,
      loadId: pipeline.id,
      wasCurrent,
    };
    this.emitSafely('load:cancelled', event);
  }

  /**
   * Delegate code must not break the loader's bookkeeping
   */
  private notifyDelegate(callback: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      console.error(`Collection loader ${this.config.loaderId}: delegate ${callback} threw:`, error);
    }
  }

  /**
   * Listeners run inside coordination jobs; their errors must not escape
   */
  private emitSafely(eventName: string, event: LoaderEvent): void {
    try {
      this.emit(eventName, event);
    } catch (error) {
      console.error(`Collection loader ${this.config.loaderId}: ${eventName} listener threw:`, error);
    }
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.debug(`[collection-loader:${this.config.loaderId}] ${message}`);
    }
  }

  /**
   * Stop emitting events. Loads already admitted still run to completion.
   */
  shutdown(): void {
    this.cancelAll();
    this.removeAllListeners();
  }
}
