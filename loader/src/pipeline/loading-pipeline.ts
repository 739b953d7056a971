/**
 * Loading Pipeline
 *
 * Wraps one page load into three tasks chained in order:
 *
 *   completion[i-1] -> prestart[i] -> fetch[i] -> completion[i]
 *
 * prestart and completion run on the coordination executor, fetch on the
 * fetch executor. Chaining each prestart to the previous completion keeps a
 * single pipeline current at a time and makes pipelines complete in the
 * order they were submitted, whatever the fetch latency.
 *
 * Cancelling a pipeline cancels its fetch task only. prestart and completion
 * always run so the delegate hears about every load exactly once.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LoadResult, PageLoadDescription } from '@pageflow/shared';
import { failure } from '@pageflow/shared';
import { CancellationError, invariant, toError } from '../errors.js';
import type { Executor } from './executors.js';
import { Task } from './task.js';

/**
 * Cancellation view handed to a running fetch
 */
export interface FetchContext {
  /** Aborted when the load is cancelled; pass it to I/O that accepts one */
  readonly signal: AbortSignal;
  readonly isCancelled: boolean;
  /** Throws a CancellationError if the load was cancelled */
  throwIfCancelled(): void;
}

/**
 * Work performed at each stage of a pipeline
 */
export interface LoadingPipelineStages<PageToken, CompletionResults> {
  prestart(pipeline: LoadingPipeline<PageToken, CompletionResults>): void;
  fetch(context: FetchContext): Promise<LoadResult<CompletionResults>>;
  completion(
    pipeline: LoadingPipeline<PageToken, CompletionResults>,
    result: LoadResult<CompletionResults>
  ): void;
}

/**
 * LoadingPipeline configuration
 */
export interface LoadingPipelineConfig<PageToken, CompletionResults> {
  description: PageLoadDescription<PageToken>;
  stages: LoadingPipelineStages<PageToken, CompletionResults>;
  coordinationExecutor: Executor;
  fetchExecutor: Executor;
}

export class LoadingPipeline<PageToken, CompletionResults> {
  readonly id: string = uuidv4();
  readonly description: PageLoadDescription<PageToken>;
  readonly prestart: Task;
  readonly fetch: Task;
  readonly completion: Task;
  readonly createdAt: number = Date.now();
  private result?: LoadResult<CompletionResults>;

  constructor(config: LoadingPipelineConfig<PageToken, CompletionResults>) {
    const { description, stages, coordinationExecutor, fetchExecutor } = config;
    this.description = description;

    this.prestart = new Task(`prestart:${this.id}`, coordinationExecutor, () => {
      stages.prestart(this);
    });

    this.fetch = new Task(`fetch:${this.id}`, fetchExecutor, async (task) => {
      if (task.isCancelled) {
        this.result = failure(new CancellationError());
        return;
      }
      try {
        this.result = await stages.fetch(createFetchContext(task));
      } catch (error) {
        this.result = failure(toError(error));
      }
    });

    this.completion = new Task(`completion:${this.id}`, coordinationExecutor, () => {
      invariant(this.result !== undefined, `Completion of ${this.id} ran before its fetch finished`);
      stages.completion(this, this.result);
    });

    this.fetch.addDependency(this.prestart);
    this.completion.addDependency(this.fetch);
  }

  /**
   * Run after another pipeline has completed
   */
  chainAfter(previous: LoadingPipeline<PageToken, CompletionResults> | undefined): void {
    if (previous) {
      this.prestart.addDependency(previous.completion);
    }
  }

  /**
   * Additional tasks that must finish before this pipeline starts
   */
  addPrestartDependencies(tasks: Iterable<Task>): void {
    this.prestart.addDependencies(tasks);
  }

  schedule(): void {
    this.prestart.schedule();
    this.fetch.schedule();
    this.completion.schedule();
  }

  /**
   * Cancel the fetch. prestart and completion still run.
   */
  cancel(): void {
    this.fetch.cancel();
  }

  get isCancelled(): boolean {
    return this.fetch.isCancelled;
  }

  /**
   * Resolves once the completion stage has run
   */
  get finished(): Promise<void> {
    return this.completion.finished;
  }
}

function createFetchContext(task: Task): FetchContext {
  return {
    signal: task.signal,
    get isCancelled() {
      return task.isCancelled;
    },
    throwIfCancelled: () => task.throwIfCancelled(),
  };
}
