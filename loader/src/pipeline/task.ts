/**
 * Task
 *
 * A unit of work bound to an executor, with explicit dependencies and
 * cooperative cancellation. A task waits for every dependency to finish
 * (cancelled or not) before its body is handed to its executor. Cancelling
 * a task never skips its body: the body reads isCancelled and decides.
 */

import { v4 as uuidv4 } from 'uuid';
import { CancellationError, InvariantViolationError } from '../errors.js';
import type { Executor } from './executors.js';

/**
 * Task lifecycle state
 */
export type TaskState = 'created' | 'waiting' | 'running' | 'finished';

/**
 * Work performed by a task
 */
export type TaskBody = (task: Task) => void | Promise<void>;

export class Task {
  readonly id: string = uuidv4();
  private state: TaskState = 'created';
  private readonly dependencies: Task[] = [];
  private readonly controller = new AbortController();
  private resolveFinished: () => void = () => {};
  /** Resolves once the body has returned (or its promise settled). Never rejects. */
  readonly finished: Promise<void>;

  constructor(
    readonly name: string,
    private readonly executor: Executor,
    private readonly body: TaskBody,
  ) {
    this.finished = new Promise<void>((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  get currentState(): TaskState {
    return this.state;
  }

  get isFinished(): boolean {
    return this.state === 'finished';
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Aborted when the task is cancelled
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Make this task wait for another one
   * @throws InvariantViolationError once the task is scheduled
   */
  addDependency(task: Task): void {
    if (this.state !== 'created') {
      throw new InvariantViolationError(`Cannot add a dependency to ${this.name} once scheduled`);
    }
    if (task === this) {
      throw new InvariantViolationError(`${this.name} cannot depend on itself`);
    }
    this.dependencies.push(task);
  }

  addDependencies(tasks: Iterable<Task>): void {
    for (const task of tasks) {
      this.addDependency(task);
    }
  }

  /**
   * Request cancellation. Idempotent; has no effect on a finished task.
   */
  cancel(): void {
    if (this.state === 'finished' || this.isCancelled) {
      return;
    }
    this.controller.abort(new CancellationError(`${this.name} was cancelled`));
  }

  /**
   * Throws a CancellationError if cancellation was requested
   */
  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancellationError(`${this.name} was cancelled`);
    }
  }

  /**
   * Wait for the dependencies, then hand the body to the executor
   */
  schedule(): void {
    if (this.state !== 'created') {
      throw new InvariantViolationError(`${this.name} was scheduled twice`);
    }
    this.state = 'waiting';

    void Promise.all(this.dependencies.map((dependency) => dependency.finished)).then(() => {
      this.executor.enqueue(() => this.run());
    });
  }

  private run(): void | Promise<void> {
    this.state = 'running';
    let outcome: void | Promise<void>;
    try {
      outcome = this.body(this);
    } catch (error) {
      this.finish();
      throw error;
    }
    if (outcome instanceof Promise) {
      return outcome.finally(() => this.finish());
    }
    this.finish();
  }

  private finish(): void {
    this.state = 'finished';
    this.resolveFinished();
  }
}
