/**
 * Executors
 *
 * Two execution contexts drive page loads:
 * - SerialExecutor (coordination): runs short synchronous jobs one at a
 *   time, in submission order, on a later turn of the event loop. All loader
 *   state changes happen here or in the caller's own turn.
 * - ConcurrentExecutor (fetch): runs async jobs, with no ceiling unless
 *   maxConcurrent is given. Jobs over the ceiling wait in FIFO order.
 */

/**
 * A unit of work handed to an executor
 */
export type Job = () => void | Promise<void>;

/**
 * Executes jobs
 */
export interface Executor {
  readonly name: string;
  enqueue(job: Job): void;
}

/**
 * Runs jobs one after the other, never re-entrantly
 *
 * Jobs are expected to be synchronous. A job that throws is fatal: the
 * error escapes to the process from the drain callback.
 */
export class SerialExecutor implements Executor {
  private readonly jobs: Job[] = [];
  private drainScheduled = false;

  constructor(readonly name: string = 'coordination') {}

  enqueue(job: Job): void {
    this.jobs.push(job);
    this.scheduleDrain();
  }

  /**
   * Number of jobs waiting to run
   */
  get size(): number {
    return this.jobs.length;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    // Jobs enqueued while draining run in this same pass, after the current ones
    let job = this.jobs.shift();
    while (job) {
      void job();
      job = this.jobs.shift();
    }
  }
}

/**
 * ConcurrentExecutor configuration
 */
export interface ConcurrentExecutorConfig {
  name?: string;
  /** Maximum number of jobs running at once (default: Infinity) */
  maxConcurrent?: number;
}

/**
 * Runs async jobs concurrently, up to an optional ceiling
 */
export class ConcurrentExecutor implements Executor {
  readonly name: string;
  readonly maxConcurrent: number;
  private readonly waiting: Job[] = [];
  private active = 0;

  constructor(config: ConcurrentExecutorConfig = {}) {
    const maxConcurrent = config.maxConcurrent ?? Infinity;
    if (!(maxConcurrent >= 1)) {
      throw new RangeError(`maxConcurrent must be at least 1, got ${maxConcurrent}`);
    }
    this.name = config.name ?? 'fetch';
    this.maxConcurrent = maxConcurrent;
  }

  enqueue(job: Job): void {
    this.waiting.push(job);
    this.pump();
  }

  /**
   * Number of jobs currently running
   */
  get activeCount(): number {
    return this.active;
  }

  /**
   * Number of jobs waiting for a free slot
   */
  get waitingCount(): number {
    return this.waiting.length;
  }

  private pump(): void {
    while (this.active < this.maxConcurrent) {
      const job = this.waiting.shift();
      if (!job) {
        return;
      }
      this.launch(job);
    }
  }

  private launch(job: Job): void {
    this.active++;
    void Promise.resolve()
      .then(job)
      .catch((error: unknown) => {
        console.error(`Unhandled error in ${this.name} executor job:`, error);
      })
      .finally(() => {
        this.active--;
        this.pump();
      });
  }
}
