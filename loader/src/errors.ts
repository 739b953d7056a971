/**
 * Collection loader errors
 *
 * Recoverable errors (construction, fetch, cancellation) reach callers only
 * through the delegate's didFinishLoading result. InvariantViolationError is
 * thrown and never caught by the loader.
 */

/**
 * Base class for errors raised by the collection loader
 */
export class CollectionLoaderError extends Error {
  constructor(
    message: string,
    public details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CollectionLoaderError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The helper could not build a fetch task for a page token
 */
export class ConstructionError extends CollectionLoaderError {
  constructor(message: string, cause: unknown, details?: unknown) {
    super(message, details, { cause });
    this.name = 'ConstructionError';
  }
}

/**
 * A fetch task failed with something that is not an Error
 */
export class FetchError extends CollectionLoaderError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'FetchError';
  }
}

/**
 * A cancellation check tripped inside a fetch task
 */
export class CancellationError extends CollectionLoaderError {
  constructor(message: string = 'Page load was cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

/**
 * Internal bookkeeping is corrupted. Not recoverable.
 */
export class InvariantViolationError extends CollectionLoaderError {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Throw an InvariantViolationError unless the condition holds
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}

/**
 * Whether an error is a cancellation
 */
export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new FetchError(`Fetch task failed: ${String(thrown)}`, thrown);
}
