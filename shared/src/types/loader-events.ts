/**
 * Collection Loader Event Types
 *
 * Defines event payloads emitted by a collection loader as page loads move
 * through their lifecycle. These events complement the delegate callbacks
 * and are meant for monitoring.
 */

import type { ConcurrentLoadBehavior, LoadReason } from './page-load.js';

/**
 * Collection loader event types
 */
export enum LoaderEventType {
  LOAD_QUEUED = 'load:queued',
  LOAD_SKIPPED = 'load:skipped',
  LOAD_STARTED = 'load:started',
  LOAD_CANCELLED = 'load:cancelled',
  LOAD_FINISHED = 'load:finished',
}

/**
 * Base event interface
 */
export interface BaseLoaderEvent {
  type: LoaderEventType;
  timestamp: string;
  loaderId: string;
  reason: LoadReason;
}

/**
 * Load queued event
 * Emitted when a page load is admitted and appended to the pending queue
 */
export interface LoadQueuedEvent extends BaseLoaderEvent {
  type: LoaderEventType.LOAD_QUEUED;
  loadId: string;
  behavior: ConcurrentLoadBehavior;
  /** Number of loads queued or in progress, this one included */
  queueDepth: number;
}

/**
 * Load skipped event
 * Emitted when the concurrent load behavior drops a page load
 */
export interface LoadSkippedEvent extends BaseLoaderEvent {
  type: LoaderEventType.LOAD_SKIPPED;
  behavior: ConcurrentLoadBehavior;
}

/**
 * Load started event
 * Emitted when a page load becomes the current load
 */
export interface LoadStartedEvent extends BaseLoaderEvent {
  type: LoaderEventType.LOAD_STARTED;
  loadId: string;
}

/**
 * Load cancelled event
 * Emitted when cancellation is requested for a queued or current load.
 * The load still finishes (with a cancellation failure unless it was past
 * its last cancellation check).
 */
export interface LoadCancelledEvent extends BaseLoaderEvent {
  type: LoaderEventType.LOAD_CANCELLED;
  loadId: string;
  wasCurrent: boolean;
}

/**
 * Load finished event
 * Emitted after the delegate has been told a page load finished.
 * Loads whose fetch task could not be built have no loadId.
 */
export interface LoadFinishedEvent extends BaseLoaderEvent {
  type: LoaderEventType.LOAD_FINISHED;
  loadId?: string;
  succeeded: boolean;
  errorName?: string;
  errorMessage?: string;
  durationMs: number;
}

/**
 * Union type of all collection loader events
 */
export type LoaderEvent =
  | LoadQueuedEvent
  | LoadSkippedEvent
  | LoadStartedEvent
  | LoadCancelledEvent
  | LoadFinishedEvent;
