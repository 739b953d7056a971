// Page load model
export type {
  PageLoadDescription,
  PageTokenEquality,
  LoadResult,
} from './page-load.js';

export {
  LoadReason,
  ConcurrentLoadBehavior,
  CONCURRENT_LOAD_BEHAVIORS,
  isConcurrentLoadBehavior,
  strictTokenEquality,
  describePageLoad,
  isSameLoad,
  success,
  failure,
} from './page-load.js';

// Loader lifecycle events
export type {
  BaseLoaderEvent,
  LoadQueuedEvent,
  LoadSkippedEvent,
  LoadStartedEvent,
  LoadCancelledEvent,
  LoadFinishedEvent,
  LoaderEvent,
} from './loader-events.js';

export { LoaderEventType } from './loader-events.js';

// Pagination types
export type {
  PaginationCursor,
  PaginationState,
  PaginationMetadata,
} from './pagination.js';

// Configuration types
export type { CollectionLoaderConfiguration } from './config.js';

export { DEFAULT_LOADER_CONFIG } from './config.js';
