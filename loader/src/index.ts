// Collection loader
export { CollectionLoader, type CollectionLoaderConfig } from './loader/collection-loader.js';
export {
  CallbackLoaderDelegate,
  type CollectionLoaderDelegate,
  type LoaderDelegateCallbacks,
} from './loader/delegate.js';
export { PageLoadOperationDelegate } from './loader/loading-operation-delegate.js';
export { PageCursorState, type PageTokenDerivation } from './loader/page-cursor.js';
export {
  decideAdmission,
  type AdmissionDecision,
  type AdmissionRequest,
  type CancellationScope,
} from './loader/load-policy.js';

// Pipeline
export { Task, type TaskBody, type TaskState } from './pipeline/task.js';
export {
  SerialExecutor,
  ConcurrentExecutor,
  type Executor,
  type Job,
  type ConcurrentExecutorConfig,
} from './pipeline/executors.js';
export {
  LoadingPipeline,
  type FetchContext,
  type LoadingPipelineStages,
  type LoadingPipelineConfig,
} from './pipeline/loading-pipeline.js';

// Helpers
export type {
  CollectionLoaderHelper,
  FetchTask,
  LoadingOperationDelegate,
  CancellationCheck,
} from './helpers/helper.js';
export {
  OffsetPageHelper,
  OffsetFetchTask,
  type OffsetPage,
  type OffsetPageSource,
  type OffsetPageResults,
  type OffsetPageHelperConfig,
} from './helpers/offset-page-helper.js';

// Utilities
export {
  encodeCursor,
  decodeCursor,
  validateCursor,
  createFilterHash,
  createPaginationMetadata,
  clampPageSize,
  MAX_PAGE_SIZE,
  DEFAULT_PAGE_SIZE,
} from './utils/pagination.js';

// Errors
export {
  CollectionLoaderError,
  ConstructionError,
  FetchError,
  CancellationError,
  InvariantViolationError,
  invariant,
  isCancellationError,
  toError,
} from './errors.js';

// Configuration
export { loadConfig, printConfig } from './config/config.js';

export * from '@pageflow/shared';
