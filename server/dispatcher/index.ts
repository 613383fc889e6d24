/**
 * Generic invocation dispatcher for catalogue operations
 */

export { createDispatcher } from './dispatcher.js';
export type { Dispatcher, DispatcherOptions, InvokeOptions, InvokePaginatedOptions, InvokeAsyncOptions } from './dispatcher.js';
export { OperationRegistry } from './registry.js';
export { createRequestExecutor } from './request-executor.js';
export type { RequestExecutor, RequestExecutorOptions } from './request-executor.js';
export { createAsyncTaskPoller } from './async-task-poller.js';
export type { AsyncTaskPoller } from './async-task-poller.js';
export {
  CancelledError,
  CatalogueError,
  DispatchError,
  OperationNotFoundError,
  TransportError,
  ValidationError,
} from './errors.js';
export type * from './types.js';
