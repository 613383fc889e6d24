/**
 * Dispatcher
 *
 * The single entry point for every catalogue operation:
 *
 *   invoke(toolId, args)           → one request, one envelope
 *   invokePaginated(toolId, args)  → lazy sequence of page envelopes
 *   invokeAsync(toolId, args)      → start a remote task and await it
 *
 * The dispatcher keeps no state between calls, so any number of invocations
 * may run concurrently. Taxonomy errors never escape as exceptions; callers
 * always receive a Failure envelope.
 */

import { logger } from '../observability/logger.js';
import { type AsyncTaskPoller, createAsyncTaskPoller } from './async-task-poller.js';
import { DispatchError, ValidationError, cancelledFailure } from './errors.js';
import { paginate } from './pagination-walker.js';
import { bind } from './parameter-binder.js';
import type { OperationRegistry } from './registry.js';
import type { RequestExecutor } from './request-executor.js';
import { jsonData, readField, runRequest } from './run-request.js';
import type { ArgumentBag, BoundRequest, OperationDescriptor, ResultEnvelope } from './types.js';

export interface DispatcherOptions {
  registry: OperationRegistry;
  executor: RequestExecutor;
  poller?: AsyncTaskPoller;
  defaultPollIntervalMs?: number;
  defaultMaxWaitMs?: number;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface InvokePaginatedOptions extends InvokeOptions {
  pageLimit?: number;
}

export interface InvokeAsyncOptions extends InvokeOptions {
  pollIntervalMs?: number;
  maxWaitMs?: number;
}

export interface Dispatcher {
  readonly registry: OperationRegistry;
  invoke(toolId: string, args: ArgumentBag, options?: InvokeOptions): Promise<ResultEnvelope>;
  invokePaginated(toolId: string, args: ArgumentBag, options?: InvokePaginatedOptions): AsyncGenerator<ResultEnvelope, void, undefined>;
  invokeAsync(toolId: string, args: ArgumentBag, options?: InvokeAsyncOptions): Promise<ResultEnvelope>;
}

type Prepared =
  | { ok: true; descriptor: OperationDescriptor; bound: BoundRequest }
  | { ok: false; failure: ResultEnvelope };

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { registry, executor } = options;
  const poller = options.poller ?? createAsyncTaskPoller({ executor });
  const defaultPollIntervalMs = options.defaultPollIntervalMs ?? 1_000;
  const defaultMaxWaitMs = options.defaultMaxWaitMs ?? 60_000;

  /**
   * Registry lookup and binding. Both fail locally, before any network call.
   */
  function prepare(toolId: string, args: ArgumentBag): Prepared {
    try {
      const descriptor = registry.resolve(toolId);
      return { ok: true, descriptor, bound: bind(descriptor, args) };
    } catch (error) {
      if (error instanceof DispatchError) {
        logger.warn('Invocation rejected before dispatch', { toolId, kind: error.kind, reason: error.reason, message: error.message });
        return { ok: false, failure: error.toFailure() };
      }
      throw error;
    }
  }

  async function invoke(toolId: string, args: ArgumentBag, invokeOptions: InvokeOptions = {}): Promise<ResultEnvelope> {
    const prepared = prepare(toolId, args);
    if (!prepared.ok) return prepared.failure;
    if (invokeOptions.signal?.aborted) return cancelledFailure();

    const result = await runRequest(executor, prepared.descriptor, prepared.bound, invokeOptions.signal);
    logOutcome(toolId, result);
    return result;
  }

  async function* invokePaginated(
    toolId: string,
    args: ArgumentBag,
    invokeOptions: InvokePaginatedOptions = {},
  ): AsyncGenerator<ResultEnvelope, void, undefined> {
    const prepared = prepare(toolId, args);
    if (!prepared.ok) {
      yield prepared.failure;
      return;
    }
    const { pageLimit } = invokeOptions;
    if (pageLimit !== undefined && !(Number.isInteger(pageLimit) && pageLimit > 0)) {
      yield new ValidationError('wrongType', 'pageLimit', `Page limit must be a positive integer, got ${pageLimit}`).toFailure();
      return;
    }

    let pages = 0;
    for await (const page of paginate(prepared.descriptor, prepared.bound, {
      executor,
      pageLimit,
      signal: invokeOptions.signal,
    })) {
      pages++;
      if (!page.ok) logOutcome(toolId, page);
      yield page;
    }
    logger.info('Paginated invocation finished', { toolId, pages });
  }

  async function invokeAsync(toolId: string, args: ArgumentBag, invokeOptions: InvokeAsyncOptions = {}): Promise<ResultEnvelope> {
    const prepared = prepare(toolId, args);
    if (!prepared.ok) return prepared.failure;

    const { descriptor, bound } = prepared;
    const task = descriptor.asyncTask;
    if (!task) {
      return new ValidationError('unsupportedMode', undefined, `${toolId} does not start an asynchronous task`).toFailure();
    }
    if (invokeOptions.signal?.aborted) return cancelledFailure();

    const started = await runRequest(executor, descriptor, bound, invokeOptions.signal);
    if (!started.ok) {
      logOutcome(toolId, started);
      return started;
    }

    const taskId = readField(jsonData(started), task.taskIdField);
    if (typeof taskId !== 'string' && typeof taskId !== 'number') {
      return {
        ok: false,
        kind: 'DecodeError',
        statusCode: started.statusCode,
        message: `Response of ${toolId} carries no task id in "${task.taskIdField}"`,
        retryable: false,
      };
    }

    const statusOperation = registry.resolve(task.statusOperation);
    logger.info('Async task started', { toolId, taskId: String(taskId), statusOperation: statusOperation.id });

    const result = await poller.awaitTask(
      { taskId: String(taskId), statusOperation, task },
      invokeOptions.pollIntervalMs ?? defaultPollIntervalMs,
      invokeOptions.maxWaitMs ?? defaultMaxWaitMs,
      invokeOptions.signal,
    );
    logOutcome(toolId, result);
    return result;
  }

  return { registry, invoke, invokePaginated, invokeAsync };
}

function logOutcome(toolId: string, result: ResultEnvelope): void {
  if (result.ok) {
    logger.info('Invocation succeeded', { toolId, statusCode: result.statusCode, body: result.body.kind });
    return;
  }
  logger.warn('Invocation failed', {
    toolId,
    kind: result.kind,
    reason: result.reason,
    statusCode: result.statusCode,
    retryable: result.retryable,
  });
}
