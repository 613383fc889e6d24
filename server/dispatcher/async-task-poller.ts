/**
 * Async Task Poller
 *
 * Polls a long-running Jira task (bulk edit, bulk delete, archive, property
 * migration) until it reaches a terminal state, the polling deadline passes,
 * or the caller cancels.
 *
 *   pending → running → { succeeded | failed | cancelled }
 *
 * Each operation family reports its own status vocabulary, so the mapping
 * from service status to state comes from the initiating descriptor.
 */

import { logger } from '../observability/logger.js';
import { CancelledError, DispatchError, cancelledFailure } from './errors.js';
import { bind } from './parameter-binder.js';
import type { RequestExecutor } from './request-executor.js';
import { jsonData, readField, runRequest } from './run-request.js';
import { sleep as defaultSleep } from './timing.js';
import type { AsyncTaskSpec, OperationDescriptor, ResultEnvelope, SleepFn, TaskState } from './types.js';

export interface AsyncTaskHandle {
  taskId: string;
  /** Descriptor of the status-check operation */
  statusOperation: OperationDescriptor;
  task: AsyncTaskSpec;
}

export interface AsyncTaskPollerOptions {
  executor: RequestExecutor;
  sleep?: SleepFn;
  now?: () => number;
}

export interface AsyncTaskPoller {
  awaitTask(handle: AsyncTaskHandle, pollIntervalMs: number, maxWaitMs: number, signal?: AbortSignal): Promise<ResultEnvelope>;
}

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set(['succeeded', 'failed', 'cancelled']);

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Map a service status string onto a task state. Unknown statuses count as
 * running: the deadline still bounds the wait.
 */
export function mapTaskStatus(task: AsyncTaskSpec, status: unknown): TaskState | undefined {
  if (typeof status !== 'string') return undefined;
  return task.statusMap[status];
}

export function createAsyncTaskPoller(options: AsyncTaskPollerOptions): AsyncTaskPoller {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  async function checkStatus(handle: AsyncTaskHandle, signal?: AbortSignal): Promise<ResultEnvelope> {
    try {
      const bound = bind(handle.statusOperation, { [handle.task.taskIdArg]: handle.taskId });
      return await runRequest(options.executor, handle.statusOperation, bound, signal);
    } catch (error) {
      if (error instanceof DispatchError) {
        return error.toFailure();
      }
      throw error;
    }
  }

  async function awaitTask(
    handle: AsyncTaskHandle,
    pollIntervalMs: number,
    maxWaitMs: number,
    signal?: AbortSignal,
  ): Promise<ResultEnvelope> {
    const { task, taskId } = handle;
    const deadline = now() + maxWaitMs;
    let ticks = 0;
    let lastStatus: string | undefined;

    while (true) {
      if (signal?.aborted) {
        return cancelledFailure(`Polling of task ${taskId} cancelled by caller`);
      }

      ticks++;
      const result = await checkStatus(handle, signal);

      if (!result.ok) {
        if (result.kind === 'Cancelled' || !result.retryable) {
          return result;
        }
        logger.warn('Task status check failed, polling again', { taskId, kind: result.kind, statusCode: result.statusCode, ticks });
      } else {
        const data = jsonData(result);
        const status = readField(data, task.statusField);
        lastStatus = typeof status === 'string' ? status : undefined;
        const state = mapTaskStatus(task, status);
        if (state === undefined) {
          logger.warn('Unmapped task status, treating as running', { taskId, status });
        }

        logger.info('Task status polled', { taskId, status, state: state ?? 'running', ticks });

        if (state === 'succeeded') {
          const outcome = task.resultField ? readField(data, task.resultField) : undefined;
          return {
            ok: true,
            statusCode: result.statusCode,
            body: { kind: 'json', data: outcome === undefined ? data : outcome },
          };
        }
        if (state !== undefined && isTerminal(state)) {
          return {
            ok: false,
            kind: 'TaskFailed',
            reason: state,
            statusCode: result.statusCode,
            message: `Task ${taskId} ended with status ${lastStatus ?? state}`,
            retryable: false,
            details: { taskId, status: lastStatus, ticks, response: data },
          };
        }
      }

      const remaining = deadline - now();
      if (remaining <= 0) {
        return {
          ok: false,
          kind: 'Timeout',
          message: `Task ${taskId} did not finish within ${maxWaitMs}ms${lastStatus ? ` (last status ${lastStatus})` : ''}`,
          retryable: true,
          details: { taskId, lastStatus, ticks },
        };
      }

      try {
        await sleep(Math.min(pollIntervalMs, remaining), signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return cancelledFailure(`Polling of task ${taskId} cancelled by caller`);
        }
        throw error;
      }
    }
  }

  return { awaitTask };
}
