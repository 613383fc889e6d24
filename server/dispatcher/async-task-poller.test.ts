/**
 * Async Task Poller Tests
 *
 * A fake clock advances by exactly the requested sleep, so deadlines are
 * deterministic without waiting.
 */

import { describe, test, expect } from '@jest/globals';
import { createAsyncTaskPoller, isTerminal, mapTaskStatus, type AsyncTaskHandle } from './async-task-poller.js';
import { createRequestExecutor } from './request-executor.js';
import { createTestRegistry } from '../test-utils/catalogue-fixtures.js';
import {
  createFakeFetch,
  createRecordingSleep,
  jsonResponse,
  respondInSequence,
  staticCredentials,
  type FetchHandler,
} from '../test-utils/fake-fetch.js';
import type { AsyncTaskSpec, SleepFn } from './types.js';

const registry = createTestRegistry();

function bulkDeleteTask(): AsyncTaskSpec {
  const task = registry.resolve('bulkDeleteIssues').asyncTask;
  if (!task) throw new Error('bulkDeleteIssues should start an async task');
  return task;
}

const handle: AsyncTaskHandle = {
  taskId: 'task-1',
  statusOperation: registry.resolve('getBulkOperationProgress'),
  task: bulkDeleteTask(),
};

function setup(handler: FetchHandler) {
  const fake = createFakeFetch(handler);
  const executor = createRequestExecutor({
    baseUrl: 'https://example.atlassian.net',
    credentials: staticCredentials,
    fetch: fake.fetch,
    sleep: createRecordingSleep().sleep,
    maxRetries: 0,
  });
  let clock = 0;
  const delays: number[] = [];
  const fakeClockSleep: SleepFn = async (ms) => {
    delays.push(ms);
    clock += ms;
  };
  const poller = createAsyncTaskPoller({
    executor,
    sleep: fakeClockSleep,
    now: () => clock,
  });
  return { poller, requests: fake.requests, delays };
}

const status = (value: string, extra: Record<string, unknown> = {}) => () => jsonResponse({ status: value, ...extra });

describe('createAsyncTaskPoller', () => {
  test('polls until the task succeeds and returns the final status body', async () => {
    const { poller, requests, delays } = setup(respondInSequence(
      status('ENQUEUED'),
      status('RUNNING', { progressPercent: 40 }),
      status('COMPLETE', { progressPercent: 100 }),
    ));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result).toEqual({
      ok: true,
      statusCode: 200,
      body: { kind: 'json', data: { status: 'COMPLETE', progressPercent: 100 } },
    });
    expect(requests.map((r) => r.url)).toEqual([
      'https://example.atlassian.net/rest/api/3/bulk/queue/task-1',
      'https://example.atlassian.net/rest/api/3/bulk/queue/task-1',
      'https://example.atlassian.net/rest/api/3/bulk/queue/task-1',
    ]);
    expect(delays).toEqual([100, 100]);
  });

  test('returns the result field when the task declares one', async () => {
    const { poller } = setup(status('COMPLETE', { result: { deleted: ['ABC-1'] } }));

    const result = await poller.awaitTask({ ...handle, task: { ...handle.task, resultField: 'result' } }, 100, 1_000);

    expect(result).toEqual({ ok: true, statusCode: 200, body: { kind: 'json', data: { deleted: ['ABC-1'] } } });
  });

  test('times out at the deadline with the last observed status', async () => {
    const { poller, requests, delays } = setup(status('RUNNING'));

    const result = await poller.awaitTask(handle, 100, 250);

    expect(result).toEqual({
      ok: false,
      kind: 'Timeout',
      message: 'Task task-1 did not finish within 250ms (last status RUNNING)',
      retryable: true,
      details: { taskId: 'task-1', lastStatus: 'RUNNING', ticks: 4 },
    });
    expect(requests).toHaveLength(4);
    expect(delays).toEqual([100, 100, 50]);
  });

  test('reports a failed task as TaskFailed with the service response', async () => {
    const { poller } = setup(respondInSequence(status('ENQUEUED'), status('FAILED', { progressPercent: 100 })));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result).toEqual({
      ok: false,
      kind: 'TaskFailed',
      reason: 'failed',
      statusCode: 200,
      message: 'Task task-1 ended with status FAILED',
      retryable: false,
      details: { taskId: 'task-1', status: 'FAILED', ticks: 2, response: { status: 'FAILED', progressPercent: 100 } },
    });
  });

  test('reports a task cancelled on the service side as TaskFailed', async () => {
    const { poller } = setup(status('CANCELLED'));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result).toMatchObject({ ok: false, kind: 'TaskFailed', reason: 'cancelled' });
  });

  test('keeps polling through an unmapped status', async () => {
    const { poller, requests } = setup(respondInSequence(status('PAUSED'), status('COMPLETE')));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result.ok).toBe(true);
    expect(requests).toHaveLength(2);
  });

  test('keeps polling after a retryable status check failure', async () => {
    const { poller, requests } = setup(respondInSequence(() => jsonResponse({}, 503), status('COMPLETE')));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result.ok).toBe(true);
    expect(requests).toHaveLength(2);
  });

  test('stops at a non-retryable status check failure', async () => {
    const { poller, requests } = setup(() => jsonResponse({ errorMessages: ['Task not found'] }, 404));

    const result = await poller.awaitTask(handle, 100, 10_000);

    expect(result).toMatchObject({ ok: false, kind: 'ClientError', statusCode: 404, message: 'Task not found' });
    expect(requests).toHaveLength(1);
  });

  test('sends nothing when the signal has already fired', async () => {
    const { poller, requests } = setup(status('RUNNING'));

    const result = await poller.awaitTask(handle, 100, 10_000, AbortSignal.abort());

    expect(result).toEqual({
      ok: false,
      kind: 'Cancelled',
      message: 'Polling of task task-1 cancelled by caller',
      retryable: false,
    });
    expect(requests).toHaveLength(0);
  });

  test('stops waiting as soon as the caller cancels between polls', async () => {
    const controller = new AbortController();
    const fake = createFakeFetch(() => {
      setTimeout(() => controller.abort(), 10);
      return jsonResponse({ status: 'RUNNING' });
    });
    const poller = createAsyncTaskPoller({
      executor: createRequestExecutor({
        baseUrl: 'https://example.atlassian.net',
        credentials: staticCredentials,
        fetch: fake.fetch,
      }),
    });
    const startedAt = Date.now();

    const result = await poller.awaitTask(handle, 30_000, 60_000, controller.signal);

    expect(result).toMatchObject({ ok: false, kind: 'Cancelled', message: 'Polling of task task-1 cancelled by caller' });
    expect(fake.requests).toHaveLength(1);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });
});

describe('mapTaskStatus', () => {
  test('maps service statuses through the task status map', () => {
    const task = bulkDeleteTask();

    expect(mapTaskStatus(task, 'ENQUEUED')).toBe('pending');
    expect(mapTaskStatus(task, 'COMPLETE')).toBe('succeeded');
    expect(mapTaskStatus(task, 'PAUSED')).toBeUndefined();
    expect(mapTaskStatus(task, 3)).toBeUndefined();
  });

  test('only succeeded, failed and cancelled are terminal', () => {
    expect(isTerminal('pending')).toBe(false);
    expect(isTerminal('running')).toBe(false);
    expect(isTerminal('succeeded')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
  });
});
