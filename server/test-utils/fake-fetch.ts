/**
 * In-process stand-ins for fetch and sleep used by the dispatcher tests
 */

import { CancelledError } from '../dispatcher/errors.js';
import type { FetchFn, SleepFn } from '../dispatcher/types.js';

export interface RecordedRequest {
  url: string;
  method: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: string | undefined;
  signal: AbortSignal | undefined;
}

export type FetchHandler = (request: RecordedRequest, index: number) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: FetchFn;
  requests: RecordedRequest[];
}

/**
 * Record every request and answer with the handler's response
 */
export function createFakeFetch(handler: FetchHandler): FakeFetch {
  const requests: RecordedRequest[] = [];
  const fetch: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init.headers)),
      body: typeof init.body === 'string' ? init.body : undefined,
      signal: init.signal ?? undefined,
    };
    requests.push(request);
    return handler(request, requests.length - 1);
  };
  return { fetch, requests };
}

/**
 * Answer the n-th request with the n-th factory; the last one repeats
 */
export function respondInSequence(...factories: Array<() => Response>): FetchHandler {
  return (_request, index) => factories[Math.min(index, factories.length - 1)]();
}

export function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function emptyResponse(status: number = 204): Response {
  return new Response(null, { status });
}

/**
 * A fetch failure carrying a Node-style error code on its cause, the way
 * undici reports network errors
 */
export function networkError(code: string): TypeError {
  const cause = Object.assign(new Error(`connect ${code}`), { code });
  return new TypeError('fetch failed', { cause });
}

export interface RecordingSleep {
  sleep: SleepFn;
  delays: number[];
}

/**
 * A sleep that returns at once and remembers every requested delay
 */
export function createRecordingSleep(): RecordingSleep {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms, signal) => {
    if (signal?.aborted) throw new CancelledError();
    delays.push(ms);
  };
  return { sleep, delays };
}

export const staticCredentials = {
  getHeaders: async () => ({ Authorization: 'Bearer test-token' }),
};
