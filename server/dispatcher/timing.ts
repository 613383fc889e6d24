/**
 * Sleep, backoff and Retry-After helpers shared by the executor and poller
 */

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from './errors.js';
import type { SleepFn } from './types.js';

/**
 * Abortable sleep. Rejects with CancelledError as soon as the signal fires.
 */
export const sleep: SleepFn = async (ms, signal) => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    throw error;
  }
};

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  random: () => number;
}

/**
 * Exponential backoff with equal jitter: half of the exponential step is
 * fixed, the other half random.
 * @param retry - 1 for the first retry
 */
export function backoffDelay(retry: number, { baseDelayMs, maxDelayMs, random }: BackoffOptions): number {
  const step = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, retry - 1));
  return Math.round(step / 2 + random() * (step / 2));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 * @returns undefined when the header is absent or unparseable
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null) return undefined;
  const value = header.trim();
  if (value === '') return undefined;
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.round(Number(value) * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
