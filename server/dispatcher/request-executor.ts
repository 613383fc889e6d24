/**
 * Request Executor
 *
 * Sends bound requests to the Jira REST API. Credentials come from an
 * injected provider on every attempt; the access token is never stored here.
 *
 * Retry policy:
 * - transient transport failures (timeout, reset, refused) and 5xx responses
 *   retry with backoff, but only when the request is retry-safe
 * - 429 retries after the Retry-After delay for every method, since the
 *   service rejected the request without processing it
 * - DNS and TLS failures never retry, nor does a credential provider that
 *   rejects
 */

import { logger } from '../observability/logger.js';
import { CancelledError, TransportError, isTransientTransportReason, type TransportReason } from './errors.js';
import { backoffDelay, parseRetryAfter, sleep as defaultSleep } from './timing.js';
import type { BoundRequest, CredentialProvider, FetchFn, RawResponse, ResponseKind, SleepFn } from './types.js';

export interface RequestExecutorOptions {
  /** Jira REST base, e.g. https://your-site.atlassian.net */
  baseUrl: string;
  credentials: CredentialProvider;
  fetch?: FetchFn;
  requestTimeoutMs?: number;
  /** Retries for transient transport failures and 5xx responses */
  maxRetries?: number;
  /** Retries for 429 responses */
  rateLimitRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound on an honoured Retry-After delay */
  maxRetryAfterMs?: number;
  sleep?: SleepFn;
  random?: () => number;
}

export interface RequestExecutor {
  execute(bound: BoundRequest, signal?: AbortSignal): Promise<RawResponse>;
  buildUrl(bound: BoundRequest): string;
}

const ACCEPT_BY_KIND: Record<ResponseKind, string> = {
  json: 'application/json',
  empty: 'application/json',
  binary: '*/*',
};

const CONNECTION_RESET_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);
const TLS_CODE_PATTERN = /^(CERT_|ERR_TLS_|ERR_SSL_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN|HOSTNAME_MISMATCH)/;

/**
 * Create a request executor bound to one Jira site and credential provider
 *
 * @example
 * ```typescript
 * const executor = createRequestExecutor({
 *   baseUrl: 'https://your-site.atlassian.net',
 *   credentials: createApiTokenCredentialProvider(email, apiToken),
 * });
 * const raw = await executor.execute(bind(descriptor, { issueIdOrKey: 'PROJ-1' }));
 * ```
 */
export function createRequestExecutor(options: RequestExecutorOptions): RequestExecutor {
  const fetchImpl: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  const maxRetries = options.maxRetries ?? 2;
  const rateLimitRetries = options.rateLimitRetries ?? 1;
  const maxRetryAfterMs = options.maxRetryAfterMs ?? 60_000;
  const sleep = options.sleep ?? defaultSleep;
  const backoff = {
    baseDelayMs: options.baseDelayMs ?? 250,
    maxDelayMs: options.maxDelayMs ?? 8_000,
    random: options.random ?? Math.random,
  };
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  function buildUrl(bound: BoundRequest): string {
    const query = new URLSearchParams();
    for (const [name, value] of bound.query) {
      query.append(name, value);
    }
    const queryString = query.toString();
    return `${baseUrl}${bound.path}${queryString ? `?${queryString}` : ''}`;
  }

  async function getCredentialHeaders(bound: BoundRequest): Promise<Record<string, string>> {
    try {
      return await options.credentials.getHeaders();
    } catch (error) {
      throw new TransportError('credentialsUnavailable', `No credentials for ${bound.operationId}: ${describeError(error)}`);
    }
  }

  async function send(bound: BoundRequest, url: string, signal: AbortSignal | undefined): Promise<Omit<RawResponse, 'attempts'>> {
    const timeoutSignal = AbortSignal.timeout(requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
    const credentialHeaders = await getCredentialHeaders(bound);

    const headers: Record<string, string> = {
      ...bound.headers,
      ...credentialHeaders,
      Accept: ACCEPT_BY_KIND[bound.responseKind],
    };
    if (bound.contentType) {
      headers['Content-Type'] = bound.contentType;
    }

    try {
      const response = await fetchImpl(url, {
        method: bound.method,
        headers,
        body: bound.body,
        signal: combined,
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, statusText: response.statusText, headers: response.headers, body };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (timeoutSignal.aborted) {
        throw new TransportError('timeout', `Request timed out after ${requestTimeoutMs}ms`);
      }
      const reason = classifyTransportError(error);
      throw new TransportError(reason, `${bound.method} ${bound.path} failed: ${describeError(error)}`);
    }
  }

  async function execute(bound: BoundRequest, signal?: AbortSignal): Promise<RawResponse> {
    const url = buildUrl(bound);
    let attempts = 0;
    let retriesUsed = 0;
    let rateLimitRetriesUsed = 0;

    while (true) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      attempts++;

      let response: Omit<RawResponse, 'attempts'>;
      try {
        response = await send(bound, url, signal);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        const canRetry = isTransientTransportReason(error.transportReason) && bound.retrySafe && retriesUsed < maxRetries;
        if (!canRetry) {
          logger.error('Transport error', {
            operation: bound.operationId,
            reason: error.transportReason,
            attempts,
            message: error.message,
          });
          throw new TransportError(error.transportReason, error.message, attempts);
        }
        retriesUsed++;
        const waitMs = backoffDelay(retriesUsed, backoff);
        logger.warn('Transient transport error, retrying', {
          operation: bound.operationId,
          reason: error.transportReason,
          retry: retriesUsed,
          waitMs,
        });
        await sleep(waitMs, signal);
        continue;
      }

      logger.info('HTTP request completed', {
        operation: bound.operationId,
        method: bound.method,
        path: bound.path,
        status: response.status,
        attempt: attempts,
      });

      if (response.status === 429 && rateLimitRetriesUsed < rateLimitRetries) {
        rateLimitRetriesUsed++;
        const hinted = parseRetryAfter(response.headers.get('retry-after'));
        const waitMs = hinted === undefined ? backoffDelay(rateLimitRetriesUsed, backoff) : Math.min(hinted, maxRetryAfterMs);
        logger.warn('Rate limited, retrying after delay', { operation: bound.operationId, waitMs, retryAfterHeader: hinted !== undefined });
        await sleep(waitMs, signal);
        continue;
      }

      if (response.status >= 500 && bound.retrySafe && retriesUsed < maxRetries) {
        retriesUsed++;
        const waitMs = backoffDelay(retriesUsed, backoff);
        logger.warn('Server error, retrying', { operation: bound.operationId, status: response.status, retry: retriesUsed, waitMs });
        await sleep(waitMs, signal);
        continue;
      }

      return { ...response, attempts };
    }
  }

  return { execute, buildUrl };
}

/**
 * Map a fetch failure onto a transport reason using the error codes Node and
 * undici attach somewhere along the `cause` chain
 */
export function classifyTransportError(error: unknown): TransportReason {
  const code = findErrorCode(error);
  if (!code) return 'unknown';
  if (TIMEOUT_CODES.has(code)) return 'timeout';
  if (CONNECTION_RESET_CODES.has(code)) return 'connectionReset';
  if (code === 'ECONNREFUSED') return 'connectionRefused';
  if (DNS_CODES.has(code)) return 'dnsFailure';
  if (TLS_CODE_PATTERN.test(code)) return 'tlsError';
  return 'unknown';
}

function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== 'object' || current === null) return undefined;
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const code = findErrorCode(error);
  return code ? `${error.message} (${code})` : error.message;
}
