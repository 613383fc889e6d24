/**
 * Response Normalizer
 *
 * Maps a raw HTTP response onto a Result Envelope. Remote status codes and
 * messages are preserved verbatim; nothing here retries.
 */

import { parseRetryAfter } from './timing.js';
import type { Failure, OperationDescriptor, RawResponse, ResultEnvelope } from './types.js';

const decoder = new TextDecoder('utf-8');

export function normalize(raw: RawResponse, descriptor: OperationDescriptor): ResultEnvelope {
  if (raw.status >= 200 && raw.status < 300) {
    return normalizeSuccess(raw, descriptor);
  }

  const message = extractErrorMessage(raw);

  if (raw.status >= 500) {
    return {
      ok: false,
      kind: 'ServerError',
      statusCode: raw.status,
      message,
      retryable: true,
      details: { attempts: raw.attempts },
    };
  }

  if (raw.status >= 400) {
    const failure: Failure = {
      ok: false,
      kind: 'ClientError',
      statusCode: raw.status,
      message,
      retryable: raw.status === 429,
      details: { attempts: raw.attempts },
    };
    if (raw.status === 429) {
      const retryAfterMs = parseRetryAfter(raw.headers.get('retry-after'));
      if (retryAfterMs !== undefined) {
        failure.retryAfterMs = retryAfterMs;
      }
    }
    return failure;
  }

  // 1xx/3xx never reach here for a fetch that follows redirects
  return {
    ok: false,
    kind: 'ClientError',
    statusCode: raw.status,
    message: `Unexpected status ${raw.status}${raw.statusText ? ` ${raw.statusText}` : ''}`,
    retryable: false,
  };
}

function normalizeSuccess(raw: RawResponse, descriptor: OperationDescriptor): ResultEnvelope {
  switch (descriptor.responseKind) {
    case 'empty':
      return { ok: true, statusCode: raw.status, body: { kind: 'empty' } };
    case 'binary':
      return {
        ok: true,
        statusCode: raw.status,
        body: {
          kind: 'binary',
          data: raw.body,
          contentType: raw.headers.get('content-type') ?? 'application/octet-stream',
        },
      };
    case 'json': {
      const text = decoder.decode(raw.body);
      if (text.trim() === '') {
        return { ok: true, statusCode: raw.status, body: { kind: 'empty' } };
      }
      try {
        return { ok: true, statusCode: raw.status, body: { kind: 'json', data: JSON.parse(text) } };
      } catch (error) {
        return {
          ok: false,
          kind: 'DecodeError',
          statusCode: raw.status,
          message: `Failed to decode JSON response for ${descriptor.id}: ${error instanceof Error ? error.message : String(error)}`,
          retryable: false,
          details: { contentType: raw.headers.get('content-type'), preview: text.slice(0, 200) },
        };
      }
    }
  }
}

/**
 * Jira errors look like `{ errorMessages: string[], errors: Record<string, string> }`.
 * Fall back to the raw text, then the status line.
 */
export function extractErrorMessage(raw: Pick<RawResponse, 'status' | 'statusText' | 'body'>): string {
  const text = decoder.decode(raw.body).trim();
  const statusLine = `${raw.status}${raw.statusText ? ` ${raw.statusText}` : ''}`;
  if (text === '') {
    return statusLine;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }

  const parts: string[] = [];
  if (isRecord(parsed)) {
    if (Array.isArray(parsed.errorMessages)) {
      parts.push(...parsed.errorMessages.filter((m): m is string => typeof m === 'string'));
    }
    if (isRecord(parsed.errors)) {
      for (const [field, value] of Object.entries(parsed.errors)) {
        parts.push(`${field}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
      }
    }
    if (parts.length === 0 && typeof parsed.message === 'string') {
      parts.push(parsed.message);
    }
  }
  return parts.length > 0 ? parts.join('; ') : text;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
