/**
 * Pagination Walker
 *
 * Lazily walks a paginated operation, yielding one envelope per page.
 * Pages are fetched strictly one after another. A failed page is yielded and
 * ends the walk; pages already yielded stay delivered, so callers must treat
 * a trailing Failure as a partial result set.
 */

import { logger } from '../observability/logger.js';
import { cancelledFailure } from './errors.js';
import type { RequestExecutor } from './request-executor.js';
import { jsonData, readField, runRequest } from './run-request.js';
import type {
  BoundRequest,
  CursorPagination,
  Failure,
  OffsetPagination,
  OperationDescriptor,
  ResultEnvelope,
} from './types.js';

export interface PaginateOptions {
  executor: RequestExecutor;
  /** Maximum number of pages to fetch */
  pageLimit?: number;
  signal?: AbortSignal;
}

/**
 * Walk every page of a paginated operation
 * @param template - The bound request for the first page; the walker owns
 *   the offset/cursor query parameters from here on
 */
export async function* paginate(
  descriptor: OperationDescriptor,
  template: BoundRequest,
  options: PaginateOptions,
): AsyncGenerator<ResultEnvelope, void, undefined> {
  const { pagination } = descriptor;
  switch (pagination.mode) {
    case 'none':
      if (options.signal?.aborted) {
        yield cancelledFailure();
        return;
      }
      yield await runRequest(options.executor, descriptor, template, options.signal);
      return;
    case 'offset':
      yield* walkOffset(descriptor, pagination, template, options);
      return;
    case 'cursor':
      yield* walkCursor(descriptor, pagination, template, options);
      return;
  }
}

async function* walkOffset(
  descriptor: OperationDescriptor,
  spec: OffsetPagination,
  template: BoundRequest,
  { executor, pageLimit, signal }: PaginateOptions,
): AsyncGenerator<ResultEnvelope, void, undefined> {
  const pageSize = positiveInteger(queryValue(template, spec.limitParam)) ?? spec.defaultPageSize;
  let offset = nonNegativeInteger(queryValue(template, spec.offsetParam)) ?? 0;
  let pages = 0;

  while (pageLimit === undefined || pages < pageLimit) {
    if (signal?.aborted) {
      yield cancelledFailure();
      return;
    }

    const request = withQuery(template, {
      [spec.offsetParam]: String(offset),
      [spec.limitParam]: String(pageSize),
    });
    const result = await runRequest(executor, descriptor, request, signal);
    pages++;

    if (!result.ok) {
      yield result;
      return;
    }

    const data = jsonData(result);
    const items = readField(data, spec.itemsField);
    if (!Array.isArray(items)) {
      yield missingItems(descriptor, spec.itemsField, result.statusCode);
      return;
    }

    yield result;

    const effectivePageSize = spec.pageSizeField
      ? positiveInteger(readField(data, spec.pageSizeField)) ?? pageSize
      : pageSize;
    if (items.length === 0 || items.length < effectivePageSize) return;
    if (spec.lastPageField && readField(data, spec.lastPageField) === true) return;

    offset += items.length;

    const total = spec.totalField ? nonNegativeInteger(readField(data, spec.totalField)) : undefined;
    if (total !== undefined && offset >= total) return;
  }

  logger.info('Pagination stopped at page limit', { operation: descriptor.id, pageLimit });
}

async function* walkCursor(
  descriptor: OperationDescriptor,
  spec: CursorPagination,
  template: BoundRequest,
  { executor, pageLimit, signal }: PaginateOptions,
): AsyncGenerator<ResultEnvelope, void, undefined> {
  const overrides: Record<string, string> = {};
  if (spec.limitParam && spec.defaultPageSize !== undefined && queryValue(template, spec.limitParam) === undefined) {
    overrides[spec.limitParam] = String(spec.defaultPageSize);
  }

  let cursor = queryValue(template, spec.cursorParam);
  const seen = new Set<string>();
  if (cursor !== undefined) seen.add(cursor);
  let pages = 0;

  while (pageLimit === undefined || pages < pageLimit) {
    if (signal?.aborted) {
      yield cancelledFailure();
      return;
    }

    const request = withQuery(template, cursor === undefined ? overrides : { ...overrides, [spec.cursorParam]: cursor });
    const result = await runRequest(executor, descriptor, request, signal);
    pages++;

    if (!result.ok) {
      yield result;
      return;
    }

    const data = jsonData(result);
    if (!Array.isArray(readField(data, spec.itemsField))) {
      yield missingItems(descriptor, spec.itemsField, result.statusCode);
      return;
    }

    yield result;

    const next = readField(data, spec.nextCursorField);
    if (next === undefined || next === null || next === '') return;
    if (typeof next !== 'string' && typeof next !== 'number') {
      yield {
        ok: false,
        kind: 'DecodeError',
        statusCode: result.statusCode,
        message: `Continuation field "${spec.nextCursorField}" of ${descriptor.id} is not a string`,
        retryable: false,
      };
      return;
    }

    const token = String(next);
    if (seen.has(token)) {
      logger.warn('Pagination cursor did not advance', { operation: descriptor.id, pages });
      yield {
        ok: false,
        kind: 'PaginationError',
        reason: 'stalled',
        message: `Pagination of ${descriptor.id} stalled: continuation token repeated after ${pages} page(s)`,
        retryable: false,
        details: { pages },
      };
      return;
    }
    seen.add(token);
    cursor = token;
  }

  logger.info('Pagination stopped at page limit', { operation: descriptor.id, pageLimit });
}

/**
 * Copy a bound request with query parameters replaced (or appended when
 * absent), keeping every other parameter in its original position
 */
export function withQuery(template: BoundRequest, overrides: Record<string, string>): BoundRequest {
  const remaining = new Map(Object.entries(overrides));
  const query: Array<[string, string]> = [];
  for (const [name, value] of template.query) {
    if (!(name in overrides)) {
      query.push([name, value]);
    } else if (remaining.has(name)) {
      query.push([name, overrides[name]]);
      remaining.delete(name);
    }
  }
  for (const [name, value] of remaining) {
    query.push([name, value]);
  }
  return { ...template, query };
}

function queryValue(request: BoundRequest, name: string): string | undefined {
  return request.query.find(([key]) => key === name)?.[1];
}

function positiveInteger(value: unknown): number | undefined {
  const number = typeof value === 'string' ? Number(value) : value;
  return typeof number === 'number' && Number.isInteger(number) && number > 0 ? number : undefined;
}

function nonNegativeInteger(value: unknown): number | undefined {
  const number = typeof value === 'string' ? Number(value) : value;
  return typeof number === 'number' && Number.isInteger(number) && number >= 0 ? number : undefined;
}

function missingItems(descriptor: OperationDescriptor, itemsField: string, statusCode: number): Failure {
  return {
    ok: false,
    kind: 'DecodeError',
    statusCode,
    message: `Paginated response of ${descriptor.id} has no "${itemsField}" array`,
    retryable: false,
  };
}
