/**
 * Pagination Walker Tests
 */

import { describe, test, expect } from '@jest/globals';
import { paginate, withQuery } from './pagination-walker.js';
import { bind } from './parameter-binder.js';
import { createRequestExecutor } from './request-executor.js';
import { jsonData, readField } from './run-request.js';
import { createTestRegistry } from '../test-utils/catalogue-fixtures.js';
import {
  createFakeFetch,
  createRecordingSleep,
  jsonResponse,
  respondInSequence,
  staticCredentials,
  type FetchHandler,
} from '../test-utils/fake-fetch.js';
import type { ArgumentBag, ResultEnvelope } from './types.js';

const registry = createTestRegistry();

const PROJECTS = ['ALPHA', 'BETA', 'GAMMA', 'DELTA', 'EPSILON'].map((key, index) => ({ id: String(10000 + index), key }));

/**
 * Serves /project/search from PROJECTS, honouring startAt and maxResults
 */
const projectPages: FetchHandler = (request) => {
  const url = new URL(request.url);
  const startAt = Number(url.searchParams.get('startAt') ?? '0');
  const maxResults = Number(url.searchParams.get('maxResults') ?? '50');
  const values = PROJECTS.slice(startAt, startAt + maxResults);
  return jsonResponse({
    startAt,
    maxResults,
    total: PROJECTS.length,
    isLast: startAt + values.length >= PROJECTS.length,
    values,
  });
};

function setup(handler: FetchHandler) {
  const fake = createFakeFetch(handler);
  const executor = createRequestExecutor({
    baseUrl: 'https://example.atlassian.net',
    credentials: staticCredentials,
    fetch: fake.fetch,
    sleep: createRecordingSleep().sleep,
  });
  return { executor, requests: fake.requests };
}

async function collect(
  toolId: string,
  args: ArgumentBag,
  handler: FetchHandler,
  pageLimit?: number,
  signal?: AbortSignal,
): Promise<{ pages: ResultEnvelope[]; urls: string[] }> {
  const { executor, requests } = setup(handler);
  const descriptor = registry.resolve(toolId);
  const pages: ResultEnvelope[] = [];
  for await (const page of paginate(descriptor, bind(descriptor, args), { executor, pageLimit, signal })) {
    pages.push(page);
  }
  return { pages, urls: requests.map((r) => r.url) };
}

function itemKeys(pages: ResultEnvelope[], field: string): string[] {
  return pages.flatMap((page) => {
    const items = readField(jsonData(page), field);
    return Array.isArray(items) ? items.map(keyOf) : [];
  });
}

function keyOf(item: unknown): string {
  return typeof item === 'object' && item !== null && 'key' in item ? String(item.key) : '';
}

describe('paginate (offset)', () => {
  test('walks every page with the default page size', async () => {
    const { pages, urls } = await collect('getProjects', {}, projectPages);

    expect(pages).toHaveLength(3);
    expect(pages.every((page) => page.ok)).toBe(true);
    expect(itemKeys(pages, 'values')).toEqual(['ALPHA', 'BETA', 'GAMMA', 'DELTA', 'EPSILON']);
    expect(urls).toEqual([
      'https://example.atlassian.net/rest/api/3/project/search?startAt=0&maxResults=2',
      'https://example.atlassian.net/rest/api/3/project/search?startAt=2&maxResults=2',
      'https://example.atlassian.net/rest/api/3/project/search?startAt=4&maxResults=2',
    ]);
  });

  test('yields the same sequence on every run', async () => {
    const first = await collect('getProjects', { orderBy: 'key' }, projectPages);
    const second = await collect('getProjects', { orderBy: 'key' }, projectPages);

    expect(second.pages).toEqual(first.pages);
    expect(second.urls).toEqual(first.urls);
  });

  test('starts from the caller offset and page size, keeping other query parameters in place', async () => {
    const { pages, urls } = await collect('getProjects', { startAt: 1, maxResults: 3, orderBy: 'name' }, projectPages);

    expect(itemKeys(pages, 'values')).toEqual(['BETA', 'GAMMA', 'DELTA', 'EPSILON']);
    expect(urls).toEqual([
      'https://example.atlassian.net/rest/api/3/project/search?startAt=1&maxResults=3&orderBy=name',
      'https://example.atlassian.net/rest/api/3/project/search?startAt=4&maxResults=3&orderBy=name',
    ]);
  });

  test('stops at the page limit', async () => {
    const { pages, urls } = await collect('getProjects', {}, projectPages, 2);

    expect(pages).toHaveLength(2);
    expect(urls).toHaveLength(2);
    expect(itemKeys(pages, 'values')).toEqual(['ALPHA', 'BETA', 'GAMMA', 'DELTA']);
  });

  test('stops once the offset reaches the total, even after a full page', async () => {
    const { pages, urls } = await collect('getProjects', {}, respondInSequence(
      () => jsonResponse({ values: [{ key: 'ALPHA' }, { key: 'BETA' }], total: 4 }),
      () => jsonResponse({ values: [{ key: 'GAMMA' }, { key: 'DELTA' }], total: 4 }),
      () => jsonResponse({ values: [{ key: 'EPSILON' }, { key: 'ZETA' }], total: 4 }),
    ));

    expect(itemKeys(pages, 'values')).toEqual(['ALPHA', 'BETA', 'GAMMA', 'DELTA']);
    expect(urls).toHaveLength(2);
  });

  test('stops on a full page marked as the last one', async () => {
    const { pages, urls } = await collect('getProjects', {}, respondInSequence(
      () => jsonResponse({ values: [{ key: 'ALPHA' }, { key: 'BETA' }], total: 100, isLast: true }),
      () => jsonResponse({ values: [{ key: 'GAMMA' }, { key: 'DELTA' }], total: 100, isLast: false }),
    ));

    expect(itemKeys(pages, 'values')).toEqual(['ALPHA', 'BETA']);
    expect(urls).toEqual(['https://example.atlassian.net/rest/api/3/project/search?startAt=0&maxResults=2']);
  });

  test('uses the page size the service reports when it clamps the requested one', async () => {
    const clamped: FetchHandler = (request) => {
      const startAt = Number(new URL(request.url).searchParams.get('startAt') ?? '0');
      return jsonResponse({ startAt, maxResults: 2, total: PROJECTS.length, values: PROJECTS.slice(startAt, startAt + 2) });
    };

    const { pages, urls } = await collect('getProjects', { maxResults: 5 }, clamped);

    expect(itemKeys(pages, 'values')).toEqual(['ALPHA', 'BETA', 'GAMMA', 'DELTA', 'EPSILON']);
    expect(urls).toEqual([
      'https://example.atlassian.net/rest/api/3/project/search?maxResults=5&startAt=0',
      'https://example.atlassian.net/rest/api/3/project/search?maxResults=5&startAt=2',
      'https://example.atlassian.net/rest/api/3/project/search?maxResults=5&startAt=4',
    ]);
  });

  test('stops on an empty page', async () => {
    const { pages } = await collect('getProjects', {}, () => jsonResponse({ values: [], total: 10 }));

    expect(pages).toHaveLength(1);
    expect(pages[0].ok).toBe(true);
  });

  test('ends with the failure of a failing page, keeping earlier pages', async () => {
    const { pages } = await collect('getProjects', {}, respondInSequence(
      () => jsonResponse({ values: [{ key: 'ALPHA' }, { key: 'BETA' }], total: 5 }),
      () => jsonResponse({ errorMessages: ['Forbidden'] }, 403),
    ));

    expect(pages).toHaveLength(2);
    expect(pages[0].ok).toBe(true);
    expect(pages[1]).toMatchObject({ ok: false, kind: 'ClientError', statusCode: 403, message: 'Forbidden' });
  });

  test('reports a page without its items array as DecodeError', async () => {
    const { pages } = await collect('getProjects', {}, () => jsonResponse({ total: 3 }));

    expect(pages).toEqual([{
      ok: false,
      kind: 'DecodeError',
      statusCode: 200,
      message: 'Paginated response of getProjects has no "values" array',
      retryable: false,
    }]);
  });
});

describe('paginate (cursor)', () => {
  test('follows continuation tokens until none is returned', async () => {
    const { pages, urls } = await collect('searchIssues', { jql: 'project = ABC' }, respondInSequence(
      () => jsonResponse({ issues: [{ key: 'ABC-1' }, { key: 'ABC-2' }], nextPageToken: 'page-2' }),
      () => jsonResponse({ issues: [{ key: 'ABC-3' }], nextPageToken: 'page-3' }),
      () => jsonResponse({ issues: [{ key: 'ABC-4' }], isLast: true }),
    ));

    expect(itemKeys(pages, 'issues')).toEqual(['ABC-1', 'ABC-2', 'ABC-3', 'ABC-4']);
    expect(urls).toEqual([
      'https://example.atlassian.net/rest/api/3/search/jql?jql=project+%3D+ABC&maxResults=50',
      'https://example.atlassian.net/rest/api/3/search/jql?jql=project+%3D+ABC&maxResults=50&nextPageToken=page-2',
      'https://example.atlassian.net/rest/api/3/search/jql?jql=project+%3D+ABC&maxResults=50&nextPageToken=page-3',
    ]);
  });

  test('fails with PaginationError when a token repeats', async () => {
    const { pages, urls } = await collect('searchIssues', { jql: 'project = ABC' }, respondInSequence(
      () => jsonResponse({ issues: [{ key: 'ABC-1' }], nextPageToken: 'same' }),
      () => jsonResponse({ issues: [{ key: 'ABC-2' }], nextPageToken: 'same' }),
    ));

    expect(urls).toHaveLength(2);
    expect(pages).toHaveLength(3);
    expect(pages[2]).toEqual({
      ok: false,
      kind: 'PaginationError',
      reason: 'stalled',
      message: 'Pagination of searchIssues stalled: continuation token repeated after 2 page(s)',
      retryable: false,
      details: { pages: 2 },
    });
  });

  test('treats a token equal to the caller-supplied one as stalled', async () => {
    const { pages, urls } = await collect(
      'searchIssues',
      { jql: 'project = ABC', nextPageToken: 'start' },
      () => jsonResponse({ issues: [], nextPageToken: 'start' }),
    );

    expect(urls).toHaveLength(1);
    expect(pages[1]).toMatchObject({ ok: false, kind: 'PaginationError', reason: 'stalled' });
  });

  test('yields a Cancelled failure once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();

    const { pages, urls } = await collect('searchIssues', { jql: 'project = ABC' }, () => jsonResponse({ issues: [] }), undefined, controller.signal);

    expect(urls).toEqual([]);
    expect(pages).toEqual([{ ok: false, kind: 'Cancelled', message: 'Operation cancelled by caller', retryable: false }]);
  });
});

describe('paginate (none)', () => {
  test('yields a single page for non-paginated operations', async () => {
    const { pages, urls } = await collect('getIssue', { issueIdOrKey: 'ABC-1' }, () => jsonResponse({ key: 'ABC-1' }));

    expect(urls).toEqual(['https://example.atlassian.net/rest/api/3/issue/ABC-1']);
    expect(pages).toEqual([{ ok: true, statusCode: 200, body: { kind: 'json', data: { key: 'ABC-1' } } }]);
  });
});

describe('withQuery', () => {
  test('replaces in place and appends missing parameters', () => {
    const template = bind(registry.resolve('getProjects'), { startAt: 0, orderBy: 'key' });

    expect(withQuery(template, { startAt: '50', maxResults: '25' }).query).toEqual([
      ['startAt', '50'],
      ['orderBy', 'key'],
      ['maxResults', '25'],
    ]);
    expect(template.query).toEqual([['startAt', '0'], ['orderBy', 'key']]);
  });
});
