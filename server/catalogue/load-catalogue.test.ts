/**
 * Unit tests for catalogue loading
 */

import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { BUNDLED_CATALOGUE_PATH, loadRegistry, parseDocument, selectCatalogueSource } from './load-catalogue.js';
import { CatalogueError } from '../dispatcher/errors.js';

let workDir: string;

beforeAll(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'catalogue-test-'));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('selectCatalogueSource', () => {
  test('defaults to the bundled catalogue', () => {
    expect(selectCatalogueSource({})).toEqual({ kind: 'catalogue', path: BUNDLED_CATALOGUE_PATH });
  });

  test('prefers an OpenAPI document over a catalogue file', () => {
    expect(selectCatalogueSource({ OPENAPI_PATH: '/specs/jira.yaml' })).toEqual({ kind: 'openapi', path: '/specs/jira.yaml' });
    expect(selectCatalogueSource({ CATALOGUE_PATH: '/catalogues/jira.json' })).toEqual({
      kind: 'catalogue',
      path: '/catalogues/jira.json',
    });
  });
});

describe('loadRegistry', () => {
  test('loads and validates the bundled Jira catalogue', async () => {
    const registry = await loadRegistry(selectCatalogueSource({}));

    expect(registry.size).toBe(38);
    expect(registry.resolve('searchIssues').pagination).toMatchObject({ mode: 'cursor', cursorParam: 'nextPageToken' });
    expect(registry.resolve('bulkDeleteIssues').asyncTask).toMatchObject({ statusOperation: 'getBulkOperationProgress' });
    expect(registry.resolve('getAttachmentContent').responseKind).toBe('binary');
  });

  test('loads a YAML OpenAPI document', async () => {
    const file = path.join(workDir, 'openapi.yaml');
    await writeFile(file, [
      'openapi: 3.0.1',
      'paths:',
      '  /rest/api/3/myself:',
      '    get:',
      '      operationId: getCurrentUser',
      '      responses:',
      "        '200':",
      '          description: OK',
      '          content:',
      '            application/json: {}',
      '',
    ].join('\n'));

    const registry = await loadRegistry({ kind: 'openapi', path: file });

    expect(registry.list().map((d) => `${d.method} ${d.path}`)).toEqual(['GET /rest/api/3/myself']);
  });

  test('rejects an invalid catalogue file', async () => {
    const file = path.join(workDir, 'broken.json');
    await writeFile(file, JSON.stringify({ operations: [{ id: 'getThing', method: 'GET', path: '/thing/{id}' }] }));

    await expect(loadRegistry({ kind: 'catalogue', path: file })).rejects.toThrow(CatalogueError);
  });
});

describe('parseDocument', () => {
  test('parses JSON and YAML', () => {
    expect(parseDocument('{"operations":[]}', 'catalogue.json')).toEqual({ operations: [] });
    expect(parseDocument('operations: []\n', 'catalogue.yaml')).toEqual({ operations: [] });
  });

  test('names the file in parse errors', () => {
    let problems: readonly string[] = [];
    try {
      parseDocument('{"operations":', '/tmp/catalogue.json');
    } catch (error) {
      if (!(error instanceof CatalogueError)) throw error;
      problems = error.problems;
    }

    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith('catalogue.json: ')).toBe(true);
  });
});
