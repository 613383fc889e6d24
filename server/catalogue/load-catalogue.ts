/**
 * Catalogue loading
 *
 * A catalogue comes from one of three places:
 *   - the bundled Jira catalogue (default)
 *   - a JSON catalogue file (`{ operations: [...] }`), via CATALOGUE_PATH
 *   - an OpenAPI 3 document in JSON or YAML, via OPENAPI_PATH
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { CatalogueError } from '../dispatcher/errors.js';
import { OperationRegistry } from '../dispatcher/registry.js';
import { logger } from '../observability/logger.js';
import { resolveServerPath, resolveUserPath } from '../utils/file-paths.js';
import { catalogueFromOpenApi } from './openapi-catalogue.js';

export const BUNDLED_CATALOGUE_PATH = resolveServerPath('catalogue', 'jira-operations.json');

export type CatalogueSource =
  | { kind: 'catalogue'; path: string }
  | { kind: 'openapi'; path: string };

export function selectCatalogueSource(config: { CATALOGUE_PATH?: string; OPENAPI_PATH?: string }): CatalogueSource {
  if (config.OPENAPI_PATH) {
    return { kind: 'openapi', path: resolveUserPath(config.OPENAPI_PATH) };
  }
  return { kind: 'catalogue', path: config.CATALOGUE_PATH ? resolveUserPath(config.CATALOGUE_PATH) : BUNDLED_CATALOGUE_PATH };
}

/**
 * Read a catalogue source and build the registry from it
 * @throws CatalogueError when the file cannot be parsed or describes an invalid catalogue
 */
export async function loadRegistry(source: CatalogueSource): Promise<OperationRegistry> {
  logger.info('Loading operation catalogue', { kind: source.kind, path: source.path });

  const text = await readFile(source.path, 'utf-8');
  const document = parseDocument(text, source.path);
  const catalogue = source.kind === 'openapi' ? catalogueFromOpenApi(document) : document;
  return OperationRegistry.fromCatalogue(catalogue);
}

/**
 * JSON for .json files, YAML otherwise (YAML is a superset of JSON)
 */
export function parseDocument(text: string, filePath: string): unknown {
  const isJson = path.extname(filePath).toLowerCase() === '.json';
  try {
    return isJson ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CatalogueError([`${path.basename(filePath)}: ${detail}`]);
  }
}
