/**
 * Operation Registry
 *
 * Immutable map from tool id to operation descriptor. Built once at startup;
 * construction fails with a CatalogueError listing every problem it finds so
 * a bad catalogue never yields a partially usable server.
 */

import type { ZodIssue } from 'zod';
import { catalogueSchema, type CatalogueEntry } from './catalogue-schema.js';
import { CatalogueError, OperationNotFoundError } from './errors.js';
import type { OperationDescriptor } from './types.js';
import { logger } from '../observability/logger.js';

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

export class OperationRegistry {
  private readonly operations: ReadonlyMap<string, OperationDescriptor>;

  private constructor(descriptors: readonly OperationDescriptor[]) {
    this.operations = new Map(descriptors.map((descriptor) => [descriptor.id, descriptor]));
  }

  /**
   * Validate raw catalogue data and build a registry from it
   * @param catalogue - `{ operations: [...] }` as read from a catalogue source
   * @throws CatalogueError when any entry is malformed
   */
  static fromCatalogue(catalogue: unknown): OperationRegistry {
    const parsed = catalogueSchema.safeParse(catalogue);
    if (!parsed.success) {
      throw new CatalogueError(parsed.error.issues.map(formatIssue));
    }

    const entries = parsed.data.operations;
    const problems = validateEntries(entries);
    if (problems.length > 0) {
      throw new CatalogueError(problems);
    }

    const descriptors = entries.map((entry) => deepFreeze(toDescriptor(entry)));
    logger.info('Operation registry built', {
      operations: descriptors.length,
      paginated: descriptors.filter((d) => d.pagination.mode !== 'none').length,
      async: descriptors.filter((d) => d.asyncTask !== undefined).length,
    });
    return new OperationRegistry(descriptors);
  }

  /**
   * @throws OperationNotFoundError when the tool id is unknown
   */
  resolve(toolId: string): OperationDescriptor {
    const descriptor = this.operations.get(toolId);
    if (!descriptor) {
      throw new OperationNotFoundError(toolId);
    }
    return descriptor;
  }

  has(toolId: string): boolean {
    return this.operations.has(toolId);
  }

  /** All descriptors, in catalogue order */
  list(): OperationDescriptor[] {
    return Array.from(this.operations.values());
  }

  get size(): number {
    return this.operations.size;
  }
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function toDescriptor(entry: CatalogueEntry): OperationDescriptor {
  const descriptor: OperationDescriptor = {
    id: entry.id,
    method: entry.method,
    path: entry.path,
    parameters: entry.parameters,
    pagination: entry.pagination,
    responseKind: entry.responseKind,
  };
  if (entry.body) descriptor.body = entry.body;
  if (entry.idempotent !== undefined) descriptor.idempotent = entry.idempotent;
  if (entry.asyncTask) descriptor.asyncTask = entry.asyncTask;
  if (entry.summary) descriptor.summary = entry.summary;
  if (entry.description) descriptor.description = entry.description;
  if (entry.tags) descriptor.tags = entry.tags;
  return descriptor;
}

export function pathPlaceholders(pathTemplate: string): string[] {
  return Array.from(pathTemplate.matchAll(PLACEHOLDER_PATTERN), (match) => match[1]);
}

function validateEntries(entries: readonly CatalogueEntry[]): string[] {
  const problems: string[] = [];
  const byId = new Map<string, CatalogueEntry>();

  for (const entry of entries) {
    if (byId.has(entry.id)) {
      problems.push(`${entry.id}: duplicate tool id`);
    }
    byId.set(entry.id, entry);
  }

  for (const entry of entries) {
    problems.push(...validateEntry(entry).map((problem) => `${entry.id}: ${problem}`));
  }

  for (const entry of entries) {
    const task = entry.asyncTask;
    if (!task) continue;
    const statusOperation = byId.get(task.statusOperation);
    if (!statusOperation) {
      problems.push(`${entry.id}: async status operation "${task.statusOperation}" is not in the catalogue`);
      continue;
    }
    if (statusOperation.method !== 'GET' || statusOperation.responseKind !== 'json') {
      problems.push(`${entry.id}: async status operation "${task.statusOperation}" must be a JSON GET operation`);
    }
    const accepts = statusOperation.parameters.some((p) => (p.argName ?? p.name) === task.taskIdArg);
    if (!accepts) {
      problems.push(`${entry.id}: async status operation "${task.statusOperation}" has no "${task.taskIdArg}" parameter`);
    }
  }

  return problems;
}

function validateEntry(entry: CatalogueEntry): string[] {
  const problems: string[] = [];
  const placeholders = pathPlaceholders(entry.path);
  const namesByLocation = new Map<string, Set<string>>();
  const argNames = new Set<string>();

  for (const parameter of entry.parameters) {
    const seen = namesByLocation.get(parameter.in) ?? new Set<string>();
    if (seen.has(parameter.name)) {
      problems.push(`duplicate ${parameter.in} parameter "${parameter.name}"`);
    }
    seen.add(parameter.name);
    namesByLocation.set(parameter.in, seen);

    const argName = parameter.argName ?? parameter.name;
    if (argNames.has(argName)) {
      problems.push(`argument "${argName}" is bound by more than one parameter`);
    }
    argNames.add(argName);

    if (parameter.type === 'enum' && !parameter.values) {
      problems.push(`enum parameter "${parameter.name}" declares no values`);
    }
    if (parameter.type === 'array' && parameter.in !== 'query') {
      problems.push(`array parameter "${parameter.name}" must be a query parameter`);
    }
    if (parameter.in === 'path') {
      if (!parameter.required) {
        problems.push(`path parameter "${parameter.name}" must be required`);
      }
      if (!placeholders.includes(parameter.name)) {
        problems.push(`path parameter "${parameter.name}" has no placeholder in ${entry.path}`);
      }
    }
  }

  const pathNames = namesByLocation.get('path') ?? new Set<string>();
  for (const placeholder of placeholders) {
    if (!pathNames.has(placeholder)) {
      problems.push(`placeholder {${placeholder}} has no path parameter`);
    }
  }

  if (entry.body) {
    const bodyArg = entry.body.argName ?? 'body';
    if (argNames.has(bodyArg)) {
      problems.push(`body argument "${bodyArg}" collides with a parameter`);
    }
  }

  if (entry.pagination.mode !== 'none' && entry.responseKind !== 'json') {
    problems.push('paginated operations must return JSON');
  }

  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
