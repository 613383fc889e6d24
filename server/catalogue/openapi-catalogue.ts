/**
 * OpenAPI → operation catalogue
 *
 * Converts an OpenAPI 3 document into raw catalogue entries. Only the subset
 * the dispatcher needs is read: operation ids, parameters, request bodies,
 * success response content and these vendor extensions:
 *
 *   x-pagination     pagination spec (see catalogue-schema.ts)
 *   x-async-task     async task spec
 *   x-idempotent     marks a POST/PATCH safe to retry
 *   x-response-kind  overrides the inferred json | binary | empty
 *
 * The output is validated by OperationRegistry.fromCatalogue like any other
 * catalogue source.
 */

import { z } from 'zod';
import { CatalogueError } from '../dispatcher/errors.js';
import type { ParameterType } from '../dispatcher/types.js';

const referenceSchema = z.object({ $ref: z.string() });

const schemaShape = z.object({
  type: z.string().optional(),
  enum: z.array(z.unknown()).optional(),
  items: z.object({
    type: z.string().optional(),
    $ref: z.string().optional(),
  }).optional(),
  $ref: z.string().optional(),
});

const parameterObjectSchema = z.object({
  name: z.string(),
  in: z.string(),
  required: z.boolean().optional(),
  description: z.string().optional(),
  schema: schemaShape.optional(),
});

const parameterOrRefSchema = z.union([parameterObjectSchema, referenceSchema]);

const requestBodySchema = z.object({
  required: z.boolean().optional(),
  description: z.string().optional(),
  content: z.record(z.object({ schema: z.unknown().optional() })),
});

const responseSchema = z.object({
  description: z.string().optional(),
  content: z.record(z.unknown()).optional(),
});

const operationSchema = z.object({
  operationId: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  parameters: z.array(parameterOrRefSchema).optional(),
  requestBody: z.union([requestBodySchema, referenceSchema]).optional(),
  responses: z.record(z.union([responseSchema, referenceSchema])).optional(),
  'x-pagination': z.unknown().optional(),
  'x-async-task': z.unknown().optional(),
  'x-idempotent': z.boolean().optional(),
  'x-response-kind': z.enum(['json', 'binary', 'empty']).optional(),
});

const pathItemSchema = z.object({
  parameters: z.array(parameterOrRefSchema).optional(),
  get: operationSchema.optional(),
  post: operationSchema.optional(),
  put: operationSchema.optional(),
  patch: operationSchema.optional(),
  delete: operationSchema.optional(),
});

const documentSchema = z.object({
  openapi: z.string().startsWith('3.'),
  paths: z.record(pathItemSchema),
  components: z.object({
    parameters: z.record(parameterObjectSchema).optional(),
    schemas: z.record(z.unknown()).optional(),
    requestBodies: z.record(requestBodySchema).optional(),
    responses: z.record(responseSchema).optional(),
  }).optional(),
});

type OpenApiDocument = z.output<typeof documentSchema>;
type ParameterObject = z.output<typeof parameterObjectSchema>;
type ParameterOrRef = z.output<typeof parameterOrRefSchema>;
type SchemaShape = z.output<typeof schemaShape>;
type OperationObject = z.output<typeof operationSchema>;

const METHODS = ['get', 'post', 'put', 'patch', 'delete'] as const;
const PARAMETER_LOCATIONS = new Set(['path', 'query', 'header']);

export type RawCatalogueEntry = Record<string, unknown>;

export interface RawCatalogue {
  operations: RawCatalogueEntry[];
}

/**
 * @throws CatalogueError when the document is not a usable OpenAPI 3 document
 */
export function catalogueFromOpenApi(document: unknown): RawCatalogue {
  const parsed = documentSchema.safeParse(document);
  if (!parsed.success) {
    throw new CatalogueError(parsed.error.issues.map((issue) => `openapi ${issue.path.join('.')}: ${issue.message}`));
  }

  const doc = parsed.data;
  const problems: string[] = [];
  const operations: RawCatalogueEntry[] = [];

  for (const [path, pathItem] of Object.entries(doc.paths)) {
    for (const method of METHODS) {
      const operation = pathItem[method];
      if (!operation) continue;

      const where = `${method.toUpperCase()} ${path}`;
      if (!operation.operationId) {
        problems.push(`${where}: operationId is required`);
        continue;
      }

      const entry = convertOperation(doc, path, method, pathItem.parameters ?? [], operation, (problem) =>
        problems.push(`${operation.operationId}: ${problem}`),
      );
      operations.push(entry);
    }
  }

  if (problems.length > 0) {
    throw new CatalogueError(problems);
  }
  return { operations };
}

function convertOperation(
  doc: OpenApiDocument,
  path: string,
  method: (typeof METHODS)[number],
  pathLevelParameters: readonly ParameterOrRef[],
  operation: OperationObject,
  report: (problem: string) => void,
): RawCatalogueEntry {
  const entry: RawCatalogueEntry = {
    id: operation.operationId,
    method: method.toUpperCase(),
    path,
    parameters: collectParameters(doc, pathLevelParameters, operation.parameters ?? [], report),
  };

  const body = convertRequestBody(doc, operation, report);
  if (body) entry.body = body;

  entry.responseKind = operation['x-response-kind'] ?? inferResponseKind(doc, operation);
  if (operation['x-pagination'] !== undefined) entry.pagination = operation['x-pagination'];
  if (operation['x-async-task'] !== undefined) entry.asyncTask = operation['x-async-task'];
  if (operation['x-idempotent'] !== undefined) entry.idempotent = operation['x-idempotent'];
  if (operation.summary) entry.summary = operation.summary;
  if (operation.description) entry.description = operation.description;
  if (operation.tags) entry.tags = operation.tags;
  return entry;
}

/**
 * Operation-level parameters override path-level ones with the same name and
 * location. Cookie parameters are not supported and are skipped.
 */
function collectParameters(
  doc: OpenApiDocument,
  pathLevel: readonly ParameterOrRef[],
  operationLevel: readonly ParameterOrRef[],
  report: (problem: string) => void,
): RawCatalogueEntry[] {
  const merged = new Map<string, ParameterObject>();
  for (const candidate of [...pathLevel, ...operationLevel]) {
    const parameter = resolveParameter(doc, candidate, report);
    if (!parameter) continue;
    merged.set(`${parameter.in}:${parameter.name}`, parameter);
  }

  const parameters: RawCatalogueEntry[] = [];
  for (const parameter of merged.values()) {
    if (!PARAMETER_LOCATIONS.has(parameter.in)) continue;
    const schema = resolveSchema(doc, parameter.schema);
    const converted: RawCatalogueEntry = {
      name: parameter.name,
      in: parameter.in,
      required: parameter.in === 'path' ? true : parameter.required ?? false,
      ...convertSchemaType(doc, schema),
    };
    if (parameter.description) converted.description = parameter.description;
    parameters.push(converted);
  }
  return parameters;
}

function convertSchemaType(doc: OpenApiDocument, schema: SchemaShape | undefined): { type: ParameterType; values?: string[]; items?: string } {
  const enumValues = schema?.enum?.filter((value): value is string => typeof value === 'string');
  if (enumValues && enumValues.length > 0) {
    return { type: 'enum', values: enumValues };
  }
  switch (schema?.type) {
    case 'integer':
      return { type: 'integer' };
    case 'boolean':
      return { type: 'boolean' };
    case 'array': {
      const items = resolveSchema(doc, schema.items);
      return { type: 'array', items: items?.type === 'integer' ? 'integer' : 'string' };
    }
    default:
      // string, number and untyped parameters travel as text
      return { type: 'string' };
  }
}

function convertRequestBody(doc: OpenApiDocument, operation: OperationObject, report: (problem: string) => void): RawCatalogueEntry | undefined {
  const requestBody = operation.requestBody;
  if (!requestBody) return undefined;

  const resolved = '$ref' in requestBody
    ? doc.components?.requestBodies?.[refName(requestBody.$ref, 'requestBodies')]
    : requestBody;
  if (!resolved) {
    report(`unresolvable request body reference`);
    return undefined;
  }

  const contentTypes = Object.keys(resolved.content);
  const contentType = contentTypes.find((type) => type.includes('json')) ?? contentTypes[0] ?? 'application/json';
  const body: RawCatalogueEntry = { required: resolved.required ?? false, contentType };

  const media = resolved.content[contentType];
  const schema = media?.schema;
  if (typeof schema === 'object' && schema !== null && '$ref' in schema && typeof schema.$ref === 'string') {
    body.schemaRef = schema.$ref;
  }
  if (resolved.description) body.description = resolved.description;
  return body;
}

function inferResponseKind(doc: OpenApiDocument, operation: OperationObject): 'json' | 'binary' | 'empty' {
  const responses = operation.responses ?? {};
  const successCodes = Object.keys(responses).filter((code) => /^2\d\d$/.test(code) || code === '2XX');
  if (successCodes.length === 0) return 'json';

  let sawContent = false;
  for (const code of successCodes) {
    const response = responses[code];
    const resolved = '$ref' in response ? doc.components?.responses?.[refName(response.$ref, 'responses')] : response;
    const contentTypes = Object.keys(resolved?.content ?? {});
    if (contentTypes.length === 0) continue;
    sawContent = true;
    if (contentTypes.some((type) => type.includes('json'))) return 'json';
  }
  return sawContent ? 'binary' : 'empty';
}

function resolveParameter(doc: OpenApiDocument, candidate: ParameterOrRef, report: (problem: string) => void): ParameterObject | undefined {
  if (!('$ref' in candidate)) return candidate;
  const resolved = doc.components?.parameters?.[refName(candidate.$ref, 'parameters')];
  if (!resolved) report(`unresolvable parameter reference ${candidate.$ref}`);
  return resolved;
}

function resolveSchema(doc: OpenApiDocument, schema: SchemaShape | undefined): SchemaShape | undefined {
  if (!schema?.$ref) return schema;
  const target = doc.components?.schemas?.[refName(schema.$ref, 'schemas')];
  const parsed = schemaShape.safeParse(target);
  return parsed.success ? parsed.data : undefined;
}

function refName(ref: string, section: string): string {
  const prefix = `#/components/${section}/`;
  return ref.startsWith(prefix) ? ref.slice(prefix.length) : '';
}
