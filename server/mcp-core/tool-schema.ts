/**
 * Tool definitions
 *
 * Every catalogue operation is listed as one MCP tool. The input schema is
 * plain JSON Schema derived from the descriptor; argument validation itself
 * happens in the parameter binder, so the schema only guides the client.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { bodyArgName, parameterArgName } from '../dispatcher/parameter-binder.js';
import type { OperationDescriptor, ParameterSpec } from '../dispatcher/types.js';

/** Arguments the tool surface consumes itself; never forwarded to Jira */
export const CONTROL_ARGS = {
  pageLimit: '_pageLimit',
  pollIntervalMs: '_pollIntervalMs',
  maxWaitMs: '_maxWaitMs',
} as const;

type PropertySchema = Record<string, unknown>;

export function toToolDefinition(descriptor: OperationDescriptor): Tool {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const parameter of descriptor.parameters) {
    const argName = parameterArgName(parameter);
    properties[argName] = parameterSchema(parameter);
    if (parameter.required) required.push(argName);
  }

  const bodyArg = bodyArgName(descriptor);
  if (bodyArg && descriptor.body) {
    const isJson = (descriptor.body.contentType ?? 'application/json').includes('json');
    properties[bodyArg] = withDescription(
      isJson ? {} : { type: 'string' },
      descriptor.body.description ?? `Request body (${descriptor.body.contentType ?? 'application/json'})`,
    );
    if (descriptor.body.required) required.push(bodyArg);
  }

  if (descriptor.pagination.mode !== 'none') {
    properties[CONTROL_ARGS.pageLimit] = {
      type: 'integer',
      minimum: 1,
      description: 'Follow pagination for up to this many pages and return their items combined',
    };
  }

  if (descriptor.asyncTask) {
    properties[CONTROL_ARGS.pollIntervalMs] = {
      type: 'integer',
      minimum: 1,
      description: 'Delay between task status checks in milliseconds',
    };
    properties[CONTROL_ARGS.maxWaitMs] = {
      type: 'integer',
      minimum: 1,
      description: 'Give up waiting for the task after this many milliseconds',
    };
  }

  const inputSchema: Tool['inputSchema'] = { type: 'object', properties, additionalProperties: false };
  if (required.length > 0) inputSchema.required = required;

  return {
    name: descriptor.id,
    description: toolDescription(descriptor),
    inputSchema,
  };
}

function parameterSchema(parameter: ParameterSpec): PropertySchema {
  switch (parameter.type) {
    case 'integer':
      return withDescription({ type: 'integer' }, parameter.description);
    case 'boolean':
      return withDescription({ type: 'boolean' }, parameter.description);
    case 'enum':
      return withDescription({ type: 'string', enum: parameter.values ?? [] }, parameter.description);
    case 'array':
      return withDescription({ type: 'array', items: { type: parameter.items ?? 'string' } }, parameter.description);
    case 'string':
      return withDescription({ type: 'string' }, parameter.description);
  }
}

function withDescription(schema: PropertySchema, description: string | undefined): PropertySchema {
  return description ? { ...schema, description } : schema;
}

function toolDescription(descriptor: OperationDescriptor): string {
  const lines = [descriptor.summary ?? `${descriptor.method} ${descriptor.path}`];
  if (descriptor.description) lines.push(descriptor.description);
  if (descriptor.pagination.mode !== 'none') {
    lines.push(`Paginated; pass ${CONTROL_ARGS.pageLimit} to fetch several pages at once.`);
  }
  if (descriptor.asyncTask) {
    lines.push('Starts a background task and waits for it to finish.');
  }
  if (descriptor.responseKind === 'binary') {
    lines.push('Returns file content.');
  }
  return lines.join('\n\n');
}
