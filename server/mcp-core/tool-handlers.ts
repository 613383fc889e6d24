/**
 * Tool call handling
 *
 * Routes `tools/list` and `tools/call` to the dispatcher and renders result
 * envelopes as MCP content:
 *   - JSON bodies        → text content with the pretty-printed JSON
 *   - empty bodies       → text content naming the status code
 *   - image payloads     → image content
 *   - other binary data  → embedded blob resource
 *   - failures           → text content with the failure, `isError: true`
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Dispatcher } from '../dispatcher/dispatcher.js';
import { ValidationError } from '../dispatcher/errors.js';
import { isRecord } from '../dispatcher/response-normalizer.js';
import { readField } from '../dispatcher/run-request.js';
import type { ArgumentBag, Failure, OperationDescriptor, ResultEnvelope, Success } from '../dispatcher/types.js';
import { logger } from '../observability/logger.js';
import { CONTROL_ARGS, toToolDefinition } from './tool-schema.js';

export function listTools(dispatcher: Dispatcher): Tool[] {
  return dispatcher.registry.list().map(toToolDefinition);
}

/**
 * Handle one `tools/call` request. Never throws: unexpected errors are logged
 * and answered with an error result.
 */
export async function callTool(
  dispatcher: Dispatcher,
  name: string,
  rawArgs: Record<string, unknown> | undefined,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  const args: ArgumentBag = { ...(rawArgs ?? {}) };
  logger.info('Tool call received', { tool: name, arguments: Object.keys(args) });

  try {
    if (!dispatcher.registry.has(name)) {
      // Let the dispatcher produce the NotFound envelope
      return renderEnvelope(await dispatcher.invoke(name, args, { signal }), name);
    }

    const descriptor = dispatcher.registry.resolve(name);

    if (descriptor.asyncTask) {
      const pollIntervalMs = takeControlArg(args, CONTROL_ARGS.pollIntervalMs);
      const maxWaitMs = takeControlArg(args, CONTROL_ARGS.maxWaitMs);
      return renderEnvelope(await dispatcher.invokeAsync(name, args, { signal, pollIntervalMs, maxWaitMs }), name);
    }

    if (descriptor.pagination.mode !== 'none') {
      const pageLimit = takeControlArg(args, CONTROL_ARGS.pageLimit);
      if (pageLimit !== undefined) {
        return await collectPages(dispatcher, descriptor, args, pageLimit, signal);
      }
    }

    return renderEnvelope(await dispatcher.invoke(name, args, { signal }), name);
  } catch (error) {
    if (error instanceof ValidationError) {
      return renderEnvelope(error.toFailure(), name);
    }
    logger.error('Tool call failed unexpectedly', {
      tool: name,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return {
      content: [{ type: 'text', text: `Internal error while calling ${name}: ${error instanceof Error ? error.message : String(error)}` }],
      isError: true,
    };
  }
}

/**
 * Remove a control argument from the bag and validate it
 * @throws ValidationError when the value is not a positive integer
 */
function takeControlArg(args: ArgumentBag, key: string): number | undefined {
  if (!(key in args)) return undefined;
  const value = args[key];
  delete args[key];
  if (value === undefined || value === null) return undefined;

  const parsed = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError('wrongType', key, `Parameter "${key}" must be a positive integer`);
  }
  return parsed;
}

/**
 * Walk up to `pageLimit` pages and combine their items into one result.
 * A failing page turns the whole call into an error result that still
 * reports how many pages arrived before it.
 */
async function collectPages(
  dispatcher: Dispatcher,
  descriptor: OperationDescriptor,
  args: ArgumentBag,
  pageLimit: number,
  signal: AbortSignal | undefined,
): Promise<CallToolResult> {
  const itemsField = descriptor.pagination.mode === 'none' ? undefined : descriptor.pagination.itemsField;
  const items: unknown[] = [];
  let pages = 0;

  for await (const page of dispatcher.invokePaginated(descriptor.id, args, { pageLimit, signal })) {
    if (!page.ok) {
      return renderFailure({ ...page, details: { ...page.details, pagesReceived: pages } });
    }
    pages++;
    const pageItems = page.body.kind === 'json' && itemsField ? readField(page.body.data, itemsField) : undefined;
    if (Array.isArray(pageItems)) items.push(...pageItems);
  }

  return {
    content: [{ type: 'text', text: JSON.stringify({ pages, items }, null, 2) }],
  };
}

export function renderEnvelope(envelope: ResultEnvelope, toolId: string): CallToolResult {
  return envelope.ok ? renderSuccess(envelope, toolId) : renderFailure(envelope);
}

function renderSuccess(success: Success, toolId: string): CallToolResult {
  const { body } = success;
  switch (body.kind) {
    case 'json':
      return { content: [{ type: 'text', text: JSON.stringify(body.data, null, 2) }] };
    case 'empty':
      return { content: [{ type: 'text', text: `Request succeeded with status ${success.statusCode} (no content)` }] };
    case 'binary': {
      const data = Buffer.from(body.data).toString('base64');
      if (body.contentType.startsWith('image/')) {
        return { content: [{ type: 'image', data, mimeType: body.contentType }] };
      }
      return {
        content: [{
          type: 'resource',
          resource: { uri: `jira-operation://${toolId}`, mimeType: body.contentType, blob: data },
        }],
      };
    }
  }
}

function renderFailure(failure: Failure): CallToolResult {
  const summary: Record<string, unknown> = {
    kind: failure.kind,
    message: failure.message,
    retryable: failure.retryable,
  };
  if (failure.reason) summary.reason = failure.reason;
  if (failure.statusCode !== undefined) summary.statusCode = failure.statusCode;
  if (failure.retryAfterMs !== undefined) summary.retryAfterMs = failure.retryAfterMs;
  if (isRecord(failure.details) && Object.keys(failure.details).length > 0) summary.details = failure.details;

  return {
    content: [{ type: 'text', text: JSON.stringify(summary, null, 2) }],
    isError: true,
  };
}
