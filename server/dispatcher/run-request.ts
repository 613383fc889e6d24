import { DispatchError } from './errors.js';
import type { RequestExecutor } from './request-executor.js';
import { isRecord, normalize } from './response-normalizer.js';
import type { BoundRequest, OperationDescriptor, ResultEnvelope } from './types.js';

/**
 * Execute one bound request and normalize the outcome. Dispatcher errors
 * (transport, cancellation) become Failure values; anything else is a bug
 * and propagates.
 */
export async function runRequest(
  executor: RequestExecutor,
  descriptor: OperationDescriptor,
  bound: BoundRequest,
  signal?: AbortSignal,
): Promise<ResultEnvelope> {
  try {
    const raw = await executor.execute(bound, signal);
    return normalize(raw, descriptor);
  } catch (error) {
    if (error instanceof DispatchError) {
      return error.toFailure();
    }
    throw error;
  }
}

/**
 * Read a dotted field path (`page.values`) out of decoded JSON
 */
export function readField(data: unknown, fieldPath: string): unknown {
  let current: unknown = data;
  for (const segment of fieldPath.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function jsonData(result: ResultEnvelope): unknown {
  return result.ok && result.body.kind === 'json' ? result.body.data : undefined;
}
