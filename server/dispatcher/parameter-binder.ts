/**
 * Parameter Binder
 *
 * Turns a loosely-typed argument bag into a ready-to-send request for one
 * operation descriptor. All argument validation happens here, once, so no
 * operation needs checks of its own and nothing invalid reaches the network.
 */

import { ValidationError } from './errors.js';
import type {
  ArgumentBag,
  ArrayItemType,
  BoundRequest,
  HttpMethod,
  OperationDescriptor,
  ParameterSpec,
} from './types.js';

const RETRY_SAFE_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'DELETE']);

const DEFAULT_BODY_ARG = 'body';
const DEFAULT_CONTENT_TYPE = 'application/json';

export function bodyArgName(descriptor: OperationDescriptor): string | undefined {
  return descriptor.body ? descriptor.body.argName ?? DEFAULT_BODY_ARG : undefined;
}

export function parameterArgName(parameter: ParameterSpec): string {
  return parameter.argName ?? parameter.name;
}

/**
 * Whether repeating a request for this operation cannot duplicate a side
 * effect: the method is safe or idempotent by HTTP semantics, or the
 * catalogue marks the operation idempotent.
 */
export function isRetrySafe(descriptor: OperationDescriptor): boolean {
  return descriptor.idempotent === true || RETRY_SAFE_METHODS.has(descriptor.method);
}

/**
 * Bind an argument bag to a descriptor
 * @throws ValidationError (missingRequired | wrongType | unknownParameter)
 */
export function bind(descriptor: OperationDescriptor, args: ArgumentBag): BoundRequest {
  const bodyArg = bodyArgName(descriptor);
  const known = new Set(descriptor.parameters.map(parameterArgName));
  if (bodyArg) known.add(bodyArg);

  for (const key of Object.keys(args)) {
    if (!known.has(key)) {
      throw new ValidationError(
        'unknownParameter',
        key,
        `Unknown parameter "${key}" for ${descriptor.id}. Accepted: ${formatAccepted(known)}`,
      );
    }
  }

  let path = descriptor.path;
  const query: Array<[string, string]> = [];
  const headers: Record<string, string> = {};

  for (const parameter of descriptor.parameters) {
    const argName = parameterArgName(parameter);
    const raw = args[argName];

    if (raw === undefined || raw === null) {
      if (parameter.required) {
        throw new ValidationError(
          'missingRequired',
          argName,
          `Missing required ${parameter.in} parameter "${argName}" for ${descriptor.id}`,
        );
      }
      continue;
    }

    switch (parameter.in) {
      case 'path':
        path = path.split(`{${parameter.name}}`).join(encodePathSegment(parameter, raw));
        break;
      case 'query':
        if (parameter.type === 'array') {
          for (const item of coerceArray(parameter, raw)) {
            query.push([parameter.name, item]);
          }
        } else {
          query.push([parameter.name, coerceScalar(parameter, raw)]);
        }
        break;
      case 'header':
        headers[parameter.name] = coerceScalar(parameter, raw);
        break;
    }
  }

  const bound: BoundRequest = {
    operationId: descriptor.id,
    method: descriptor.method,
    path,
    query,
    headers,
    responseKind: descriptor.responseKind,
    retrySafe: isRetrySafe(descriptor),
  };

  if (descriptor.body && bodyArg) {
    const value = args[bodyArg];
    if (value === undefined || value === null) {
      if (descriptor.body.required) {
        throw new ValidationError('missingRequired', bodyArg, `Missing required request body "${bodyArg}" for ${descriptor.id}`);
      }
    } else {
      const contentType = descriptor.body.contentType ?? DEFAULT_CONTENT_TYPE;
      bound.contentType = contentType;
      bound.body = serializeBody(descriptor, bodyArg, contentType, value);
    }
  }

  return bound;
}

/**
 * Coerce a single argument to the parameter's declared primitive and render
 * it as wire text
 */
export function coerceScalar(parameter: ParameterSpec, value: unknown): string {
  const argName = parameterArgName(parameter);
  switch (parameter.type) {
    case 'string':
      if (typeof value === 'string') return value;
      if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'boolean') {
        return String(value);
      }
      throw wrongType(argName, 'a string', value);
    case 'integer':
      return coerceInteger(argName, value);
    case 'boolean':
      if (typeof value === 'boolean') return String(value);
      if (value === 'true' || value === 'false') return value;
      throw wrongType(argName, 'a boolean', value);
    case 'enum': {
      const values = parameter.values ?? [];
      if (typeof value === 'string' && values.includes(value)) return value;
      throw wrongType(argName, `one of ${values.map((v) => JSON.stringify(v)).join(', ')}`, value);
    }
    case 'array':
      throw wrongType(argName, 'a scalar', value);
  }
}

function coerceArray(parameter: ParameterSpec, value: unknown): string[] {
  const argName = parameterArgName(parameter);
  const itemType: ArrayItemType = parameter.items ?? 'string';
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item) => {
    if (itemType === 'integer') {
      return coerceInteger(argName, item);
    }
    if (typeof item === 'string') return item;
    if (typeof item === 'number' && Number.isFinite(item)) return String(item);
    throw wrongType(argName, 'an array of strings', value);
  });
}

function coerceInteger(argName: string, value: unknown): string {
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return value.trim();
  throw wrongType(argName, 'an integer', value);
}

/**
 * URL parsing resolves `.` and `..` segments (percent-encoded or not), which
 * would move the request to another resource
 */
function encodePathSegment(parameter: ParameterSpec, value: unknown): string {
  const segment = coerceScalar(parameter, value);
  if (segment === '.' || segment === '..') {
    throw wrongType(parameterArgName(parameter), 'a path segment other than "." or ".."', value);
  }
  return encodeURIComponent(segment);
}

function serializeBody(descriptor: OperationDescriptor, bodyArg: string, contentType: string, value: unknown): string {
  if (contentType.includes('json')) {
    return JSON.stringify(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  throw new ValidationError(
    'wrongType',
    bodyArg,
    `Request body "${bodyArg}" for ${descriptor.id} must be a string (${contentType})`,
  );
}

function wrongType(argName: string, expected: string, value: unknown): ValidationError {
  return new ValidationError('wrongType', argName, `Parameter "${argName}" must be ${expected}, got ${describeValue(value)}`);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object' && value !== null) return 'an object';
  return String(value);
}

function formatAccepted(known: ReadonlySet<string>): string {
  return known.size > 0 ? Array.from(known).join(', ') : '(none)';
}
