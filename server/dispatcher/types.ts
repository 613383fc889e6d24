/**
 * Dispatcher types
 *
 * Operation descriptors are data: one table describes every Jira operation,
 * and a single dispatcher interprets it. Nothing in here is Jira-specific
 * beyond the field names the catalogue chooses to put in it.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ParameterLocation = 'path' | 'query' | 'header';

export type ParameterType = 'string' | 'integer' | 'boolean' | 'enum' | 'array';

export type ArrayItemType = 'string' | 'integer';

export interface ParameterSpec {
  name: string;
  in: ParameterLocation;
  required: boolean;
  type: ParameterType;
  /** Allowed values when `type` is `enum` */
  values?: readonly string[];
  /** Item type when `type` is `array` (defaults to string) */
  items?: ArrayItemType;
  /** Argument-bag key, when it differs from the wire name */
  argName?: string;
  description?: string;
}

export interface BodySpec {
  /** Argument-bag key holding the body (defaults to `body`) */
  argName?: string;
  required: boolean;
  contentType?: string;
  schemaRef?: string;
  description?: string;
}

export interface OffsetPagination {
  mode: 'offset';
  offsetParam: string;
  limitParam: string;
  itemsField: string;
  totalField?: string;
  lastPageField?: string;
  pageSizeField?: string;
  defaultPageSize: number;
}

export interface CursorPagination {
  mode: 'cursor';
  cursorParam: string;
  nextCursorField: string;
  itemsField: string;
  limitParam?: string;
  defaultPageSize?: number;
}

export type PaginationSpec = { mode: 'none' } | OffsetPagination | CursorPagination;

export type ResponseKind = 'json' | 'binary' | 'empty';

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface AsyncTaskSpec {
  /** Tool id of the status-check operation */
  statusOperation: string;
  /** Field of the initiating response that holds the task id */
  taskIdField: string;
  /** Argument of the status operation that receives the task id */
  taskIdArg: string;
  /** Field of the status response that holds the service's status string */
  statusField: string;
  statusMap: Readonly<Record<string, TaskState>>;
  /** Field of the final status response holding the task outcome */
  resultField?: string;
}

export interface OperationDescriptor {
  id: string;
  method: HttpMethod;
  path: string;
  parameters: readonly ParameterSpec[];
  body?: BodySpec;
  pagination: PaginationSpec;
  responseKind: ResponseKind;
  idempotent?: boolean;
  asyncTask?: AsyncTaskSpec;
  summary?: string;
  description?: string;
  tags?: readonly string[];
}

export type ArgumentBag = Record<string, unknown>;

export interface BoundRequest {
  operationId: string;
  method: HttpMethod;
  path: string;
  /** Ordered name/value pairs; a name may repeat for array parameters */
  query: ReadonlyArray<readonly [string, string]>;
  headers: Readonly<Record<string, string>>;
  body?: string;
  contentType?: string;
  responseKind: ResponseKind;
  /** Retrying the request cannot duplicate a side effect */
  retrySafe: boolean;
}

export interface RawResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: Uint8Array;
  /** Attempts made, including the one that produced this response */
  attempts: number;
}

export type DecodedBody =
  | { kind: 'json'; data: unknown }
  | { kind: 'empty' }
  | { kind: 'binary'; data: Uint8Array; contentType: string };

export interface Success {
  ok: true;
  statusCode: number;
  body: DecodedBody;
}

export type FailureKind =
  | 'NotFound'
  | 'ValidationError'
  | 'TransportError'
  | 'ClientError'
  | 'ServerError'
  | 'DecodeError'
  | 'PaginationError'
  | 'Timeout'
  | 'Cancelled'
  | 'TaskFailed';

export interface Failure {
  ok: false;
  kind: FailureKind;
  /** Sub-classification, e.g. `missingRequired` or `stalled` */
  reason?: string;
  statusCode?: number;
  message: string;
  retryable: boolean;
  retryAfterMs?: number;
  details?: Record<string, unknown>;
}

export type ResultEnvelope = Success | Failure;

export interface CredentialProvider {
  getHeaders(): Promise<Record<string, string>>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
