/**
 * Small catalogue covering each operation shape the dispatcher handles
 */

import type { CatalogueEntryInput } from '../dispatcher/catalogue-schema.js';
import { OperationRegistry } from '../dispatcher/registry.js';

export const TEST_OPERATIONS: CatalogueEntryInput[] = [
  {
    id: 'getIssue',
    method: 'GET',
    path: '/rest/api/3/issue/{issueIdOrKey}',
    parameters: [
      { name: 'issueIdOrKey', in: 'path', required: true, type: 'string' },
      { name: 'fields', in: 'query', type: 'array', items: 'string' },
      { name: 'expand', in: 'query', type: 'string' },
      { name: 'updateHistory', in: 'query', type: 'boolean' },
    ],
  },
  {
    id: 'createIssue',
    method: 'POST',
    path: '/rest/api/3/issue',
    body: { required: true, contentType: 'application/json' },
  },
  {
    id: 'deleteIssue',
    method: 'DELETE',
    path: '/rest/api/3/issue/{issueIdOrKey}',
    parameters: [{ name: 'issueIdOrKey', in: 'path', required: true, type: 'string' }],
    responseKind: 'empty',
  },
  {
    id: 'getAttachmentContent',
    method: 'GET',
    path: '/rest/api/3/attachment/content/{id}',
    parameters: [{ name: 'id', in: 'path', required: true, type: 'string', argName: 'attachmentId' }],
    responseKind: 'binary',
  },
  {
    id: 'getProjects',
    method: 'GET',
    path: '/rest/api/3/project/search',
    parameters: [
      { name: 'startAt', in: 'query', type: 'integer' },
      { name: 'maxResults', in: 'query', type: 'integer' },
      { name: 'orderBy', in: 'query', type: 'enum', values: ['key', 'name'] },
    ],
    pagination: {
      mode: 'offset',
      offsetParam: 'startAt',
      limitParam: 'maxResults',
      itemsField: 'values',
      totalField: 'total',
      lastPageField: 'isLast',
      pageSizeField: 'maxResults',
      defaultPageSize: 2,
    },
  },
  {
    id: 'searchIssues',
    method: 'GET',
    path: '/rest/api/3/search/jql',
    parameters: [
      { name: 'jql', in: 'query', required: true, type: 'string' },
      { name: 'nextPageToken', in: 'query', type: 'string' },
      { name: 'maxResults', in: 'query', type: 'integer' },
    ],
    pagination: {
      mode: 'cursor',
      cursorParam: 'nextPageToken',
      nextCursorField: 'nextPageToken',
      itemsField: 'issues',
      limitParam: 'maxResults',
      defaultPageSize: 50,
    },
  },
  {
    id: 'getBulkOperationProgress',
    method: 'GET',
    path: '/rest/api/3/bulk/queue/{taskId}',
    parameters: [{ name: 'taskId', in: 'path', required: true, type: 'string' }],
  },
  {
    id: 'bulkDeleteIssues',
    method: 'POST',
    path: '/rest/api/3/bulk/issues/delete',
    body: { required: true },
    asyncTask: {
      statusOperation: 'getBulkOperationProgress',
      taskIdField: 'taskId',
      taskIdArg: 'taskId',
      statusField: 'status',
      statusMap: {
        ENQUEUED: 'pending',
        RUNNING: 'running',
        COMPLETE: 'succeeded',
        FAILED: 'failed',
        CANCELLED: 'cancelled',
      },
    },
  },
];

export function createTestRegistry(): OperationRegistry {
  return OperationRegistry.fromCatalogue({ operations: TEST_OPERATIONS });
}
