/**
 * Structural schema for operation catalogue entries.
 *
 * Semantic rules that span fields (placeholders vs. path parameters,
 * cross-references between operations) live in registry.ts.
 */

import { z } from 'zod';

const parameterSchema = z.object({
  name: z.string().min(1),
  in: z.enum(['path', 'query', 'header']),
  required: z.boolean().default(false),
  type: z.enum(['string', 'integer', 'boolean', 'enum', 'array']),
  values: z.array(z.string()).min(1).optional(),
  items: z.enum(['string', 'integer']).optional(),
  argName: z.string().min(1).optional(),
  description: z.string().optional(),
}).strict();

const bodySchema = z.object({
  argName: z.string().min(1).optional(),
  required: z.boolean().default(false),
  contentType: z.string().min(1).optional(),
  schemaRef: z.string().optional(),
  description: z.string().optional(),
}).strict();

const paginationSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('none') }).strict(),
  z.object({
    mode: z.literal('offset'),
    offsetParam: z.string().min(1),
    limitParam: z.string().min(1),
    itemsField: z.string().min(1),
    totalField: z.string().min(1).optional(),
    lastPageField: z.string().min(1).optional(),
    pageSizeField: z.string().min(1).optional(),
    defaultPageSize: z.number().int().positive(),
  }).strict(),
  z.object({
    mode: z.literal('cursor'),
    cursorParam: z.string().min(1),
    nextCursorField: z.string().min(1),
    itemsField: z.string().min(1),
    limitParam: z.string().min(1).optional(),
    defaultPageSize: z.number().int().positive().optional(),
  }).strict(),
]);

const taskStateSchema = z.enum(['pending', 'running', 'succeeded', 'failed', 'cancelled']);

const asyncTaskSchema = z.object({
  statusOperation: z.string().min(1),
  taskIdField: z.string().min(1),
  taskIdArg: z.string().min(1),
  statusField: z.string().min(1),
  statusMap: z.record(taskStateSchema).refine(
    (map) => Object.keys(map).length > 0,
    { message: 'statusMap must map at least one status' },
  ),
  resultField: z.string().min(1).optional(),
}).strict();

export const catalogueEntrySchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]{1,128}$/, 'tool ids may only contain letters, digits, "_", "-" and "."'),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
  path: z.string().startsWith('/'),
  parameters: z.array(parameterSchema).default([]),
  body: bodySchema.optional(),
  pagination: paginationSchema.default({ mode: 'none' }),
  responseKind: z.enum(['json', 'binary', 'empty']).default('json'),
  idempotent: z.boolean().optional(),
  asyncTask: asyncTaskSchema.optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
}).strict();

export const catalogueSchema = z.object({
  operations: z.array(catalogueEntrySchema),
});

export type CatalogueEntryInput = z.input<typeof catalogueEntrySchema>;
export type CatalogueEntry = z.output<typeof catalogueEntrySchema>;
