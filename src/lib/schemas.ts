/**
 * Zod validation schemas for request bodies, query parameters and the
 * tracked tables file
 */
import { z } from 'zod';
import { IDENTIFIER } from '../modules/reconciliation/row-source.js';

const HexDigest = z.string().regex(/^[0-9a-f]{64}$/, 'must be 64 lowercase hex characters');
const TableName = z.string().min(1).max(128);
const RecordIdSchema = z.union([z.string().min(1), z.number().int()]);
const Identifier = z.string().regex(IDENTIFIER, 'must be a plain SQL identifier');

// Tracked tables file
export const TrackedTableSchema = z
  .object({
    name: Identifier,
    columns: z.array(Identifier).min(1),
  })
  .refine((table) => new Set(table.columns).size === table.columns.length, {
    message: 'columns must be unique',
    path: ['columns'],
  });

export const TrackedTablesFileSchema = z.array(TrackedTableSchema).refine(
  (tables) => new Set(tables.map((t) => t.name)).size === tables.length,
  { message: 'table names must be unique' }
);

export const FailedTablesSchema = z.array(
  z.object({
    table: z.string(),
    code: z.string(),
    message: z.string(),
  })
);

// Ledger request bodies
export const AddBlockBodySchema = z.object({
  tableName: TableName,
  recordId: RecordIdSchema,
  dataHash: HexDigest,
});

export const VerifyBodySchema = AddBlockBodySchema;

export const AttestBodySchema = z
  .object({
    tableName: TableName,
    recordId: RecordIdSchema,
    columns: z.array(z.string().min(1)).min(1),
    values: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  })
  .refine((body) => body.columns.length === body.values.length, {
    message: 'columns and values must have the same length',
    path: ['values'],
  });

export const SyncBodySchema = z
  .object({
    tables: z.array(z.string().min(1)).min(1).optional(),
  })
  .default({});

// Query Parameter Schemas
export const RecentBlocksQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(10),
});

export const IntegrityQuerySchema = z.object({
  source: z.enum(['memory', 'store']).default('memory'),
});

export const SyncRunsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  sortOrder: z.enum(['asc', 'desc']).default('desc'),
});

// Type exports
export type AddBlockBody = z.infer<typeof AddBlockBodySchema>;
export type AttestBody = z.infer<typeof AttestBodySchema>;
export type SyncBody = z.infer<typeof SyncBodySchema>;
