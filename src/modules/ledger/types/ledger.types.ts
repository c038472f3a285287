// src/modules/ledger/types/ledger.types.ts

import type { LedgerError } from '../ledger.errors.js';

export type RecordId = string | number;

/**
 * One attested entry of the chain, as handed to the application layer.
 */
export interface Block {
  index: number;
  tableName: string;
  recordId: RecordId;
  dataHash: string;
  previousHash: string;
  blockHash: string;
  createdAt: string | null;
}

/**
 * Row layout of the `blockchain` table.
 */
export interface LedgerRow {
  block_index: number;
  table_name: string;
  record_id: string;
  data_hash: string;
  block_hash: string;
  previous_hash: string;
  created_at: string | null;
}

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export type IntegrityFailureReason = 'index_gap' | 'previous_hash_mismatch' | 'block_hash_mismatch';

export type IntegrityReport =
  | { valid: true; length: number }
  | {
      valid: false;
      length: number;
      brokenAt: number;
      reason: IntegrityFailureReason;
      expected: string;
      actual: string;
    };

export type ChainState = 'uninitialized' | 'ready';

export interface ChainStats {
  state: ChainState;
  length: number;
  tailIndex: number;
  tailHash: string;
  algorithm: string;
}

/**
 * Notification from the application layer after an insert or update on a
 * tracked table.
 */
export interface RowMutation {
  tableName: string;
  recordId: RecordId;
  columns: readonly string[];
  values: readonly unknown[];
}

export interface AttestationOutcome {
  dataHash: string;
  degraded: boolean;
  result: LedgerResult<Block>;
}
