// src/modules/ledger/ledger.store.ts

import Database from 'better-sqlite3';
import { GENESIS_PREVIOUS_HASH } from './hasher.js';
import {
  ConcurrentAppendConflict,
  ConnectivityError,
  LedgerError,
  LedgerStoreError,
} from './ledger.errors.js';
import { LEDGER_TABLE } from './schemas/ledger.schema.js';
import type { Block, LedgerRow } from './types/ledger.types.js';

/**
 * @fileoverview Durable append-only log behind the chain.
 */

export interface LedgerStore {
  /** Blocks in ascending index order; with a limit, the most recent `limit` of them. */
  load(limit?: number): Promise<Block[]>;
  /** Blocks with an index greater than `index`, ascending. */
  loadAfter(index: number): Promise<Block[]>;
  /**
   * Persists `block` only if it extends the stored tail. Rejects with
   * ConcurrentAppendConflict otherwise.
   */
  append(block: Block): Promise<Block>;
  close(): void;
}

const CONNECTIVITY_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_NOTADB'];
const CONFLICT_CODES = ['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE'];

function translateError(error: unknown, operation: string, attemptedIndex = 0): LedgerError {
  if (error instanceof LedgerError) return error;

  if (error instanceof Database.SqliteError) {
    if (CONNECTIVITY_CODES.some((code) => error.code.startsWith(code))) {
      return new ConnectivityError(`Ledger store unreachable during ${operation}`, error);
    }
    if (CONFLICT_CODES.includes(error.code)) {
      return new ConcurrentAppendConflict(`Block ${attemptedIndex} was taken by another writer`, attemptedIndex);
    }
    return new LedgerStoreError(`Ledger store failed during ${operation}: ${error.message}`, error);
  }

  // better-sqlite3 raises a TypeError once the handle is closed
  if (error instanceof TypeError && /not open/i.test(error.message)) {
    return new ConnectivityError(`Ledger store connection closed during ${operation}`, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new LedgerStoreError(`Ledger store failed during ${operation}: ${message}`, error);
}

export function rowToBlock(row: LedgerRow): Block {
  return {
    index: row.block_index,
    tableName: row.table_name,
    recordId: row.record_id,
    dataHash: row.data_hash,
    previousHash: row.previous_hash,
    blockHash: row.block_hash,
    createdAt: row.created_at,
  };
}

type TailRow = Pick<LedgerRow, 'block_index' | 'block_hash'>;

export class SqliteLedgerStore implements LedgerStore {
  private readonly appendTx: Database.Transaction<(block: Block) => void>;

  constructor(private readonly db: Database.Database) {
    this.appendTx = db.transaction((block: Block) => {
      const tail = db
        .prepare<[], TailRow>(`SELECT block_index, block_hash FROM ${LEDGER_TABLE} ORDER BY block_index DESC LIMIT 1`)
        .get();

      const expectedIndex = tail ? tail.block_index + 1 : 1;
      const expectedPrevious = tail ? tail.block_hash : GENESIS_PREVIOUS_HASH;

      if (block.index !== expectedIndex || block.previousHash !== expectedPrevious) {
        throw new ConcurrentAppendConflict(
          `Block ${block.index} does not extend the stored tail (next index is ${expectedIndex})`,
          block.index,
          tail?.block_index ?? 0
        );
      }

      db.prepare(
        `INSERT INTO ${LEDGER_TABLE} (block_index, table_name, record_id, data_hash, block_hash, previous_hash, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(
        block.index,
        block.tableName,
        String(block.recordId),
        block.dataHash,
        block.blockHash,
        block.previousHash,
        block.createdAt
      );
    });
  }

  private tableExists(): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(LEDGER_TABLE);
    return row !== undefined;
  }

  async load(limit?: number): Promise<Block[]> {
    try {
      if (!this.tableExists()) return [];

      if (limit === undefined) {
        return this.db
          .prepare<[], LedgerRow>(`SELECT * FROM ${LEDGER_TABLE} ORDER BY block_index ASC`)
          .all()
          .map(rowToBlock);
      }

      // newest `limit` rows, flipped back to chronological order
      return this.db
        .prepare<[number], LedgerRow>(`SELECT * FROM ${LEDGER_TABLE} ORDER BY block_index DESC LIMIT ?`)
        .all(Math.max(0, Math.floor(limit)))
        .reverse()
        .map(rowToBlock);
    } catch (error) {
      throw translateError(error, 'load');
    }
  }

  async loadAfter(index: number): Promise<Block[]> {
    try {
      if (!this.tableExists()) return [];
      return this.db
        .prepare<[number], LedgerRow>(`SELECT * FROM ${LEDGER_TABLE} WHERE block_index > ? ORDER BY block_index ASC`)
        .all(index)
        .map(rowToBlock);
    } catch (error) {
      throw translateError(error, 'loadAfter');
    }
  }

  async append(block: Block): Promise<Block> {
    try {
      this.appendTx.immediate(block);
      return { ...block, recordId: String(block.recordId) };
    } catch (error) {
      throw translateError(error, 'append', block.index);
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
