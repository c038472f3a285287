// test/helpers.ts

import Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { AppConfig } from '../src/config/validation.js';
import { runMigrations } from '../src/lib/database.js';
import { computeBlockHash, GENESIS_PREVIOUS_HASH, sha256Hex } from '../src/modules/ledger/hasher.js';
import { ConcurrentAppendConflict, type LedgerError } from '../src/modules/ledger/ledger.errors.js';
import type { LedgerStore } from '../src/modules/ledger/ledger.store.js';
import type { Block } from '../src/modules/ledger/types/ledger.types.js';

export const silentLogger: FastifyBaseLogger = pino({ level: 'silent' });

export const PATIENT_COLUMNS = ['patient_id', 'first_name', 'last_name', 'date_of_birth'];

export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}

export function createPatientsTable(db: Database.Database, count: number): void {
  db.exec(`
    CREATE TABLE PATIENTS (
      patient_id INTEGER PRIMARY KEY,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      date_of_birth TEXT NOT NULL
    );
  `);
  const insert = db.prepare('INSERT INTO PATIENTS (patient_id, first_name, last_name, date_of_birth) VALUES (?, ?, ?, ?)');
  for (let id = 1; id <= count; id++) {
    insert.run(id, `First${id}`, `Last${id}`, '1990-01-01');
  }
}

/** Test digest for `label`. */
export function digest(label: string): string {
  return sha256Hex(label);
}

/** A correctly linked chain of `count` blocks. */
export function linkedBlocks(count: number, tableName = 'PATIENTS'): Block[] {
  const blocks: Block[] = [];
  let previousHash = GENESIS_PREVIOUS_HASH;
  for (let index = 1; index <= count; index++) {
    const dataHash = digest(`row-${index}`);
    const blockHash = computeBlockHash(index, previousHash, dataHash);
    blocks.push({
      index,
      tableName,
      recordId: String(index),
      dataHash,
      previousHash,
      blockHash,
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    previousHash = blockHash;
  }
  return blocks;
}

/**
 * In-process LedgerStore with failure injection.
 */
export class MemoryLedgerStore implements LedgerStore {
  blocks: Block[] = [];
  loadCalls = 0;
  appendCalls = 0;
  failLoad: LedgerError | null = null;
  failAppend: LedgerError | null = null;

  async load(limit?: number): Promise<Block[]> {
    this.loadCalls++;
    if (this.failLoad) throw this.failLoad;
    return limit === undefined ? [...this.blocks] : this.blocks.slice(-limit);
  }

  async loadAfter(index: number): Promise<Block[]> {
    return this.blocks.filter((block) => block.index > index);
  }

  async append(block: Block): Promise<Block> {
    this.appendCalls++;
    if (this.failAppend) throw this.failAppend;
    const tail = this.blocks[this.blocks.length - 1];
    const expectedIndex = tail ? tail.index + 1 : 1;
    if (block.index !== expectedIndex) {
      throw new ConcurrentAppendConflict(`Block ${block.index} does not extend the stored tail`, block.index);
    }
    this.blocks.push(block);
    return block;
  }

  close(): void {}
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    DATABASE_PATH: ':memory:',
    PORT: 0,
    HOST: '127.0.0.1',
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    TRACKED_TABLES_PATH: 'config/tracked-tables.json',
    LEDGER_STORE_TIMEOUT_MS: 1000,
    LEDGER_APPEND_RETRY_COUNT: 3,
    LEDGER_BREAKER_FAILURE_THRESHOLD: 5,
    LEDGER_BREAKER_RESET_TIMEOUT_MS: 30000,
    SYNC_BATCH_SIZE: 100,
    SYNC_MAX_PAGES: 50,
    SYNC_INTERVAL_MS: 0,
    ...overrides,
  };
}
