import Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import {
  ledgerNoDeleteTrigger,
  ledgerNoUpdateTrigger,
  ledgerRecordIndex,
  ledgerTable,
} from '../modules/ledger/schemas/ledger.schema.js';
import { syncRunAppendOnlyTrigger, syncRunTable } from '../modules/reconciliation/schemas/reconciliation.schema.js';

/**
 * Opens the records database.
 * @param dbPath - File path, or ':memory:' for tests.
 * @param busyTimeoutMs - How long a statement waits on a locked database before failing.
 */
export function openDatabase(dbPath: string, busyTimeoutMs: number): Database.Database {
  const db = new Database(dbPath, { timeout: busyTimeoutMs });
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

const migrations = [
  ledgerTable,
  ledgerRecordIndex,
  ledgerNoUpdateTrigger,
  ledgerNoDeleteTrigger,
  syncRunTable,
  syncRunAppendOnlyTrigger,
];

/**
 * Creates the ledger and sync history tables. Run once at startup, never on
 * the append path.
 */
export function runMigrations(db: Database.Database, logger?: FastifyBaseLogger): void {
  db.transaction(() => {
    for (const statement of migrations) {
      db.exec(statement);
    }
  })();
  logger?.info('Ledger schema ready.');
}
