import type Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from './config/validation.js';
import { loadTrackedTables } from './config/trackedTables.js';
import { openDatabase, runMigrations } from './lib/database.js';
import { ChainBuilder } from './modules/ledger/chain.service.js';
import { type LedgerStore, SqliteLedgerStore } from './modules/ledger/ledger.store.js';
import { ResilientLedgerStore } from './modules/ledger/resilient.store.js';
import { Reconciler } from './modules/reconciliation/reconciliation.service.js';
import { type RowSource, SqliteRowSource } from './modules/reconciliation/row-source.js';
import type { TrackedTable } from './modules/reconciliation/types/reconciliation.types.js';

/**
 * Process-scoped services shared by every request handler. One per process,
 * independent of any client session.
 */
export interface AppContext {
  config: AppConfig;
  db: Database.Database;
  store: LedgerStore;
  chain: ChainBuilder;
  reconciler: Reconciler;
  trackedTables: TrackedTable[];
  close(): void;
}

/**
 * Replacement collaborators, for tests and embedding applications.
 */
export interface AppContextOverrides {
  db?: Database.Database;
  store?: LedgerStore;
  rowSource?: RowSource;
  trackedTables?: TrackedTable[];
  now?: () => Date;
}

/**
 * Opens the database, runs the ledger migrations and wires the ledger
 * services together.
 */
export function createAppContext(
  config: AppConfig,
  logger: FastifyBaseLogger,
  overrides: AppContextOverrides = {}
): AppContext {
  const trackedTables = overrides.trackedTables ?? loadTrackedTables(config.TRACKED_TABLES_PATH);
  const db = overrides.db ?? openDatabase(config.DATABASE_PATH, config.LEDGER_STORE_TIMEOUT_MS);
  runMigrations(db, logger);

  const store =
    overrides.store ??
    new ResilientLedgerStore(
      new SqliteLedgerStore(db),
      {
        timeoutMs: config.LEDGER_STORE_TIMEOUT_MS,
        failureThreshold: config.LEDGER_BREAKER_FAILURE_THRESHOLD,
        resetTimeoutMs: config.LEDGER_BREAKER_RESET_TIMEOUT_MS,
      },
      logger
    );

  const chain = new ChainBuilder({
    store,
    logger,
    maxAppendRetries: config.LEDGER_APPEND_RETRY_COUNT,
    now: overrides.now,
  });

  const reconciler = new Reconciler({
    chain,
    rowSource: overrides.rowSource ?? new SqliteRowSource(db),
    db,
    logger,
    batchSize: config.SYNC_BATCH_SIZE,
    maxPages: config.SYNC_MAX_PAGES,
    now: overrides.now,
  });

  return {
    config,
    db,
    store,
    chain,
    reconciler,
    trackedTables,
    close() {
      reconciler.stopPolling();
      store.close();
      if (db.open) {
        db.close();
      }
    },
  };
}
