import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import { FailedTablesSchema } from '../../lib/schemas.js';
import type { ChainBuilder } from '../ledger/chain.service.js';
import { hashRowWithFallback } from '../ledger/hasher.js';
import { LedgerError } from '../ledger/ledger.errors.js';
import type { RowSource } from './row-source.js';
import type {
  FailedTable,
  PaginatedSyncRuns,
  SyncRun,
  SyncStatus,
  SyncSummary,
  TrackedTable,
} from './types/reconciliation.types.js';

/**
 * @fileoverview Backfills ledger blocks for rows that predate ledger adoption
 * or were written while attestation was failing.
 */

export interface ReconcilerOptions {
  chain: ChainBuilder;
  rowSource: RowSource;
  db: Database.Database;
  logger: FastifyBaseLogger;
  /** Rows read per page. */
  batchSize?: number;
  /** Pages read per table per run. */
  maxPages?: number;
  now?: () => Date;
}

export type SyncListener = (summary: SyncSummary) => void;

interface TableTally {
  processed: number;
  newlyAttested: number;
  degraded: number;
}

class TableSyncError extends Error {
  constructor(
    public readonly underlying: unknown,
    public readonly tally: TableTally
  ) {
    super(underlying instanceof Error ? underlying.message : String(underlying));
  }
}

function runToSummary(run: SyncRun): SyncSummary {
  return {
    runId: run.id,
    status: run.status,
    processed: run.processed,
    newlyAttested: run.newly_attested,
    degraded: run.degraded,
    failedTables: FailedTablesSchema.parse(JSON.parse(run.failed_tables_json)),
    startedAt: run.started_at,
    finishedAt: run.finished_at,
  };
}

export class Reconciler {
  private readonly chain: ChainBuilder;
  private readonly rowSource: RowSource;
  private readonly db: Database.Database;
  private readonly logger: FastifyBaseLogger;
  private readonly batchSize: number;
  private readonly maxPages: number;
  private readonly now: () => Date;

  private pollingInterval: NodeJS.Timeout | null = null;
  private running: Promise<SyncSummary> | null = null;
  private listeners = new Set<SyncListener>();

  constructor(options: ReconcilerOptions) {
    this.chain = options.chain;
    this.rowSource = options.rowSource;
    this.db = options.db;
    this.logger = options.logger.child({ module: 'reconciliation' });
    this.batchSize = options.batchSize ?? 100;
    this.maxPages = options.maxPages ?? 50;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Attests every row of `trackedTables` that the chain does not already
   * attest with its current hash. A failing table is recorded and skipped.
   */
  async sync(trackedTables: readonly TrackedTable[]): Promise<SyncSummary> {
    const startedAt = this.now().toISOString();
    const totals: TableTally = { processed: 0, newlyAttested: 0, degraded: 0 };
    const failedTables: FailedTable[] = [];

    this.logger.info({ tables: trackedTables.length }, 'Reconciliation run started.');

    const readiness = await this.chain.ready();
    if (!readiness.ok) {
      const { code, message } = readiness.error;
      for (const table of trackedTables) {
        failedTables.push({ table: table.name, code, message });
      }
      this.logger.warn({ err: readiness.error }, 'Ledger chain could not be loaded; no table reconciled');
    }

    for (const table of readiness.ok ? trackedTables : []) {
      try {
        const tally = await this.syncTable(table);
        totals.processed += tally.processed;
        totals.newlyAttested += tally.newlyAttested;
        totals.degraded += tally.degraded;
      } catch (error) {
        let underlying = error;
        if (error instanceof TableSyncError) {
          underlying = error.underlying;
          totals.processed += error.tally.processed;
          totals.newlyAttested += error.tally.newlyAttested;
          totals.degraded += error.tally.degraded;
        }
        const code = underlying instanceof LedgerError ? underlying.code : 'TABLE_SYNC_FAILED';
        const message = underlying instanceof Error ? underlying.message : String(underlying);
        failedTables.push({ table: table.name, code, message });
        this.logger.warn({ table: table.name, code, err: underlying }, 'Could not process tracked table');
      }
    }

    const status: SyncStatus = failedTables.length > 0 ? 'partial' : totals.newlyAttested > 0 ? 'attested' : 'clean';
    const summary: SyncSummary = {
      runId: randomUUID(),
      status,
      ...totals,
      failedTables,
      startedAt,
      finishedAt: this.now().toISOString(),
    };

    this.recordRun(summary);
    this.logger.info(
      { processed: summary.processed, newlyAttested: summary.newlyAttested, failed: failedTables.length },
      'Reconciliation run completed.'
    );
    for (const listener of this.listeners) {
      try {
        listener(summary);
      } catch (error) {
        this.logger.error({ err: error, runId: summary.runId }, 'Sync listener threw');
      }
    }
    return summary;
  }

  private async syncTable(table: TrackedTable): Promise<TableTally> {
    const tally: TableTally = { processed: 0, newlyAttested: 0, degraded: 0 };

    try {
      for (let page = 0; page < this.maxPages; page++) {
        const rows = await this.rowSource.fetchRows(table, this.batchSize, page * this.batchSize);

        for (const row of rows) {
          const recordId = row[0];
          if (typeof recordId !== 'string' && typeof recordId !== 'number' && typeof recordId !== 'bigint') {
            throw new Error(`Row of ${table.name} has no usable primary key in ${table.columns[0]}`);
          }
          const id = typeof recordId === 'bigint' ? recordId.toString() : recordId;

          const hashed = hashRowWithFallback(table.name, row, table.columns);
          if (hashed.degraded) {
            tally.degraded++;
            this.logger.warn({ table: table.name, recordId: id, reason: hashed.reason }, 'Row hashed with fallback');
          }

          const result = await this.chain.addBlockIfAbsent(table.name, id, hashed.hash);
          if (!result.ok) throw result.error;
          if (result.value) tally.newlyAttested++;
          tally.processed++;
        }

        if (rows.length < this.batchSize) return tally;
      }

      this.logger.warn({ table: table.name, maxPages: this.maxPages }, 'Page limit reached; remaining rows left for the next run');
      return tally;
    } catch (error) {
      throw new TableSyncError(error, tally);
    }
  }

  private recordRun(summary: SyncSummary): void {
    try {
      this.db
        .prepare(
          `INSERT INTO sync_run (id, started_at, finished_at, status, processed, newly_attested, degraded, failed_tables_json)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          summary.runId,
          summary.startedAt,
          summary.finishedAt,
          summary.status,
          summary.processed,
          summary.newlyAttested,
          summary.degraded,
          JSON.stringify(summary.failedTables)
        );
    } catch (error) {
      // history is best effort; the run's blocks are already committed
      this.logger.error({ err: error, runId: summary.runId }, 'Could not record reconciliation run');
    }
  }

  /**
   * Runs `sync` unless one is already in progress, in which case the
   * in-flight run is returned.
   */
  syncOnce(trackedTables: readonly TrackedTable[]): Promise<SyncSummary> {
    if (!this.running) {
      this.running = this.sync(trackedTables).finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  onSync(listener: SyncListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  startPolling(trackedTables: readonly TrackedTable[], intervalMs: number): void {
    if (this.pollingInterval || intervalMs <= 0) return;
    this.pollingInterval = setInterval(() => {
      if (this.running) {
        this.logger.debug('Previous reconciliation still running; skipping tick');
        return;
      }
      this.syncOnce(trackedTables).catch((error: unknown) => {
        this.logger.error({ err: error }, 'Error during reconciliation poll');
      });
    }, intervalMs);
    this.pollingInterval.unref();
    this.logger.info({ intervalMs }, 'Reconciliation polling started.');
  }

  stopPolling(): void {
    if (this.pollingInterval) {
      clearInterval(this.pollingInterval);
      this.pollingInterval = null;
    }
  }

  listRuns(query: { page: number; limit: number; sortOrder: 'asc' | 'desc' }): PaginatedSyncRuns {
    const { page, limit } = query;
    const sortOrder = query.sortOrder === 'asc' ? 'ASC' : 'DESC';
    const offset = (page - 1) * limit;

    const totalResult = this.db.prepare<[], { count: number }>('SELECT count(*) as count FROM sync_run').get();
    const total = totalResult?.count ?? 0;

    const data = this.db
      .prepare<[number, number], SyncRun>(`SELECT * FROM sync_run ORDER BY started_at ${sortOrder}, rowid ${sortOrder} LIMIT ? OFFSET ?`)
      .all(limit, offset)
      .map(runToSummary);

    return {
      data,
      meta: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }
}
