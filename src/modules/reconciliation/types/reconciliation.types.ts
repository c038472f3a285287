// src/modules/reconciliation/types/reconciliation.types.ts

/**
 * A table whose row mutations are attested. The first column is the
 * primary key and becomes the block's record id.
 */
export interface TrackedTable {
  name: string;
  columns: string[];
}

export type SyncStatus = 'clean' | 'attested' | 'partial';

export interface FailedTable {
  table: string;
  code: string;
  message: string;
}

export interface SyncSummary {
  runId: string;
  status: SyncStatus;
  processed: number;
  newlyAttested: number;
  degraded: number;
  failedTables: FailedTable[];
  startedAt: string;
  finishedAt: string;
}

export interface SyncRun {
  id: string;
  started_at: string;
  finished_at: string;
  status: SyncStatus;
  processed: number;
  newly_attested: number;
  degraded: number;
  failed_tables_json: string;
}

export interface PaginatedSyncRuns {
  data: SyncSummary[];
  meta: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}
