// src/modules/reconciliation/schemas/reconciliation.schema.ts

export const syncRunTable = `
CREATE TABLE IF NOT EXISTS sync_run (
  id TEXT PRIMARY KEY,
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL,
  status TEXT NOT NULL CHECK(status IN ('clean', 'attested', 'partial')),
  processed INTEGER NOT NULL,
  newly_attested INTEGER NOT NULL,
  degraded INTEGER NOT NULL,
  failed_tables_json TEXT NOT NULL
);
`;

export const syncRunAppendOnlyTrigger = `
CREATE TRIGGER IF NOT EXISTS sync_run_append_only
BEFORE DELETE ON sync_run
BEGIN
  SELECT RAISE(ABORT, 'Sync run history cannot be deleted');
END;
`;
