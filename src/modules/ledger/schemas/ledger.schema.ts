// src/modules/ledger/schemas/ledger.schema.ts

export const LEDGER_TABLE = 'blockchain';

export const ledgerTable = `
CREATE TABLE IF NOT EXISTS blockchain (
  block_index INTEGER PRIMARY KEY CHECK(block_index > 0),
  table_name TEXT NOT NULL,
  record_id TEXT NOT NULL,
  data_hash TEXT NOT NULL CHECK(length(data_hash) = 64),
  block_hash TEXT NOT NULL UNIQUE CHECK(length(block_hash) = 64),
  previous_hash TEXT NOT NULL,
  created_at TEXT
);
`;

export const ledgerRecordIndex = `
CREATE INDEX IF NOT EXISTS blockchain_record_idx ON blockchain (table_name, record_id);
`;

export const ledgerNoUpdateTrigger = `
CREATE TRIGGER IF NOT EXISTS blockchain_no_update
BEFORE UPDATE ON blockchain
BEGIN
  SELECT RAISE(ABORT, 'Ledger blocks are immutable');
END;
`;

export const ledgerNoDeleteTrigger = `
CREATE TRIGGER IF NOT EXISTS blockchain_no_delete
BEFORE DELETE ON blockchain
BEGIN
  SELECT RAISE(ABORT, 'Ledger blocks cannot be deleted');
END;
`;
