// src/modules/reconciliation/row-source.ts

import type Database from 'better-sqlite3';
import type { TrackedTable } from './types/reconciliation.types.js';

/**
 * Reads tracked table rows for the reconciler. Values come back in
 * `table.columns` order.
 */
export interface RowSource {
  fetchRows(table: TrackedTable, limit: number, offset: number): Promise<unknown[][]>;
}

export const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Refusing to query unsafe identifier: ${name}`);
  }
  return `"${name}"`;
}

export class SqliteRowSource implements RowSource {
  constructor(private readonly db: Database.Database) {}

  async fetchRows(table: TrackedTable, limit: number, offset: number): Promise<unknown[][]> {
    const columns = table.columns.map(quoteIdentifier);
    const sql = `SELECT ${columns.join(', ')} FROM ${quoteIdentifier(table.name)} ORDER BY ${columns[0]} LIMIT ? OFFSET ?`;

    return this.db.prepare<[number, number], unknown[]>(sql).raw(true).all(limit, offset);
  }
}
