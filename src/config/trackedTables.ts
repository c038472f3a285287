import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { TrackedTablesFileSchema } from '../lib/schemas.js';
import type { TrackedTable } from '../modules/reconciliation/types/reconciliation.types.js';

/**
 * Reads the list of tracked tables supplied by the application layer.
 * The ledger never discovers schemas itself; column order comes from here.
 *
 * @param filePath - Relative paths resolve against the working directory.
 * @throws {Error} If the file is missing, is not JSON, or fails validation.
 */
export function loadTrackedTables(filePath: string): TrackedTable[] {
  const absolute = resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read tracked tables from ${absolute}: ${reason}`);
  }

  const parsed = TrackedTablesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid tracked tables file ${absolute}:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}
