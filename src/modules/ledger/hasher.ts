// src/modules/ledger/hasher.ts

import { createHash } from 'node:crypto';
import { InvalidRowError, SerializationError } from './ledger.errors.js';

/**
 * @fileoverview Row and block digests.
 *
 * Row hash: SHA-256 over `JSON.stringify([tableName, [[column, value], ...]])`
 * with the pairs sorted by column name. The table name is part of the digest,
 * so identical rows of two tables never share a data hash.
 *
 * Block hash: SHA-256 over `String(index) + previousHash + dataHash`.
 */

export const GENESIS_PREVIOUS_HASH = '0';
export const HASH_ALGORITHM = 'SHA-256';

const HEX_DIGEST = /^[0-9a-f]{64}$/;

type CanonicalValue = string | number | boolean | null;

export function sha256Hex(payload: string): string {
  return createHash('sha256').update(payload, 'utf8').digest('hex');
}

export function isHexDigest(value: string): boolean {
  return HEX_DIGEST.test(value);
}

function canonicalValue(value: unknown, column: string): CanonicalValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(`Column ${column} holds a non-finite number`, column);
      }
      return value;
    case 'bigint':
      return value.toString();
    case 'object':
      if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
          throw new SerializationError(`Column ${column} holds an invalid date`, column);
        }
        return value.toISOString();
      }
      throw new SerializationError(`Column ${column} holds an unsupported object value`, column);
    default:
      throw new SerializationError(`Column ${column} holds an unsupported ${typeof value} value`, column);
  }
}

/**
 * Builds the canonical text of a row. Throws InvalidRowError on a shape
 * mismatch and SerializationError on a value without canonical form.
 */
export function canonicalRow(tableName: string, values: readonly unknown[], columns: readonly string[]): string {
  if (values.length !== columns.length) {
    throw new InvalidRowError(
      `Row of ${tableName} has ${values.length} values for ${columns.length} columns`,
      tableName
    );
  }
  if (new Set(columns).size !== columns.length) {
    throw new InvalidRowError(`Row of ${tableName} repeats a column name`, tableName);
  }

  const pairs = columns
    .map((column, i): [string, unknown] => [column, values[i]])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([column, value]): [string, CanonicalValue] => [column, canonicalValue(value, column)]);

  return JSON.stringify([tableName, pairs]);
}

export function computeRowHash(tableName: string, values: readonly unknown[], columns: readonly string[]): string {
  return sha256Hex(canonicalRow(tableName, values, columns));
}

export interface RowHashOutcome {
  hash: string;
  degraded: boolean;
  reason?: string;
}

function looseText(value: unknown): string {
  try {
    return String(value);
  } catch {
    // null-prototype objects have no toString
    return Object.prototype.toString.call(value);
  }
}

/**
 * Like computeRowHash, but a value without canonical form degrades to a hash
 * of the loose `table|v1|v2|...` text instead of failing.
 */
export function hashRowWithFallback(
  tableName: string,
  values: readonly unknown[],
  columns: readonly string[]
): RowHashOutcome {
  try {
    return { hash: computeRowHash(tableName, values, columns), degraded: false };
  } catch (error) {
    if (!(error instanceof SerializationError)) throw error;
    const loose = [tableName, ...values.map(looseText)].join('|');
    return { hash: sha256Hex(loose), degraded: true, reason: error.message };
  }
}

export function computeBlockHash(index: number, previousHash: string, dataHash: string): string {
  return sha256Hex(String(index) + previousHash + dataHash);
}
