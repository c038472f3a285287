// src/modules/ledger/ledger.errors.ts

/**
 * @fileoverview Error taxonomy of the integrity ledger.
 * Every failure a ledger operation can report is one of these classes, so the
 * application layer and the HTTP layer can switch on `code`.
 */

export abstract class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The backing store is unreachable, closed, locked past its busy timeout, or
 * the call timed out in the circuit breaker.
 */
export class ConnectivityError extends LedgerError {
  constructor(message: string, underlying?: unknown) {
    super(message, 'LEDGER_UNREACHABLE', { underlying: describeUnderlying(underlying) });
  }
}

/**
 * A row value has no canonical serialization.
 */
export class SerializationError extends LedgerError {
  constructor(message: string, column: string) {
    super(message, 'ROW_SERIALIZATION_FAILED', { column });
  }
}

/**
 * A block's stored hash or its linkage does not match what is recomputed.
 */
export class IntegrityViolation extends LedgerError {
  constructor(message: string, blockIndex: number, reason: string) {
    super(message, 'CHAIN_INTEGRITY_VIOLATION', { blockIndex, reason });
  }
}

/**
 * Another writer extended the chain between reading the tail and appending.
 */
export class ConcurrentAppendConflict extends LedgerError {
  constructor(message: string, attemptedIndex: number, storeTailIndex?: number) {
    super(message, 'CONCURRENT_APPEND_CONFLICT', { attemptedIndex, storeTailIndex });
  }
}

/**
 * Caller error: columns and values do not describe a row.
 */
export class InvalidRowError extends LedgerError {
  constructor(message: string, tableName: string) {
    super(message, 'INVALID_ROW', { tableName });
  }
}

/**
 * Caller error: the block fields handed to addBlock are unusable.
 */
export class InvalidBlockError extends LedgerError {
  constructor(message: string, field: string) {
    super(message, 'INVALID_BLOCK', { field });
  }
}

/**
 * Any other failure reported by the backing store.
 */
export class LedgerStoreError extends LedgerError {
  constructor(message: string, underlying?: unknown) {
    super(message, 'LEDGER_STORE_FAILURE', { underlying: describeUnderlying(underlying) });
  }
}

function describeUnderlying(underlying: unknown): string | undefined {
  if (underlying === undefined) return undefined;
  return underlying instanceof Error ? underlying.message : String(underlying);
}

/**
 * Wraps anything thrown below the ledger boundary into a LedgerError.
 */
export function toLedgerError(error: unknown): LedgerError {
  if (error instanceof LedgerError) return error;
  const message = error instanceof Error ? error.message : 'Unknown ledger failure';
  return new LedgerStoreError(message, error);
}
