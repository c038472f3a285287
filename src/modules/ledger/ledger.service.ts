// src/modules/ledger/ledger.service.ts

import type { FastifyBaseLogger } from 'fastify';
import type { ChainBuilder } from './chain.service.js';
import { hashRowWithFallback, type RowHashOutcome } from './hasher.js';
import { toLedgerError } from './ledger.errors.js';
import type { AttestationOutcome, RowMutation } from './types/ledger.types.js';

/**
 * @fileoverview Entry point for row mutation notifications from the
 * application layer.
 */

/**
 * Hashes the mutated row and attests it. Never throws: the row write has
 * already happened and stands whatever the ledger says, so failures are
 * returned and logged as warnings.
 */
export async function attestRow(
  chain: ChainBuilder,
  mutation: RowMutation,
  logger: FastifyBaseLogger
): Promise<AttestationOutcome> {
  const { tableName, recordId, columns, values } = mutation;

  let hashed: RowHashOutcome;
  try {
    hashed = hashRowWithFallback(tableName, values, columns);
  } catch (error) {
    const ledgerError = toLedgerError(error);
    logger.warn({ err: ledgerError, tableName, recordId }, 'Row could not be hashed; mutation left unattested');
    return { dataHash: '', degraded: true, result: { ok: false, error: ledgerError } };
  }

  if (hashed.degraded) {
    logger.warn({ tableName, recordId, reason: hashed.reason }, 'Row hashed with loose fallback representation');
  }

  const result = await chain.addBlock(tableName, recordId, hashed.hash);
  if (!result.ok) {
    logger.warn({ err: result.error, tableName, recordId }, 'Attestation failed; primary mutation stands');
  }

  return { dataHash: hashed.hash, degraded: hashed.degraded, result };
}
