import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import {
  ConcurrentAppendConflict,
  ConnectivityError,
  InvalidBlockError,
  InvalidRowError,
  type LedgerError,
  SerializationError,
} from '../modules/ledger/ledger.errors.js';
import type { APIError, ApiResponse } from '../types.js';

/**
 * HTTP status for a ledger failure.
 */
export function statusForLedgerError(error: LedgerError): number {
  if (error instanceof InvalidBlockError || error instanceof InvalidRowError || error instanceof SerializationError) {
    return 400;
  }
  if (error instanceof ConcurrentAppendConflict) return 409;
  if (error instanceof ConnectivityError) return 503;
  return 500;
}

export function apiError(
  request: FastifyRequest,
  message: string,
  code: string,
  details?: unknown
): APIError {
  return {
    status: 'error',
    message,
    code,
    timestamp: new Date().toISOString(),
    endpoint: request.url,
    requestId: request.id,
    ...(details !== undefined && { details }),
  };
}

export function success<T>(data: T): ApiResponse<T> {
  return { status: 'success', data, timestamp: new Date().toISOString() };
}

export function sendLedgerError(request: FastifyRequest, reply: FastifyReply, error: LedgerError) {
  const statusCode = statusForLedgerError(error);
  const logLevel = statusCode >= 500 ? 'error' : 'warn';
  request.log[logLevel]({ err: error, requestId: request.id }, `[LedgerError] at ${request.url}`);
  return reply.code(statusCode).send(apiError(request, error.message, error.code, error.metadata));
}

export function sendValidationError(request: FastifyRequest, reply: FastifyReply, error: ZodError) {
  const details = error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  return reply.code(400).send(apiError(request, 'Request validation failed', 'VALIDATION_ERROR', details));
}
