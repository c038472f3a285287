// src/modules/ledger/resilient.store.ts

import type { EventEmitter } from 'node:events';
import CircuitBreaker from 'opossum';
import type { FastifyBaseLogger } from 'fastify';
import { ConcurrentAppendConflict, ConnectivityError, LedgerError, toLedgerError } from './ledger.errors.js';
import type { LedgerStore } from './ledger.store.js';
import type { Block } from './types/ledger.types.js';

export interface ResilienceOptions {
  /** Per-call timeout in ms. */
  timeoutMs: number;
  /** Minimum number of calls in the rolling window before the circuit may open. */
  failureThreshold: number;
  /** How long the circuit stays open before a trial call. */
  resetTimeoutMs: number;
}

function hasCode(error: unknown): error is { code: unknown } {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Converts breaker rejections into ledger errors.
 */
function toStoreFailure(error: unknown, operation: string): LedgerError {
  if (error instanceof LedgerError) return error;
  if (hasCode(error) && error.code === 'ETIMEDOUT') {
    return new ConnectivityError(`Ledger store timed out during ${operation}`, error);
  }
  if (hasCode(error) && error.code === 'EOPENBREAKER') {
    return new ConnectivityError(`Ledger store circuit is open; ${operation} rejected`, error);
  }
  return toLedgerError(error);
}

/**
 * Bounds every call into a LedgerStore with a timeout and fails fast once the
 * store keeps failing. Append conflicts are normal control flow and are not
 * counted as failures.
 */
export class ResilientLedgerStore implements LedgerStore {
  private readonly loadBreaker: CircuitBreaker<[number | undefined], Block[]>;
  private readonly loadAfterBreaker: CircuitBreaker<[number], Block[]>;
  private readonly appendBreaker: CircuitBreaker<[Block], Block>;

  constructor(
    private readonly inner: LedgerStore,
    options: ResilienceOptions,
    private readonly logger: FastifyBaseLogger
  ) {
    const breakerOptions: CircuitBreaker.Options = {
      timeout: options.timeoutMs,
      // trip once every call in the window failed
      errorThresholdPercentage: 99,
      volumeThreshold: options.failureThreshold,
      resetTimeout: options.resetTimeoutMs,
      errorFilter: (err: unknown) => err instanceof ConcurrentAppendConflict,
    };

    this.loadBreaker = new CircuitBreaker((limit: number | undefined) => inner.load(limit), breakerOptions);
    this.loadAfterBreaker = new CircuitBreaker((index: number) => inner.loadAfter(index), breakerOptions);
    this.appendBreaker = new CircuitBreaker((block: Block) => inner.append(block), breakerOptions);

    this.watch('load', this.loadBreaker);
    this.watch('loadAfter', this.loadAfterBreaker);
    this.watch('append', this.appendBreaker);
  }

  private watch(operation: string, breaker: EventEmitter): void {
    breaker.on('open', () => this.logger.error(`[LedgerStore-CircuitBreaker] ${operation} circuit is now OPEN.`));
    breaker.on('halfOpen', () => this.logger.warn(`[LedgerStore-CircuitBreaker] ${operation} circuit is now HALF-OPEN.`));
    breaker.on('close', () => this.logger.info(`[LedgerStore-CircuitBreaker] ${operation} circuit is now CLOSED.`));
    breaker.on('timeout', () => this.logger.warn(`[LedgerStore-CircuitBreaker] ${operation} timed out.`));
  }

  async load(limit?: number): Promise<Block[]> {
    try {
      return await this.loadBreaker.fire(limit);
    } catch (error) {
      throw toStoreFailure(error, 'load');
    }
  }

  async loadAfter(index: number): Promise<Block[]> {
    try {
      return await this.loadAfterBreaker.fire(index);
    } catch (error) {
      throw toStoreFailure(error, 'loadAfter');
    }
  }

  async append(block: Block): Promise<Block> {
    try {
      return await this.appendBreaker.fire(block);
    } catch (error) {
      throw toStoreFailure(error, 'append');
    }
  }

  close(): void {
    this.loadBreaker.shutdown();
    this.loadAfterBreaker.shutdown();
    this.appendBreaker.shutdown();
    this.inner.close();
  }
}
