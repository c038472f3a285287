// src/modules/ledger/chain.service.ts

import type { FastifyBaseLogger } from 'fastify';
import { computeBlockHash, GENESIS_PREVIOUS_HASH, HASH_ALGORITHM, isHexDigest } from './hasher.js';
import {
  ConcurrentAppendConflict,
  IntegrityViolation,
  InvalidBlockError,
  type LedgerError,
  toLedgerError,
} from './ledger.errors.js';
import type { LedgerStore } from './ledger.store.js';
import type {
  Block,
  ChainState,
  ChainStats,
  IntegrityReport,
  LedgerResult,
  RecordId,
} from './types/ledger.types.js';

/**
 * @fileoverview The chain builder: sole owner of the in-memory chain and the
 * only component allowed to append blocks.
 */

export interface ChainBuilderOptions {
  store: LedgerStore;
  logger: FastifyBaseLogger;
  /** Extra attempts after an append lost a race with another writer. */
  maxAppendRetries?: number;
  now?: () => Date;
}

export type BlockListener = (block: Block) => void;

function recordKey(tableName: string, recordId: RecordId): string {
  return `${tableName}\u0000${String(recordId)}`;
}

function checkBlockFields(tableName: string, recordId: RecordId, dataHash: string): InvalidBlockError | null {
  if (!tableName) return new InvalidBlockError('Table name must not be empty', 'tableName');
  if (String(recordId) === '') return new InvalidBlockError('Record id must not be empty', 'recordId');
  if (!isHexDigest(dataHash)) {
    return new InvalidBlockError('Data hash must be 64 lowercase hex characters', 'dataHash');
  }
  return null;
}

function fail<T>(error: LedgerError): LedgerResult<T> {
  return { ok: false, error };
}

/**
 * Checks linkage and block hashes of `blocks`, which must start at index
 * `firstIndex` and follow `previousHash`.
 */
export function validateBlocks(
  blocks: readonly Block[],
  previousHash: string = GENESIS_PREVIOUS_HASH,
  firstIndex = 1
): IntegrityReport {
  let expectedPrevious = previousHash;

  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i];
    const expectedIndex = firstIndex + i;
    const length = firstIndex - 1 + blocks.length;

    if (block.index !== expectedIndex) {
      return {
        valid: false,
        length,
        brokenAt: expectedIndex,
        reason: 'index_gap',
        expected: String(expectedIndex),
        actual: String(block.index),
      };
    }
    if (block.previousHash !== expectedPrevious) {
      return {
        valid: false,
        length,
        brokenAt: block.index,
        reason: 'previous_hash_mismatch',
        expected: expectedPrevious,
        actual: block.previousHash,
      };
    }
    const recomputed = computeBlockHash(block.index, block.previousHash, block.dataHash);
    if (block.blockHash !== recomputed) {
      return {
        valid: false,
        length,
        brokenAt: block.index,
        reason: 'block_hash_mismatch',
        expected: recomputed,
        actual: block.blockHash,
      };
    }
    expectedPrevious = block.blockHash;
  }

  return { valid: true, length: firstIndex - 1 + blocks.length };
}

export function violationOf(report: IntegrityReport): IntegrityViolation | null {
  if (report.valid) return null;
  return new IntegrityViolation(
    `Chain integrity broken at block ${report.brokenAt}: ${report.reason}`,
    report.brokenAt,
    report.reason
  );
}

export class ChainBuilder {
  private readonly store: LedgerStore;
  private readonly logger: FastifyBaseLogger;
  private readonly maxAppendRetries: number;
  private readonly now: () => Date;

  private chain: Block[] = [];
  /** (table, record) → every data hash ever attested for it */
  private attested = new Map<string, Set<string>>();
  /** (table, record) → most recent block for it */
  private latest = new Map<string, Block>();

  private state: ChainState = 'uninitialized';
  private initializing: Promise<LedgerResult<void>> | null = null;
  private appendQueue: Promise<unknown> = Promise.resolve();
  private listeners = new Set<BlockListener>();

  constructor(options: ChainBuilderOptions) {
    this.store = options.store;
    this.logger = options.logger.child({ module: 'ledger' });
    this.maxAppendRetries = options.maxAppendRetries ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads the persisted chain on first call. Later calls return at once;
   * concurrent first calls share one load. A failed load can be retried.
   */
  ready(): Promise<LedgerResult<void>> {
    if (this.state === 'ready') return Promise.resolve({ ok: true, value: undefined });
    if (!this.initializing) {
      this.initializing = this.loadChain().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async loadChain(): Promise<LedgerResult<void>> {
    try {
      const blocks = await this.store.load();
      this.reset(blocks);
      this.state = 'ready';

      const violation = violationOf(validateBlocks(this.chain));
      if (violation) {
        this.logger.error({ err: violation, metadata: violation.metadata }, 'Persisted ledger failed integrity check');
      }
      this.logger.info({ blocks: this.chain.length }, 'Ledger chain loaded.');
      return { ok: true, value: undefined };
    } catch (error) {
      const ledgerError = toLedgerError(error);
      this.logger.error({ err: ledgerError }, 'Failed to load ledger chain');
      return fail(ledgerError);
    }
  }

  private reset(blocks: Block[]): void {
    this.chain = [];
    this.attested = new Map();
    this.latest = new Map();
    for (const block of blocks) {
      this.push(block);
    }
  }

  /** Makes `block` visible to readers. Synchronous so no reader sees half of it. */
  private push(block: Block): void {
    const key = recordKey(block.tableName, block.recordId);
    this.chain.push(block);
    let hashes = this.attested.get(key);
    if (!hashes) {
      hashes = new Set();
      this.attested.set(key, hashes);
    }
    hashes.add(block.dataHash);
    this.latest.set(key, block);
  }

  private tail(): Block | undefined {
    return this.chain[this.chain.length - 1];
  }

  /** Runs `task` after every append queued before it has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.appendQueue.then(task, task);
    this.appendQueue = run.catch(() => undefined);
    return run;
  }

  /**
   * Appends a block attesting `dataHash` for the given record.
   * In-memory state changes only after the store accepted the block.
   */
  async addBlock(tableName: string, recordId: RecordId, dataHash: string): Promise<LedgerResult<Block>> {
    const invalid = checkBlockFields(tableName, recordId, dataHash);
    if (invalid) return fail(invalid);

    const readiness = await this.ready();
    if (!readiness.ok) return fail(readiness.error);

    return this.exclusive(() => this.appendWithRetry(tableName, recordId, dataHash, false));
  }

  /**
   * Appends a block unless some block already attests `dataHash` for the
   * record. The check runs inside the append critical section, so
   * overlapping callers attest a hash once. Resolves to null when nothing
   * was appended.
   */
  async addBlockIfAbsent(tableName: string, recordId: RecordId, dataHash: string): Promise<LedgerResult<Block | null>> {
    const invalid = checkBlockFields(tableName, recordId, dataHash);
    if (invalid) return fail(invalid);

    const readiness = await this.ready();
    if (!readiness.ok) return fail(readiness.error);

    return this.exclusive(() => this.appendWithRetry(tableName, recordId, dataHash, true));
  }

  private appendWithRetry(
    tableName: string,
    recordId: RecordId,
    dataHash: string,
    skipIfAttested: false
  ): Promise<LedgerResult<Block>>;
  private appendWithRetry(
    tableName: string,
    recordId: RecordId,
    dataHash: string,
    skipIfAttested: boolean
  ): Promise<LedgerResult<Block | null>>;
  private async appendWithRetry(
    tableName: string,
    recordId: RecordId,
    dataHash: string,
    skipIfAttested: boolean
  ): Promise<LedgerResult<Block | null>> {
    for (let attempt = 0; ; attempt++) {
      if (skipIfAttested && this.verify(tableName, recordId, dataHash)) {
        return { ok: true, value: null };
      }

      const previous = this.tail();
      const index = previous ? previous.index + 1 : 1;
      const previousHash = previous ? previous.blockHash : GENESIS_PREVIOUS_HASH;

      const draft: Block = {
        index,
        tableName,
        recordId,
        dataHash,
        previousHash,
        blockHash: computeBlockHash(index, previousHash, dataHash),
        createdAt: this.now().toISOString(),
      };

      try {
        const block = await this.store.append(draft);
        this.push(block);
        this.logger.debug({ index: block.index, tableName, recordId: block.recordId }, 'Block appended');
        this.notify(block);
        return { ok: true, value: block };
      } catch (error) {
        const ledgerError = toLedgerError(error);

        if (!(ledgerError instanceof ConcurrentAppendConflict) || attempt >= this.maxAppendRetries) {
          this.logger.warn({ err: ledgerError, tableName, recordId, index }, 'Block append failed');
          return fail(ledgerError);
        }

        this.logger.warn({ attempt: attempt + 1, index }, 'Append lost a race with another writer; catching up');
        const caughtUp = await this.catchUp();
        if (!caughtUp.ok) return fail(caughtUp.error);
      }
    }
  }

  /** Pulls blocks appended by other writers onto the in-memory tail. */
  private async catchUp(): Promise<LedgerResult<void>> {
    const previous = this.tail();
    try {
      const newer = await this.store.loadAfter(previous?.index ?? 0);
      const report = validateBlocks(newer, previous?.blockHash ?? GENESIS_PREVIOUS_HASH, (previous?.index ?? 0) + 1);
      const violation = violationOf(report);
      if (violation) {
        this.logger.error({ err: violation, metadata: violation.metadata }, 'Blocks from another writer break the chain');
        return fail(violation);
      }
      for (const block of newer) {
        this.push(block);
        this.notify(block);
      }
      return { ok: true, value: undefined };
    } catch (error) {
      return fail(toLedgerError(error));
    }
  }

  private notify(block: Block): void {
    for (const listener of this.listeners) {
      try {
        listener(block);
      } catch (error) {
        this.logger.error({ err: error }, 'Block listener threw');
      }
    }
  }

  onBlock(listener: BlockListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * True iff some block attests exactly this hash for this record.
   * Record ids compare as strings, so 7 and "7" are the same record.
   * Reads the loaded chain only: before `ready()` resolved it answers false.
   * Use `verifyAttested` when the chain may not be loaded yet.
   */
  verify(tableName: string, recordId: RecordId, dataHash: string): boolean {
    return this.attested.get(recordKey(tableName, recordId))?.has(dataHash) ?? false;
  }

  /**
   * `verify` after loading the chain.
   */
  async verifyAttested(tableName: string, recordId: RecordId, dataHash: string): Promise<LedgerResult<boolean>> {
    const readiness = await this.ready();
    if (!readiness.ok) return fail(readiness.error);
    return { ok: true, value: this.verify(tableName, recordId, dataHash) };
  }

  latestAttestation(tableName: string, recordId: RecordId): Block | undefined {
    return this.latest.get(recordKey(tableName, recordId));
  }

  /** True iff the most recent attestation of the record carries `dataHash`. */
  isCurrent(tableName: string, recordId: RecordId, dataHash: string): boolean {
    return this.latestAttestation(tableName, recordId)?.dataHash === dataHash;
  }

  getRecentBlocks(n: number): Block[] {
    if (!Number.isFinite(n) || n <= 0) return [];
    return this.chain.slice(-Math.floor(n));
  }

  validateChainIntegrity(): IntegrityReport {
    return validateBlocks(this.chain);
  }

  /**
   * Re-reads the persisted chain and validates it. Catches edits made to the
   * stored rows behind this process's back.
   */
  async auditStore(): Promise<LedgerResult<IntegrityReport>> {
    try {
      const report = validateBlocks(await this.store.load());
      const violation = violationOf(report);
      if (violation) {
        this.logger.error({ err: violation, metadata: violation.metadata }, 'Stored ledger failed integrity audit');
      }
      return { ok: true, value: report };
    } catch (error) {
      return fail(toLedgerError(error));
    }
  }

  get length(): number {
    return this.chain.length;
  }

  stats(): ChainStats {
    const tail = this.tail();
    return {
      state: this.state,
      length: this.chain.length,
      tailIndex: tail?.index ?? 0,
      tailHash: tail?.blockHash ?? GENESIS_PREVIOUS_HASH,
      algorithm: HASH_ALGORITHM,
    };
  }
}
