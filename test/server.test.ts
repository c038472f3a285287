import Database from 'better-sqlite3';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type AppContext, createAppContext } from '../src/context.js';
import { statusForLedgerError } from '../src/lib/http.js';
import { computeBlockHash, computeRowHash } from '../src/modules/ledger/hasher.js';
import {
  ConcurrentAppendConflict,
  ConnectivityError,
  InvalidBlockError,
  LedgerStoreError,
} from '../src/modules/ledger/ledger.errors.js';
import { createServer } from '../src/server.js';
import { createPatientsTable, digest, PATIENT_COLUMNS, silentLogger, testConfig } from './helpers.js';

describe('HTTP API', () => {
  let context: AppContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    const db = new Database(':memory:');
    createPatientsTable(db, 2);
    context = createAppContext(testConfig(), silentLogger, {
      db,
      trackedTables: [{ name: 'PATIENTS', columns: PATIENT_COLUMNS }],
    });
    app = await createServer({ context });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    context.close();
  });

  async function addBlock(recordId: number, dataHash: string) {
    return app.inject({
      method: 'POST',
      url: '/ledger/blocks',
      payload: { tableName: 'PATIENTS', recordId, dataHash },
    });
  }

  it('GET /health reports the ledger state', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const payload = response.json();
    expect(payload.status).toBe('healthy');
    expect(payload.checks).toEqual({ database: true, ledger: 'ready', blocks: 0 });
  });

  it('GET /health reports an unreachable database', async () => {
    context.db.close();
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks.database).toBe(false);
  });

  it('GET /info lists the tracked tables', async () => {
    const response = await app.inject({ method: 'GET', url: '/info' });

    expect(response.statusCode).toBe(200);
    expect(response.json().tracked_tables).toEqual(['PATIENTS']);
  });

  it('POST /ledger/blocks appends a block', async () => {
    const dataHash = digest('patient-1');
    const response = await addBlock(1, dataHash);

    expect(response.statusCode).toBe(201);
    const { data } = response.json();
    expect(data.index).toBe(1);
    expect(data.recordId).toBe('1');
    expect(data.previousHash).toBe('0');
    expect(data.blockHash).toBe(computeBlockHash(1, '0', dataHash));
  });

  it('POST /ledger/blocks rejects a malformed data hash', async () => {
    const response = await addBlock(1, 'abc');

    expect(response.statusCode).toBe(400);
    const payload = response.json();
    expect(payload.status).toBe('error');
    expect(payload.code).toBe('VALIDATION_ERROR');
    expect(payload.details[0].path).toBe('dataHash');
  });

  it('POST /ledger/blocks returns 503 when the store is unreachable', async () => {
    context.db.close();
    const response = await addBlock(1, digest('patient-1'));

    expect(response.statusCode).toBe(503);
    expect(response.json().code).toBe('LEDGER_UNREACHABLE');
  });

  it('POST /ledger/verify checks attested and current hashes', async () => {
    const first = digest('v1');
    const second = digest('v2');
    await addBlock(1, first);
    await addBlock(1, second);

    const stale = await app.inject({
      method: 'POST',
      url: '/ledger/verify',
      payload: { tableName: 'PATIENTS', recordId: '1', dataHash: first },
    });
    expect(stale.statusCode).toBe(200);
    expect(stale.json().data.verified).toBe(true);
    expect(stale.json().data.current).toBe(false);
    expect(stale.json().data.latest.index).toBe(2);

    const unknown = await app.inject({
      method: 'POST',
      url: '/ledger/verify',
      payload: { tableName: 'PATIENTS', recordId: 9, dataHash: first },
    });
    expect(unknown.json().data).toEqual({ verified: false, current: false, latest: null });
  });

  it('GET /ledger/blocks returns the most recent blocks', async () => {
    await addBlock(1, digest('a'));
    await addBlock(2, digest('b'));

    const response = await app.inject({ method: 'GET', url: '/ledger/blocks?limit=1' });
    expect(response.statusCode).toBe(200);
    const { data } = response.json();
    expect(data).toHaveLength(1);
    expect(data[0].index).toBe(2);

    const invalid = await app.inject({ method: 'GET', url: '/ledger/blocks?limit=0' });
    expect(invalid.statusCode).toBe(400);
  });

  it('POST /ledger/attest hashes and attests a row mutation', async () => {
    const values = [1, 'First1', 'Last1', '1990-01-01'];
    const response = await app.inject({
      method: 'POST',
      url: '/ledger/attest',
      payload: { tableName: 'PATIENTS', recordId: 1, columns: PATIENT_COLUMNS, values },
    });

    expect(response.statusCode).toBe(201);
    const { data } = response.json();
    expect(data.dataHash).toBe(computeRowHash('PATIENTS', values, PATIENT_COLUMNS));
    expect(data.degraded).toBe(false);
    expect(data.block.index).toBe(1);
  });

  it('POST /ledger/attest rejects a malformed row', async () => {
    const mismatched = await app.inject({
      method: 'POST',
      url: '/ledger/attest',
      payload: { tableName: 'PATIENTS', recordId: 1, columns: ['a', 'b'], values: [1] },
    });
    expect(mismatched.statusCode).toBe(400);
    expect(mismatched.json().code).toBe('VALIDATION_ERROR');

    const repeated = await app.inject({
      method: 'POST',
      url: '/ledger/attest',
      payload: { tableName: 'PATIENTS', recordId: 1, columns: ['a', 'a'], values: [1, 2] },
    });
    expect(repeated.statusCode).toBe(400);
    expect(repeated.json().code).toBe('INVALID_ROW');
  });

  it('POST /ledger/attest accepts the mutation when attestation fails', async () => {
    context.db.close();
    const response = await app.inject({
      method: 'POST',
      url: '/ledger/attest',
      payload: { tableName: 'PATIENTS', recordId: 1, columns: ['patient_id'], values: [1] },
    });

    expect(response.statusCode).toBe(202);
    const { data } = response.json();
    expect(data.block).toBeNull();
    expect(data.error.code).toBe('LEDGER_UNREACHABLE');
  });

  it('GET /ledger/integrity validates memory and store', async () => {
    await addBlock(1, digest('a'));

    const memory = await app.inject({ method: 'GET', url: '/ledger/integrity' });
    expect(memory.json().data).toEqual({ source: 'memory', valid: true, length: 1 });

    const store = await app.inject({ method: 'GET', url: '/ledger/integrity?source=store' });
    expect(store.json().data).toEqual({ source: 'store', valid: true, length: 1 });

    const invalid = await app.inject({ method: 'GET', url: '/ledger/integrity?source=disk' });
    expect(invalid.statusCode).toBe(400);
  });

  it('GET /ledger/stats describes the chain', async () => {
    const dataHash = digest('a');
    await addBlock(1, dataHash);

    const response = await app.inject({ method: 'GET', url: '/ledger/stats' });
    expect(response.json().data).toEqual({
      state: 'ready',
      length: 1,
      tailIndex: 1,
      tailHash: computeBlockHash(1, '0', dataHash),
      algorithm: 'SHA-256',
    });
  });

  it('POST /reconciliation/sync attests tracked tables', async () => {
    const response = await app.inject({ method: 'POST', url: '/reconciliation/sync', payload: {} });

    expect(response.statusCode).toBe(200);
    const { data } = response.json();
    expect(data.status).toBe('attested');
    expect(data.newlyAttested).toBe(2);

    const runs = await app.inject({ method: 'GET', url: '/reconciliation/runs' });
    expect(runs.statusCode).toBe(200);
    expect(runs.json().meta).toEqual({ page: 1, limit: 20, total: 1, totalPages: 1 });
    expect(runs.json().data[0].runId).toBe(data.runId);
  });

  it('POST /reconciliation/sync runs a named subset', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/reconciliation/sync',
      payload: { tables: ['PATIENTS'] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().data.processed).toBe(2);
  });

  it('POST /reconciliation/sync rejects an unknown table', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/reconciliation/sync',
      payload: { tables: ['PATIENTS', 'VISITORS'] },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().code).toBe('UNKNOWN_TRACKED_TABLE');
    expect(response.json().message).toBe('Unknown tracked table: VISITORS');
  });

  it('returns the error envelope for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    const payload = response.json();
    expect(payload.code).toBe('NOT_FOUND');
    expect(payload.endpoint).toBe('/nope');
    expect(typeof payload.requestId).toBe('string');
  });

  it('rejects a body that is not JSON', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/ledger/blocks',
      headers: { 'content-type': 'application/json' },
      payload: '{not json',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().status).toBe('error');
  });
});

describe('statusForLedgerError', () => {
  it('maps each ledger failure to an HTTP status', () => {
    expect(statusForLedgerError(new InvalidBlockError('bad', 'dataHash'))).toBe(400);
    expect(statusForLedgerError(new ConcurrentAppendConflict('taken', 2))).toBe(409);
    expect(statusForLedgerError(new ConnectivityError('down'))).toBe(503);
    expect(statusForLedgerError(new LedgerStoreError('broken'))).toBe(500);
  });
});
