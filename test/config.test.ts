import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadTrackedTables } from '../src/config/trackedTables.js';
import { loadConfig } from '../src/config/validation.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const result = loadConfig({ DATABASE_PATH: './data/test.db' });

    expect(result).toEqual({
      ok: true,
      config: {
        DATABASE_PATH: './data/test.db',
        PORT: 8890,
        HOST: '0.0.0.0',
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        TRACKED_TABLES_PATH: 'config/tracked-tables.json',
        LEDGER_STORE_TIMEOUT_MS: 5000,
        LEDGER_APPEND_RETRY_COUNT: 3,
        LEDGER_BREAKER_FAILURE_THRESHOLD: 5,
        LEDGER_BREAKER_RESET_TIMEOUT_MS: 30000,
        SYNC_BATCH_SIZE: 100,
        SYNC_MAX_PAGES: 50,
        SYNC_INTERVAL_MS: 0,
      },
    });
  });

  it('reads overrides', () => {
    const result = loadConfig({ DATABASE_PATH: ':memory:', PORT: '9000', NODE_ENV: 'production', SYNC_BATCH_SIZE: '25' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.PORT).toBe(9000);
      expect(result.config.NODE_ENV).toBe('production');
      expect(result.config.SYNC_BATCH_SIZE).toBe(25);
    }
  });

  it('reports every problem at once', () => {
    const result = loadConfig({ NODE_ENV: 'staging', SYNC_BATCH_SIZE: '0', PORT: 'abc' });

    expect(result).toEqual({
      ok: false,
      errors: [
        '❌ Missing required environment variables:',
        '   - DATABASE_PATH',
        '❌ NODE_ENV must be one of development, production, test: staging',
        '❌ PORT must be an integer >= 0: abc',
        '❌ SYNC_BATCH_SIZE must be an integer >= 1: 0',
      ],
    });
  });
});

describe('loadTrackedTables', () => {
  function writeTables(content: string): string {
    const file = join(mkdtempSync(join(tmpdir(), 'tracked-')), 'tables.json');
    writeFileSync(file, content);
    return file;
  }

  it('loads the bundled hospital tables', () => {
    const tables = loadTrackedTables('config/tracked-tables.json');
    expect(tables.map((table) => table.name)).toEqual([
      'PATIENTS',
      'DOCTORS',
      'STAFF',
      'APPOINTMENTS',
      'MEDICALRECORDS',
      'PRESCRIPTIONS',
      'BILLING',
      'INVENTORY',
    ]);
  });

  it('rejects unsafe table names', () => {
    const file = writeTables(JSON.stringify([{ name: 'PATIENTS;--', columns: ['patient_id'] }]));
    expect(() => loadTrackedTables(file)).toThrow('0.name: must be a plain SQL identifier');
  });

  it('rejects duplicate tables', () => {
    const file = writeTables(
      JSON.stringify([
        { name: 'PATIENTS', columns: ['patient_id'] },
        { name: 'PATIENTS', columns: ['patient_id'] },
      ])
    );
    expect(() => loadTrackedTables(file)).toThrow('(root): table names must be unique');
  });

  it('rejects a file that is not JSON', () => {
    const file = writeTables('not json');
    expect(() => loadTrackedTables(file)).toThrow('Cannot read tracked tables from');
  });
});
