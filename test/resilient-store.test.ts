import { afterEach, describe, expect, it } from 'vitest';
import { ConcurrentAppendConflict, ConnectivityError } from '../src/modules/ledger/ledger.errors.js';
import { ResilientLedgerStore } from '../src/modules/ledger/resilient.store.js';
import type { Block } from '../src/modules/ledger/types/ledger.types.js';
import { linkedBlocks, MemoryLedgerStore, silentLogger } from './helpers.js';

class SlowLedgerStore extends MemoryLedgerStore {
  override async load(): Promise<Block[]> {
    await new Promise((resolve) => setTimeout(resolve, 200));
    return [];
  }
}

describe('ResilientLedgerStore', () => {
  let store: ResilientLedgerStore | undefined;

  afterEach(() => {
    store?.close();
    store = undefined;
  });

  it('passes calls through to the wrapped store', async () => {
    const inner = new MemoryLedgerStore();
    store = new ResilientLedgerStore(inner, { timeoutMs: 1000, failureThreshold: 5, resetTimeoutMs: 30000 }, silentLogger);

    const [first] = linkedBlocks(1);
    await store.append(first);

    expect(await store.load()).toEqual([first]);
    expect(await store.loadAfter(1)).toEqual([]);
  });

  it('turns a slow call into a connectivity failure', async () => {
    store = new ResilientLedgerStore(
      new SlowLedgerStore(),
      { timeoutMs: 20, failureThreshold: 5, resetTimeoutMs: 30000 },
      silentLogger
    );

    await expect(store.load()).rejects.toThrow(ConnectivityError);
    await expect(store.load()).rejects.toThrow('Ledger store timed out during load');
  });

  it('opens the circuit once every call in the window failed', async () => {
    const inner = new MemoryLedgerStore();
    inner.failLoad = new ConnectivityError('Ledger store unreachable during load');
    store = new ResilientLedgerStore(inner, { timeoutMs: 1000, failureThreshold: 2, resetTimeoutMs: 30000 }, silentLogger);

    await expect(store.load()).rejects.toThrow('Ledger store unreachable during load');
    await expect(store.load()).rejects.toThrow('Ledger store unreachable during load');
    await expect(store.load()).rejects.toThrow('Ledger store circuit is open; load rejected');
    expect(inner.loadCalls).toBe(2);
  });

  it('does not count append conflicts as failures', async () => {
    const inner = new MemoryLedgerStore();
    store = new ResilientLedgerStore(inner, { timeoutMs: 1000, failureThreshold: 2, resetTimeoutMs: 30000 }, silentLogger);

    const [, second] = linkedBlocks(2);
    for (let i = 0; i < 3; i++) {
      await expect(store.append(second)).rejects.toBeInstanceOf(ConcurrentAppendConflict);
    }
    expect(inner.appendCalls).toBe(3);
  });
});
