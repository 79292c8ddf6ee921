// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP MIGRATION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { populateMissingRecords } from '../migration.js';
import { MemoryValidityStore } from '../store/index.js';
import { createAccountSource, createTestClock, PERIOD } from './helpers.js';

function storeFor(accountIds: readonly string[]): MemoryValidityStore {
  return new MemoryValidityStore({ period: PERIOD }, {
    clock: createTestClock(),
    accountSource: createAccountSource(accountIds),
    random: () => 0,
  });
}

describe('populateMissingRecords', () => {
  it('should run batches until one comes back short', async () => {
    const store = storeFor(['a', 'b', 'c', 'd', 'e']);
    const bootstrap = vi.spyOn(store, 'bootstrapMissing');

    const result = await populateMissingRecords(store, { batchSize: 2 });

    expect(result).toEqual({ inserted: 5, batches: 3, interrupted: false });
    expect(bootstrap).toHaveBeenCalledTimes(3);
    expect(store.size()).toBe(5);
  });

  it('should finish with an empty batch when the count divides evenly', async () => {
    const store = storeFor(['a', 'b', 'c', 'd']);

    const result = await populateMissingRecords(store, { batchSize: 2 });

    expect(result).toEqual({ inserted: 4, batches: 3, interrupted: false });
  });

  it('should stop between batches when asked to', async () => {
    const store = storeFor(['a', 'b', 'c', 'd', 'e']);
    let checks = 0;

    const result = await populateMissingRecords(store, {
      batchSize: 2,
      shouldContinue: () => checks++ < 1,
    });

    expect(result).toEqual({ inserted: 2, batches: 1, interrupted: true });
    expect(store.size()).toBe(2);
  });

  it('should read each page of a large backfill about once', async () => {
    const accountIds = Array.from({ length: 5000 }, (_, i) => `user-${i}`);
    const source = createAccountSource(accountIds);
    const store = new MemoryValidityStore({ period: PERIOD }, {
      clock: createTestClock(),
      accountSource: source,
      random: () => 0,
    });

    const result = await populateMissingRecords(store, { batchSize: 50 });

    expect(result).toEqual({ inserted: 5000, batches: 101, interrupted: false });
    expect(source.listAccountIds).toHaveBeenCalledTimes(101);
    expect(source.listAccountIds).toHaveBeenLastCalledWith(5000, 50);
    expect(store.size()).toBe(5000);
  });

  it('should find accounts added after an earlier backfill finished', async () => {
    const accountIds = ['a', 'b', 'c'];
    const store = new MemoryValidityStore({ period: PERIOD }, {
      clock: createTestClock(),
      accountSource: createAccountSource(accountIds),
      random: () => 0,
    });

    await populateMissingRecords(store, { batchSize: 2 });
    accountIds.push('d');

    expect(await store.bootstrapMissing(2)).toBe(1);
    expect(store.size()).toBe(4);
  });

  it('should do nothing when every account has a record', async () => {
    const store = storeFor([]);

    expect(await populateMissingRecords(store, { batchSize: 100 })).toEqual({
      inserted: 0,
      batches: 1,
      interrupted: false,
    });
  });
});
