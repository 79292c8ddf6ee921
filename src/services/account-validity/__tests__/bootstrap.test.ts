// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP PLANNING TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  jitteredExpiration,
  collectMissingAccounts,
  nextScanOffset,
  planBootstrapRecords,
} from '../store/bootstrap.js';
import { createAccountSource } from './helpers.js';

describe('jitteredExpiration', () => {
  it('should stay within the last tenth of the period', () => {
    expect(jitteredExpiration(1000, 1000, () => 0)).toBe(2000);
    expect(jitteredExpiration(1000, 1000, () => 0.5)).toBe(1950);
    expect(jitteredExpiration(1000, 1000, () => 0.9999)).toBe(1900);
  });

  it('should never exceed the maximum jitter', () => {
    expect(jitteredExpiration(0, 1000, () => 1)).toBe(900);
  });
});

describe('collectMissingAccounts', () => {
  it('should page past accounts that already have records', async () => {
    const source = createAccountSource(['a', 'b', 'c', 'd', 'e']);
    const present = new Set(['a', 'b']);

    const scan = await collectMissingAccounts(source, 2, async (ids) => ids.map((id) => present.has(id)));

    expect(scan).toEqual({ accountIds: ['c', 'd'], nextOffset: 4, exhausted: false });
    expect(source.listAccountIds).toHaveBeenCalledTimes(2);
    expect(source.listAccountIds).toHaveBeenLastCalledWith(2, 2);
  });

  it('should stop at the end of the account list', async () => {
    const source = createAccountSource(['a', 'b', 'c']);

    const scan = await collectMissingAccounts(source, 10, async (ids) => ids.map(() => false));

    expect(scan).toEqual({ accountIds: ['a', 'b', 'c'], nextOffset: 3, exhausted: true });
    expect(source.listAccountIds).toHaveBeenCalledTimes(1);
  });

  it('should resume mid-page from the previous cursor', async () => {
    const source = createAccountSource(['a', 'b', 'c', 'd', 'e']);
    const present = new Set(['b']);
    const hasRecords = async (ids: readonly string[]) => ids.map((id) => present.has(id));

    const first = await collectMissingAccounts(source, 2, hasRecords);
    expect(first).toEqual({ accountIds: ['a', 'c'], nextOffset: 3, exhausted: false });

    const second = await collectMissingAccounts(source, 2, hasRecords, first.nextOffset);
    expect(second).toEqual({ accountIds: ['d', 'e'], nextOffset: 5, exhausted: false });
    expect(source.listAccountIds).toHaveBeenLastCalledWith(3, 2);

    const third = await collectMissingAccounts(source, 2, hasRecords, second.nextOffset);
    expect(third).toEqual({ accountIds: [], nextOffset: 5, exhausted: true });
    expect(source.listAccountIds).toHaveBeenCalledTimes(4);
  });
});

describe('nextScanOffset', () => {
  it('should carry the cursor until the list is exhausted', () => {
    expect(nextScanOffset({ accountIds: ['a'], nextOffset: 7, exhausted: false })).toBe(7);
    expect(nextScanOffset({ accountIds: [], nextOffset: 7, exhausted: true })).toBe(0);
  });
});

describe('planBootstrapRecords', () => {
  it('should prefer legacy rows over defaults', async () => {
    const source = createAccountSource(['a', 'b'], [{
      accountId: 'b',
      expirationTs: 5000,
      notified: true,
      renewalToken: null,
      tokenUsedTs: null,
    }]);

    const planned = await planBootstrapRecords(['a', 'b'], source, { now: 0, period: 1000, random: () => 0 });

    expect(planned).toEqual([
      { accountId: 'a', expirationTs: 1000, notified: false, renewalToken: null, tokenUsedTs: null },
      { accountId: 'b', expirationTs: 5000, notified: true, renewalToken: null, tokenUsedTs: null },
    ]);
  });
});
