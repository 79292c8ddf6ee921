// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP PLANNING — Records for Host Accounts Without One
// ═══════════════════════════════════════════════════════════════════════════════
//
// Shared by the store implementations: finding the accounts a migration pass
// covers and deciding what each of them gets. The insert itself stays inside
// each store's atomic insert-if-absent.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AccountSource, ValidityRecord } from '../types.js';

/**
 * Share of the period that bootstrap expirations are spread across.
 */
export const JITTER_RATIO = 0.1;

export type RandomSource = () => number;

/**
 * Default expiration for a bootstrapped account: `now + period` minus a
 * uniformly random offset in [0, 10% of period].
 */
export function jitteredExpiration(now: number, period: number, random: RandomSource): number {
  const maxJitter = Math.floor(period * JITTER_RATIO);
  const jitter = Math.min(maxJitter, Math.floor(random() * (maxJitter + 1)));
  return now + period - jitter;
}

export interface MissingAccountScan {
  /** Accounts without a record, at most `batchSize` */
  readonly accountIds: string[];

  /** Offset the next pass resumes from */
  readonly nextOffset: number;

  /** The end of the account list was reached */
  readonly exhausted: boolean;
}

/**
 * Page through the host accounts from `offset` and collect up to `batchSize`
 * ids that have no record yet. Stores carry `nextOffset` into their next
 * pass so a backfill reads each page about once.
 */
export async function collectMissingAccounts(
  source: AccountSource,
  batchSize: number,
  hasRecords: (accountIds: readonly string[]) => Promise<readonly boolean[]>,
  offset = 0
): Promise<MissingAccountScan> {
  const accountIds: string[] = [];
  let cursor = offset;

  for (;;) {
    const page = await source.listAccountIds(cursor, batchSize);
    if (page.length === 0) {
      return { accountIds, nextOffset: cursor, exhausted: true };
    }

    const present = await hasRecords(page);
    for (const [index, accountId] of page.entries()) {
      if (present[index]) continue;

      accountIds.push(accountId);
      if (accountIds.length === batchSize) {
        return { accountIds, nextOffset: cursor + index + 1, exhausted: false };
      }
    }

    cursor += page.length;
    if (page.length < batchSize) {
      return { accountIds, nextOffset: cursor, exhausted: true };
    }
  }
}

/**
 * Offset for the pass after `scan`. Wraps to the start once the list is
 * exhausted so accounts added later are found.
 */
export function nextScanOffset(scan: MissingAccountScan): number {
  return scan.exhausted ? 0 : scan.nextOffset;
}

/**
 * Records to insert for the given accounts: the legacy row when the host has
 * one, otherwise a jittered default.
 */
export async function planBootstrapRecords(
  accountIds: readonly string[],
  source: AccountSource,
  options: { now: number; period: number; random: RandomSource }
): Promise<ValidityRecord[]> {
  const legacyRows = source.getLegacyValidity
    ? await source.getLegacyValidity(accountIds)
    : [];
  const legacy = new Map(legacyRows.map((row) => [row.accountId, row]));

  return accountIds.map((accountId): ValidityRecord => {
    const row = legacy.get(accountId);
    if (row) {
      return { ...row, accountId };
    }
    return {
      accountId,
      expirationTs: jitteredExpiration(options.now, options.period, options.random),
      notified: false,
      renewalToken: null,
      tokenUsedTs: null,
    };
  });
}
