// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY VALIDITY STORE — In-Process Implementation for Tests and Development
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each operation mutates its maps synchronously between awaits, so every
// operation is atomic with respect to the others.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, okVoid, appError, type AsyncResult } from '../../../types/result.js';
import { AccountValidityError, type StoreError } from '../../../types/errors.js';
import { getLogger } from '../../../observability/logging/index.js';
import { ExpirationCache } from '../cache.js';
import { classifyToken } from '../tokens.js';
import type {
  ValidityRecord,
  ResolvedToken,
  ConsumeResult,
  ExpiringAccount,
} from '../types.js';
import { collectMissingAccounts, nextScanOffset, planBootstrapRecords } from './bootstrap.js';
import type { ValidityStore, ValidityStoreConfig, ValidityStoreDeps } from './types.js';

const logger = getLogger({ component: 'store' });

type MutableRecord = { -readonly [K in keyof ValidityRecord]: ValidityRecord[K] };

export class MemoryValidityStore implements ValidityStore {
  private readonly records = new Map<string, MutableRecord>();
  private readonly linkTokenOwners = new Map<string, string>();
  private bootstrapOffset = 0;
  private readonly cache: ExpirationCache;
  private readonly config: ValidityStoreConfig;
  private readonly deps: ValidityStoreDeps;

  constructor(
    config: Pick<ValidityStoreConfig, 'period'> & Partial<ValidityStoreConfig>,
    deps: ValidityStoreDeps
  ) {
    this.config = { cacheMaxEntries: 10_000, ...config };
    this.deps = deps;
    this.cache = new ExpirationCache({ maxEntries: this.config.cacheMaxEntries });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // RECORD OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async upsertValidity(record: ValidityRecord): Promise<void> {
    const { accountId, renewalToken } = record;

    if (renewalToken !== null && this.isClaimedByOther(renewalToken, accountId)) {
      throw new AccountValidityError('TOKEN_CONFLICT', 'Renewal token already in use', {
        details: { accountId },
      });
    }

    this.releaseToken(accountId);
    this.records.set(accountId, { ...record });
    this.claimToken(accountId, renewalToken);
    this.cache.invalidate(accountId);
  }

  async getExpiration(accountId: string): Promise<number | null> {
    return this.cache.load(accountId, async () => this.records.get(accountId)?.expirationTs ?? null);
  }

  async getRecord(accountId: string): Promise<ValidityRecord | null> {
    const record = this.records.get(accountId);
    return record ? { ...record } : null;
  }

  async getRenewalToken(accountId: string): Promise<string | null> {
    return this.records.get(accountId)?.renewalToken ?? null;
  }

  async setNotified(accountId: string, notified: boolean): Promise<void> {
    const record = this.records.get(accountId);
    if (record) {
      record.notified = notified;
      this.cache.invalidate(accountId);
    }
  }

  async setDefaultExpiration(accountId: string): Promise<number> {
    const expirationTs = this.deps.clock.now() + this.config.period;
    const record = this.records.get(accountId);

    if (record) {
      record.expirationTs = expirationTs;
      record.notified = false;
    } else {
      this.records.set(accountId, {
        accountId,
        expirationTs,
        notified: false,
        renewalToken: null,
        tokenUsedTs: null,
      });
    }

    this.cache.invalidate(accountId);
    return expirationTs;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TOKEN OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async setToken(accountId: string, token: string): AsyncResult<void, StoreError> {
    const record = this.records.get(accountId);
    if (!record) {
      return err(appError('NOT_FOUND', 'No validity record for account', { accountId }));
    }

    if (this.isClaimedByOther(token, accountId)) {
      return err(appError('TOKEN_CONFLICT', 'Renewal token already in use', { accountId }));
    }

    this.releaseToken(accountId);
    record.renewalToken = token;
    record.tokenUsedTs = null;
    this.claimToken(accountId, token);
    this.cache.invalidate(accountId);
    return okVoid();
  }

  async resolveToken(token: string, accountId?: string): AsyncResult<ResolvedToken, StoreError> {
    const ownerId = accountId ?? this.globalOwnerOf(token);
    const record = ownerId !== null ? this.records.get(ownerId) : undefined;

    if (!record || record.renewalToken !== token) {
      return err(appError('NOT_FOUND', 'Unknown renewal token'));
    }

    return ok({
      accountId: record.accountId,
      expirationTs: record.expirationTs,
      tokenUsedTs: record.tokenUsedTs,
    });
  }

  async consumeToken(
    accountId: string,
    token: string,
    expirationTs: number,
    now: number
  ): Promise<ConsumeResult> {
    const record = this.records.get(accountId);
    if (!record || record.renewalToken !== token) {
      return { status: 'not_found' };
    }

    if (record.tokenUsedTs !== null) {
      return { status: 'stale', expirationTs: record.expirationTs };
    }

    record.expirationTs = expirationTs;
    record.notified = false;
    record.tokenUsedTs = now;
    this.cache.invalidate(accountId);
    return { status: 'renewed', expirationTs };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCAN & MIGRATION
  // ═══════════════════════════════════════════════════════════════════════════════

  async listExpiringWithin(windowMs: number): Promise<ExpiringAccount[]> {
    const now = this.deps.clock.now();
    const due: ExpiringAccount[] = [];

    for (const record of this.records.values()) {
      if (!record.notified && record.expirationTs - now <= windowMs) {
        due.push({ accountId: record.accountId, expirationTs: record.expirationTs });
      }
    }

    return due.sort((a, b) => (a.expirationTs ?? 0) - (b.expirationTs ?? 0));
  }

  async bootstrapMissing(batchSize: number): Promise<number> {
    const source = this.deps.accountSource;
    if (!source) {
      logger.warn('No account source configured; skipping bootstrap');
      return 0;
    }

    const scan = await collectMissingAccounts(source, batchSize, async (ids) =>
      ids.map((id) => this.records.has(id)),
      this.bootstrapOffset
    );

    const missing = scan.accountIds;
    if (missing.length === 0) {
      this.bootstrapOffset = nextScanOffset(scan);
      return 0;
    }

    const planned = await planBootstrapRecords(missing, source, {
      now: this.deps.clock.now(),
      period: this.config.period,
      random: this.deps.random ?? Math.random,
    });

    for (const record of planned) {
      this.insertIfAbsent(record);
    }

    this.bootstrapOffset = nextScanOffset(scan);
    return missing.length;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TESTING HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Number of stored records.
   */
  size(): number {
    return this.records.size;
  }

  /**
   * Remove all records.
   */
  clear(): void {
    this.records.clear();
    this.linkTokenOwners.clear();
    this.cache.clear();
    this.bootstrapOffset = 0;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  private insertIfAbsent(record: ValidityRecord): void {
    if (this.records.has(record.accountId)) return;

    const token = record.renewalToken !== null && this.isClaimedByOther(record.renewalToken, record.accountId)
      ? null
      : record.renewalToken;

    this.records.set(record.accountId, { ...record, renewalToken: token });
    this.claimToken(record.accountId, token);
    this.cache.invalidate(record.accountId);
  }

  private globalOwnerOf(token: string): string | null {
    if (classifyToken(token) !== 'link') return null;
    return this.linkTokenOwners.get(token) ?? null;
  }

  private isClaimedByOther(token: string, accountId: string): boolean {
    if (classifyToken(token) !== 'link') return false;
    const owner = this.linkTokenOwners.get(token);
    return owner !== undefined && owner !== accountId;
  }

  private claimToken(accountId: string, token: string | null): void {
    if (token !== null && classifyToken(token) === 'link') {
      this.linkTokenOwners.set(token, accountId);
    }
  }

  private releaseToken(accountId: string): void {
    const current = this.records.get(accountId)?.renewalToken;
    if (current && this.linkTokenOwners.get(current) === accountId) {
      this.linkTokenOwners.delete(current);
    }
  }
}
