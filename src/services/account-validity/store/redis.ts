// ═══════════════════════════════════════════════════════════════════════════════
// REDIS VALIDITY STORE — ioredis + Lua Implementation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each mutating operation is a single Lua script (see infrastructure/redis/
// scripts.ts), which makes it atomic on the server. Scripts are loaded lazily
// with SCRIPT LOAD and reloaded when Redis answers NOSCRIPT.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ok, err, okVoid, appError, type AsyncResult } from '../../../types/result.js';
import { AccountValidityError, type StoreError } from '../../../types/errors.js';
import { getLogger } from '../../../observability/logging/index.js';
import {
  createValidityKeyspace,
  isNoScriptError,
  parseConsumeResult,
  parseFlagResult,
  parseSetTokenResult,
  UPSERT_VALIDITY_SCRIPT,
  SET_TOKEN_SCRIPT,
  CONSUME_TOKEN_SCRIPT,
  SET_NOTIFIED_SCRIPT,
  SET_DEFAULT_EXPIRATION_SCRIPT,
  INSERT_IF_ABSENT_SCRIPT,
  ALL_SCRIPTS,
  type LuaScript,
  type RedisCommandClient,
  type ValidityKeyspace,
} from '../../../infrastructure/redis/index.js';
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

export interface RedisValidityStoreConfig extends ValidityStoreConfig {
  /** Prefix of every key this store writes */
  keyPrefix: string;
}

export const DEFAULT_REDIS_STORE_CONFIG: Omit<RedisValidityStoreConfig, 'period'> = {
  keyPrefix: 'validity',
  cacheMaxEntries: 10_000,
};

// ─────────────────────────────────────────────────────────────────────────────────
// HASH CODEC
// ─────────────────────────────────────────────────────────────────────────────────

function parseRecord(accountId: string, hash: Record<string, string>): ValidityRecord | null {
  const expiration = hash['expiration_ts'];
  if (expiration === undefined) return null;

  const usedTs = hash['token_used_ts'];
  return {
    accountId,
    expirationTs: Number(expiration),
    notified: hash['notified'] === '1',
    renewalToken: hash['token'] ?? null,
    tokenUsedTs: usedTs !== undefined ? Number(usedTs) : null,
  };
}

function recordArgs(record: ValidityRecord, tokenPrefix: string): string[] {
  return [
    record.accountId,
    String(record.expirationTs),
    record.notified ? '1' : '0',
    record.renewalToken ?? '',
    record.tokenUsedTs !== null ? String(record.tokenUsedTs) : '',
    tokenPrefix,
  ];
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class RedisValidityStore implements ValidityStore {
  private readonly config: RedisValidityStoreConfig;
  private readonly keys: ValidityKeyspace;
  private readonly cache: ExpirationCache;
  private readonly scriptShas: Map<string, string> = new Map();
  private bootstrapOffset = 0;

  constructor(
    private readonly redis: RedisCommandClient,
    config: Pick<RedisValidityStoreConfig, 'period'> & Partial<RedisValidityStoreConfig>,
    private readonly deps: ValidityStoreDeps
  ) {
    this.config = { ...DEFAULT_REDIS_STORE_CONFIG, ...config };
    this.keys = createValidityKeyspace(this.config.keyPrefix);
    this.cache = new ExpirationCache({ maxEntries: this.config.cacheMaxEntries });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCRIPT MANAGEMENT
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Load every script up front. Optional; scripts also load on first use.
   */
  async loadScripts(): Promise<void> {
    for (const script of ALL_SCRIPTS) {
      await this.shaFor(script);
    }
    logger.debug('Loaded Lua scripts', { count: ALL_SCRIPTS.length });
  }

  private async shaFor(script: LuaScript): Promise<string> {
    const cached = this.scriptShas.get(script.name);
    if (cached) return cached;

    const sha = await this.redis.script('LOAD', script.source);
    if (typeof sha !== 'string') {
      throw new Error(`SCRIPT LOAD returned no SHA for ${script.name}`);
    }

    this.scriptShas.set(script.name, sha);
    return sha;
  }

  private async runScript(
    script: LuaScript,
    keys: readonly string[],
    args: ReadonlyArray<string | number>
  ): Promise<unknown> {
    if (keys.length !== script.numKeys) {
      throw new Error(`Script ${script.name} expects ${script.numKeys} keys, got ${keys.length}`);
    }

    const sha = await this.shaFor(script);
    try {
      return await this.redis.evalsha(sha, script.numKeys, ...keys, ...args);
    } catch (error) {
      if (!isNoScriptError(error)) throw error;

      logger.warn('Script missing from Redis cache, reloading', { script: script.name });
      this.scriptShas.delete(script.name);
      const reloaded = await this.shaFor(script);
      return this.redis.evalsha(reloaded, script.numKeys, ...keys, ...args);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // RECORD OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async upsertValidity(record: ValidityRecord): Promise<void> {
    const reply = await this.runScript(
      UPSERT_VALIDITY_SCRIPT,
      [this.keys.account(record.accountId), this.keys.pending],
      recordArgs(record, this.keys.tokenPrefix)
    );
    this.cache.invalidate(record.accountId);

    if (!parseFlagResult(reply)) {
      throw new AccountValidityError('TOKEN_CONFLICT', 'Renewal token already in use', {
        details: { accountId: record.accountId },
      });
    }
  }

  async getExpiration(accountId: string): Promise<number | null> {
    return this.cache.load(accountId, async () => {
      const record = await this.getRecord(accountId);
      return record?.expirationTs ?? null;
    });
  }

  async getRecord(accountId: string): Promise<ValidityRecord | null> {
    const hash = await this.redis.hgetall(this.keys.account(accountId));
    return parseRecord(accountId, hash);
  }

  async getRenewalToken(accountId: string): Promise<string | null> {
    const record = await this.getRecord(accountId);
    return record?.renewalToken ?? null;
  }

  async setNotified(accountId: string, notified: boolean): Promise<void> {
    await this.runScript(
      SET_NOTIFIED_SCRIPT,
      [this.keys.account(accountId), this.keys.pending],
      [accountId, notified ? '1' : '0']
    );
    this.cache.invalidate(accountId);
  }

  async setDefaultExpiration(accountId: string): Promise<number> {
    const expirationTs = this.deps.clock.now() + this.config.period;
    await this.runScript(
      SET_DEFAULT_EXPIRATION_SCRIPT,
      [this.keys.account(accountId), this.keys.pending],
      [accountId, String(expirationTs)]
    );
    this.cache.invalidate(accountId);
    return expirationTs;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TOKEN OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async setToken(accountId: string, token: string): AsyncResult<void, StoreError> {
    const reply = await this.runScript(
      SET_TOKEN_SCRIPT,
      [this.keys.account(accountId)],
      [accountId, token, this.keys.tokenPrefix]
    );
    this.cache.invalidate(accountId);

    switch (parseSetTokenResult(reply)) {
      case 'ok':
        return okVoid();
      case 'conflict':
        return err(appError('TOKEN_CONFLICT', 'Renewal token already in use', { accountId }));
      case 'not_found':
        return err(appError('NOT_FOUND', 'No validity record for account', { accountId }));
    }
  }

  async resolveToken(token: string, accountId?: string): AsyncResult<ResolvedToken, StoreError> {
    const ownerId = accountId ?? (
      classifyToken(token) === 'link' ? await this.redis.get(this.keys.token(token)) : null
    );

    const record = ownerId !== null ? await this.getRecord(ownerId) : null;
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
    const reply = await this.runScript(
      CONSUME_TOKEN_SCRIPT,
      [this.keys.account(accountId), this.keys.pending],
      [accountId, token, String(expirationTs), String(now)]
    );
    const parsed = parseConsumeResult(reply);

    if (parsed.status === 'not_found') {
      return { status: 'not_found' };
    }
    if (parsed.status === 'renewed') {
      this.cache.invalidate(accountId);
    }
    return { status: parsed.status, expirationTs: parsed.expirationTs };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCAN & MIGRATION
  // ═══════════════════════════════════════════════════════════════════════════════

  async listExpiringWithin(windowMs: number): Promise<ExpiringAccount[]> {
    const cutoff = this.deps.clock.now() + windowMs;
    const reply = await this.redis.zrangebyscore(this.keys.pending, '-inf', cutoff, 'WITHSCORES');

    const accountIds: string[] = [];
    for (let i = 0; i < reply.length; i += 2) {
      const accountId = reply[i];
      if (accountId !== undefined) accountIds.push(accountId);
    }

    // The pending set only orders candidates; the record is authoritative.
    return Promise.all(accountIds.map(async (accountId): Promise<ExpiringAccount> => {
      const record = await this.getRecord(accountId);
      return { accountId, expirationTs: record?.expirationTs ?? null };
    }));
  }

  async bootstrapMissing(batchSize: number): Promise<number> {
    const source = this.deps.accountSource;
    if (!source) {
      logger.warn('No account source configured; skipping bootstrap');
      return 0;
    }

    const scan = await collectMissingAccounts(source, batchSize, (ids) =>
      Promise.all(ids.map(async (id) => (await this.redis.exists(this.keys.account(id))) === 1)),
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
      await this.runScript(
        INSERT_IF_ABSENT_SCRIPT,
        [this.keys.account(record.accountId), this.keys.pending],
        recordArgs(record, this.keys.tokenPrefix)
      );
      this.cache.invalidate(record.accountId);
    }

    this.bootstrapOffset = nextScanOffset(scan);
    return missing.length;
  }
}
