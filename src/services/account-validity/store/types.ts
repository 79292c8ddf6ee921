// ═══════════════════════════════════════════════════════════════════════════════
// VALIDITY STORE — Contract
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every operation runs as one atomic unit against the backing store. Token
// uniqueness is enforced inside that unit, never by a read-then-write in the
// caller.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult } from '../../../types/result.js';
import type { StoreError } from '../../../types/errors.js';
import type {
  ValidityRecord,
  ResolvedToken,
  ConsumeResult,
  ExpiringAccount,
  AccountSource,
  Clock,
} from '../types.js';
import type { RandomSource } from './bootstrap.js';

/**
 * Settings shared by store implementations.
 */
export interface ValidityStoreConfig {
  /** Length of one validity period (ms) */
  period: number;

  /** Capacity of the expiration lookup cache */
  cacheMaxEntries: number;
}

export interface ValidityStore {
  /**
   * Insert or replace the full record. Throws TOKEN_CONFLICT when the record
   * carries a link token owned by another account.
   */
  upsertValidity(record: ValidityRecord): Promise<void>;

  /** Cached expiration lookup; null when the account has no record. */
  getExpiration(accountId: string): Promise<number | null>;

  /** Full record, uncached. */
  getRecord(accountId: string): Promise<ValidityRecord | null>;

  /** Current renewal token of an account. */
  getRenewalToken(accountId: string): Promise<string | null>;

  /**
   * Store a fresh token and clear its used timestamp.
   * Err TOKEN_CONFLICT when a link token already belongs to another account,
   * NOT_FOUND when the account has no record.
   */
  setToken(accountId: string, token: string): AsyncResult<void, StoreError>;

  /**
   * Look up a token. With `accountId` the token must belong to that account;
   * without it only link tokens can match.
   */
  resolveToken(token: string, accountId?: string): AsyncResult<ResolvedToken, StoreError>;

  /**
   * Conditionally consume a token: when `token` is the account's current
   * token and has not been used, extend to `expirationTs`, reset `notified`
   * and stamp `tokenUsedTs = now`.
   */
  consumeToken(
    accountId: string,
    token: string,
    expirationTs: number,
    now: number
  ): Promise<ConsumeResult>;

  setNotified(accountId: string, notified: boolean): Promise<void>;

  /**
   * Set expiration to now + period and notified to false, creating the record
   * if needed. Overwrites an existing expiration; token fields are untouched.
   */
  setDefaultExpiration(accountId: string): Promise<number>;

  /**
   * Not-yet-notified accounts whose expiration is at most `windowMs` away,
   * including those already expired.
   */
  listExpiringWithin(windowMs: number): Promise<ExpiringAccount[]>;

  /**
   * One migration pass: give up to `batchSize` host accounts lacking a record
   * a jittered default expiration (or their legacy row). Each pass resumes
   * the account listing where the previous one stopped. Returns how many
   * missing accounts were found.
   */
  bootstrapMissing(batchSize: number): Promise<number>;
}

/**
 * Collaborators a store implementation needs.
 */
export interface ValidityStoreDeps {
  clock: Clock;

  /** Host account enumeration for `bootstrapMissing` */
  accountSource?: AccountSource;

  /** Uniform [0, 1) source for bootstrap jitter */
  random?: RandomSource;
}
