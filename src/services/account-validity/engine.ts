// ═══════════════════════════════════════════════════════════════════════════════
// RENEWAL ENGINE — Token Lifecycle and Renewal Transition
// ═══════════════════════════════════════════════════════════════════════════════
//
// A token moves Unissued → Active → Consumed and never leaves Consumed.
// Presenting a consumed token yields a Stale outcome carrying the current
// expiration; it never extends the account a second time.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { AccountValidityError } from '../../types/errors.js';
import { classifyToken, generateToken, type TokenFormat } from './tokens.js';
import {
  INVALID_OUTCOME,
  systemClock,
  type Clock,
  type RenewalOutcome,
} from './types.js';
import type { ValidityStore } from './store/index.js';

const logger = getLogger({ component: 'renewal' });

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface RenewalEngineConfig {
  /** Length of one validity period (ms) */
  period: number;

  /** Link-token issuance attempts before TOKEN_EXHAUSTED */
  maxTokenAttempts: number;
}

export const DEFAULT_ENGINE_CONFIG: Omit<RenewalEngineConfig, 'period'> = {
  maxTokenAttempts: 5,
};

export interface RenewalEngineDeps {
  clock?: Clock;

  /** Token source; defaults to the cryptographic generators */
  generateToken?: (format: TokenFormat) => string;
}

/**
 * Options for the renewal transition.
 */
export interface ExtendOptions {
  /** Explicit new expiration; defaults to now + period */
  expirationTs?: number;

  /** Notified flag to write; defaults to false */
  notified?: boolean;

  /** Token to keep on the record; null or absent clears it */
  keepToken?: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export class RenewalEngine {
  private readonly config: RenewalEngineConfig;
  private readonly clock: Clock;
  private readonly generate: (format: TokenFormat) => string;

  constructor(
    private readonly store: ValidityStore,
    config: Pick<RenewalEngineConfig, 'period'> & Partial<RenewalEngineConfig>,
    deps: RenewalEngineDeps = {}
  ) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.clock = deps.clock ?? systemClock;
    this.generate = deps.generateToken ?? generateToken;
  }

  /**
   * Generate and store a fresh token for the account.
   *
   * Link tokens are retried with fresh randomness when the store reports a
   * collision. A manual code is tried once: codes only need to be unique per
   * account, so a rejection there is not contention.
   */
  async issueToken(accountId: string, format: TokenFormat): Promise<string> {
    const attempts = format === 'link' ? this.config.maxTokenAttempts : 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const token = this.generate(format);
      const result = await this.store.setToken(accountId, token);

      if (result.ok) {
        logger.debug('Issued renewal token', { accountId, format, attempt });
        return token;
      }

      if (result.error.code !== 'TOKEN_CONFLICT' || format === 'manual') {
        throw AccountValidityError.fromStoreError(result.error);
      }

      logger.warn('Renewal token collision, regenerating', { accountId, attempt });
    }

    throw new AccountValidityError(
      'TOKEN_EXHAUSTED',
      `Could not issue a unique renewal token after ${attempts} attempts`,
      { details: { accountId } }
    );
  }

  /**
   * Present a renewal token.
   *
   * Manual codes need the authenticated account; link tokens are looked up
   * globally when no account is given.
   */
  async attemptRenewal(token: string, authenticatedAccountId?: string): Promise<RenewalOutcome> {
    if (classifyToken(token) === 'manual' && authenticatedAccountId === undefined) {
      logger.info('Rejected manual renewal code without an authenticated account');
      return INVALID_OUTCOME;
    }

    const resolved = await this.store.resolveToken(token, authenticatedAccountId);
    if (!resolved.ok) {
      return INVALID_OUTCOME;
    }

    const { accountId, expirationTs, tokenUsedTs } = resolved.value;
    if (tokenUsedTs !== null) {
      logger.info('Renewal token already used', { accountId });
      return { valid: false, stale: true, expirationTs };
    }

    const now = this.clock.now();
    const consumed = await this.store.consumeToken(accountId, token, now + this.config.period, now);

    switch (consumed.status) {
      case 'renewed':
        logger.info('Account renewed', { accountId, expirationTs: consumed.expirationTs });
        return { valid: true, stale: false, expirationTs: consumed.expirationTs };

      case 'stale':
        // Another request consumed the token between lookup and update
        return { valid: false, stale: true, expirationTs: consumed.expirationTs };

      case 'not_found':
        // Token rotated between lookup and update
        return INVALID_OUTCOME;
    }
  }

  /**
   * Renewal transition: write a new expiration and stamp `tokenUsedTs = now`,
   * which marks any token left on the record as consumed.
   */
  async extend(accountId: string, options: ExtendOptions = {}): Promise<number> {
    const now = this.clock.now();
    const expirationTs = options.expirationTs ?? now + this.config.period;

    await this.store.upsertValidity({
      accountId,
      expirationTs,
      notified: options.notified ?? false,
      renewalToken: options.keepToken ?? null,
      tokenUsedTs: now,
    });

    logger.info('Account validity extended', { accountId, expirationTs });
    return expirationTs;
  }

  /**
   * Whether the account has expired; null when it has no record.
   */
  async isExpired(accountId: string): Promise<boolean | null> {
    const expirationTs = await this.store.getExpiration(accountId);
    if (expirationTs === null) return null;
    return this.clock.now() >= expirationTs;
  }
}
