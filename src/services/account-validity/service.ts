// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY SERVICE — Operations Exposed to the Host
// ═══════════════════════════════════════════════════════════════════════════════
//
//   renew(token, accountId?)         → { valid, stale, expirationTs }
//   sendRenewalEmail(accountId)      → fails with MISSING_EXPIRATION if untracked
//   adminSetValidity(request)        → new expiration
//   onRegistration(accountId)        → default expiration for a new account
//   isExpired(accountId)             → boolean, or null when untracked
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import type { RenewalEngine } from './engine.js';
import type { RenewalNotifier } from './notifier.js';
import type { ValidityStore } from './store/index.js';
import type { NotificationResult, RenewalOutcome } from './types.js';

const logger = getLogger({ component: 'account-validity' });

/**
 * Operator request to set an account's validity.
 */
export interface AdminValidityRequest {
  readonly accountId: string;

  /** New expiration; defaults to now + period */
  readonly expirationTs?: number;

  /** When false the account is marked notified, suppressing renewal e-mails */
  readonly enableRenewalEmails?: boolean;
}

export class AccountValidityService {
  constructor(
    private readonly store: ValidityStore,
    private readonly engine: RenewalEngine,
    private readonly notifier: RenewalNotifier
  ) {}

  renew(token: string, authenticatedAccountId?: string): Promise<RenewalOutcome> {
    return this.engine.attemptRenewal(token, authenticatedAccountId);
  }

  sendRenewalEmail(accountId: string): Promise<NotificationResult> {
    return this.notifier.sendRenewalEmailToAccount(accountId);
  }

  /**
   * Set validity on behalf of an operator. Any outstanding token is cleared.
   */
  async adminSetValidity(request: AdminValidityRequest): Promise<number> {
    const enableRenewalEmails = request.enableRenewalEmails ?? true;

    const expirationTs = await this.engine.extend(request.accountId, {
      expirationTs: request.expirationTs,
      notified: !enableRenewalEmails,
      keepToken: null,
    });

    logger.info('Validity set by administrator', {
      accountId: request.accountId,
      expirationTs,
      enableRenewalEmails,
    });
    return expirationTs;
  }

  /**
   * Give a newly registered account its first validity period.
   */
  onRegistration(accountId: string): Promise<number> {
    return this.store.setDefaultExpiration(accountId);
  }

  isExpired(accountId: string): Promise<boolean | null> {
    return this.engine.isExpired(accountId);
  }
}
