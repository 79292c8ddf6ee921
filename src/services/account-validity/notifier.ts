// ═══════════════════════════════════════════════════════════════════════════════
// RENEWAL NOTIFIER — Who Gets a Renewal E-mail, With Which Token
// ═══════════════════════════════════════════════════════════════════════════════
//
// Rendering is in message.ts and delivery belongs to the host's Mailer. This
// module decides whether to send, issues the token and does the bookkeeping:
// once every address has been attempted the account is marked notified, which
// keeps it out of later scans until it is renewed.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { AccountValidityError } from '../../types/errors.js';
import { buildRenewalMessage, type RenewalMessageConfig } from './message.js';
import type { RenewalEngine } from './engine.js';
import type { ValidityStore } from './store/index.js';
import type { TokenFormat } from './tokens.js';
import type { AccountDirectory, Mailer, NotificationResult } from './types.js';

const logger = getLogger({ component: 'notifier' });

export interface RenewalNotifierConfig extends RenewalMessageConfig {
  /** Issue link tokens (true) or manual codes (false) */
  sendLinks: boolean;
}

export class RenewalNotifier {
  constructor(
    private readonly store: ValidityStore,
    private readonly engine: RenewalEngine,
    private readonly directory: AccountDirectory,
    private readonly mailer: Mailer,
    private readonly config: RenewalNotifierConfig
  ) {}

  /**
   * Send a renewal e-mail on request. Fails with MISSING_EXPIRATION when the
   * account is not tracked.
   */
  async sendRenewalEmailToAccount(accountId: string): Promise<NotificationResult> {
    const expirationTs = await this.store.getExpiration(accountId);
    if (expirationTs === null) {
      throw new AccountValidityError(
        'MISSING_EXPIRATION',
        'Account has no expiration date set',
        { details: { accountId } }
      );
    }

    return this.sendRenewalEmail(accountId, expirationTs);
  }

  /**
   * Issue a token and mail it to every address of the account. An account
   * without addresses is skipped; it needs manual intervention. The account
   * is marked notified only once at least one address accepted the message.
   */
  async sendRenewalEmail(accountId: string, expirationTs: number): Promise<NotificationResult> {
    const addresses = await this.directory.getEmailAddresses(accountId);
    if (addresses.length === 0) {
      logger.info('Account has no e-mail address, not sending renewal notice', { accountId });
      return { accountId, sent: 0, failed: 0, tokenFormat: null };
    }

    const displayName = await this.resolveDisplayName(accountId);
    const format: TokenFormat = this.config.sendLinks ? 'link' : 'manual';
    const token = await this.engine.issueToken(accountId, format);

    const message = buildRenewalMessage(this.config, { displayName, token, format, expirationTs });

    let sent = 0;
    let failed = 0;

    for (const address of addresses) {
      try {
        const accepted = await this.mailer.send({ to: address, ...message });
        if (accepted) {
          sent++;
        } else {
          failed++;
          logger.warn('Mail transport refused renewal notice', { accountId, address });
        }
      } catch (error) {
        failed++;
        logger.error('Failed to send renewal notice', error, { accountId, address });
      }
    }

    if (sent === 0) {
      // Left pending so the next scan retries the account
      throw new AccountValidityError(
        'DELIVERY_FAILED',
        'Renewal e-mail was not accepted for any address',
        { details: { accountId, failed } }
      );
    }

    await this.store.setNotified(accountId, true);

    logger.info('Renewal notice dispatched', { accountId, sent, failed, format });
    return { accountId, sent, failed, tokenFormat: format };
  }

  private async resolveDisplayName(accountId: string): Promise<string> {
    try {
      const displayName = await this.directory.getDisplayName(accountId);
      return displayName && displayName.trim() !== '' ? displayName : accountId;
    } catch (error) {
      logger.warn('Display name lookup failed, using account id', {
        accountId,
        reason: error instanceof Error ? error.message : String(error),
      });
      return accountId;
    }
  }
}
