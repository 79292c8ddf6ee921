// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY TYPES — Records, Outcomes, Host Collaborators
// ═══════════════════════════════════════════════════════════════════════════════

import type { TokenFormat } from './tokens.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RECORDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validity state of one account.
 */
export interface ValidityRecord {
  readonly accountId: string;

  /** Moment after which the account is expired (ms since epoch) */
  readonly expirationTs: number;

  /** A renewal notice went out since the last extension */
  readonly notified: boolean;

  /** Current renewal token; regeneration overwrites it */
  readonly renewalToken: string | null;

  /** When the current token was consumed; null while unused */
  readonly tokenUsedTs: number | null;
}

/**
 * Row returned by a token lookup.
 */
export interface ResolvedToken {
  readonly accountId: string;
  readonly expirationTs: number;
  readonly tokenUsedTs: number | null;
}

/**
 * Outcome of the atomic consume-and-extend step.
 */
export type ConsumeResult =
  | { readonly status: 'renewed'; readonly expirationTs: number }
  | { readonly status: 'stale'; readonly expirationTs: number }
  | { readonly status: 'not_found' };

/**
 * Account selected by the expiry scan.
 */
export interface ExpiringAccount {
  readonly accountId: string;
  readonly expirationTs: number | null;
}

/**
 * Validity row carried over from a host's earlier tracking table.
 */
export interface LegacyValidity {
  readonly accountId: string;
  readonly expirationTs: number;
  readonly notified: boolean;
  readonly renewalToken: string | null;
  readonly tokenUsedTs: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTCOMES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Result of presenting a renewal token.
 *
 * Valid and stale are mutually exclusive; both false means the token was not
 * recognised, and then `expirationTs` is 0.
 */
export interface RenewalOutcome {
  readonly valid: boolean;
  readonly stale: boolean;
  readonly expirationTs: number;
}

export const INVALID_OUTCOME: RenewalOutcome = Object.freeze({
  valid: false,
  stale: false,
  expirationTs: 0,
});

export interface NotificationResult {
  readonly accountId: string;
  /** Addresses the message was handed to successfully */
  readonly sent: number;
  /** Addresses the transport refused or threw on */
  readonly failed: number;
  /** Format of the token issued, or null when nothing was issued */
  readonly tokenFormat: TokenFormat | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HOST COLLABORATORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Profile and contact lookups owned by the host.
 */
export interface AccountDirectory {
  /** Verified e-mail addresses attached to the account */
  getEmailAddresses(accountId: string): Promise<readonly string[]>;

  /** Profile display name, if the account has one */
  getDisplayName(accountId: string): Promise<string | null>;
}

/**
 * Enumeration of host accounts, used by the bootstrap migration.
 */
export interface AccountSource {
  /** Account ids in a stable order */
  listAccountIds(offset: number, limit: number): Promise<readonly string[]>;

  /** Rows from an earlier validity table, for accounts that have one */
  getLegacyValidity?(accountIds: readonly string[]): Promise<readonly LegacyValidity[]>;
}

export interface MailMessage {
  readonly to: string;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
}

/**
 * Outbound mail transport. Resolves false (or throws) when the message
 * could not be handed off.
 */
export interface Mailer {
  send(message: MailMessage): Promise<boolean>;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
