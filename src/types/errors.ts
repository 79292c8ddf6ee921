// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY ERRORS — Error Codes and Error Class
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppError } from './result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CODES
// ─────────────────────────────────────────────────────────────────────────────────

export const ValidityErrorCode = {
  /** Lookup miss; the renewal engine turns this into an Invalid outcome */
  NOT_FOUND: 'NOT_FOUND',
  /** Uniqueness violation on a token write */
  TOKEN_CONFLICT: 'TOKEN_CONFLICT',
  /** Token issuance ran out of attempts */
  TOKEN_EXHAUSTED: 'TOKEN_EXHAUSTED',
  /** Malformed duration or configuration value */
  INVALID_FORMAT: 'INVALID_FORMAT',
  /** Required configuration value absent */
  MISSING_CONFIG: 'MISSING_CONFIG',
  /** Renewal e-mail requested for an untracked account */
  MISSING_EXPIRATION: 'MISSING_EXPIRATION',
  /** No address accepted the renewal e-mail */
  DELIVERY_FAILED: 'DELIVERY_FAILED',
} as const;

export type ValidityErrorCode = typeof ValidityErrorCode[keyof typeof ValidityErrorCode];

/**
 * HTTP status each code maps to when surfaced to a caller.
 */
export const VALIDITY_ERROR_STATUS: Record<ValidityErrorCode, number> = {
  NOT_FOUND: 404,
  TOKEN_CONFLICT: 409,
  TOKEN_EXHAUSTED: 500,
  INVALID_FORMAT: 500,
  MISSING_CONFIG: 500,
  MISSING_EXPIRATION: 400,
  DELIVERY_FAILED: 502,
};

/**
 * Expected store failures returned inside a Result.
 */
export type StoreError = AppError<'NOT_FOUND' | 'TOKEN_CONFLICT'>;

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class AccountValidityError extends Error {
  readonly name = 'AccountValidityError';
  readonly code: ValidityErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ValidityErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.code = code;
    this.statusCode = VALIDITY_ERROR_STATUS[code];
    this.details = options?.details;
  }

  /**
   * Raise an expected store failure as an exception.
   */
  static fromStoreError(error: StoreError): AccountValidityError {
    return new AccountValidityError(error.code, error.message, { details: error.context });
  }
}

export function isAccountValidityError(error: unknown): error is AccountValidityError {
  return error instanceof AccountValidityError;
}
