// ═══════════════════════════════════════════════════════════════════════════════
// RENEWAL TOKENS — Generation and Format Classification
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two formats:
//   link   — 32 ASCII letters, delivered in a URL, unique across all accounts
//   manual — 8 digits, typed in by the user, unique per account only
//
// Generators do not check uniqueness; the store rejects collisions.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { randomInt } from 'node:crypto';

export type TokenFormat = 'link' | 'manual';

export const LINK_TOKEN_LENGTH = 32;
export const MANUAL_TOKEN_LENGTH = 8;

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

export const LINK_TOKEN_PATTERN = /^[a-zA-Z]{32}$/;
export const MANUAL_TOKEN_PATTERN = /^[0-9]{8}$/;

const DIGITS_ONLY = /^[0-9]+$/;

function randomString(alphabet: string, length: number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += alphabet.charAt(randomInt(alphabet.length));
  }
  return result;
}

export function generateLinkToken(): string {
  return randomString(LETTERS, LINK_TOKEN_LENGTH);
}

export function generateManualToken(): string {
  return randomString(DIGITS, MANUAL_TOKEN_LENGTH);
}

export function generateToken(format: TokenFormat): string {
  return format === 'manual' ? generateManualToken() : generateLinkToken();
}

/**
 * Digit-only tokens are manual codes; everything else is treated as a link
 * token and is subject to global uniqueness.
 */
export function classifyToken(token: string): TokenFormat {
  return DIGITS_ONLY.test(token) ? 'manual' : 'link';
}
