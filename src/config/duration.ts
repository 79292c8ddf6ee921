// ═══════════════════════════════════════════════════════════════════════════════
// DURATION PARSER — "6w", "1d", "30m" → milliseconds
// ═══════════════════════════════════════════════════════════════════════════════

import { AccountValidityError } from '../types/errors.js';

/**
 * Milliseconds per suffix. A year is fixed at 365 days.
 */
export const DURATION_UNITS_MS = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
  y: 365 * 24 * 60 * 60 * 1000,
} as const;

export type DurationUnit = keyof typeof DURATION_UNITS_MS;

const DURATION_PATTERN = /^([+-]?\d+)([smhdwy]?)$/;

function isDurationUnit(value: string): value is DurationUnit {
  return value in DURATION_UNITS_MS;
}

/**
 * Parse a duration into milliseconds.
 *
 * Integers are already milliseconds and come back unchanged. Strings are an
 * integer with an optional single-letter unit; without a unit the value is
 * milliseconds.
 */
export function parseDuration(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new AccountValidityError('INVALID_FORMAT', `Invalid duration: ${value}`);
    }
    return value;
  }

  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new AccountValidityError('INVALID_FORMAT', `Invalid duration: "${value}"`);
  }

  const [, amount = '', suffix = ''] = match;
  const multiplier = isDurationUnit(suffix) ? DURATION_UNITS_MS[suffix] : 1;

  const ms = parseInt(amount, 10) * multiplier;
  if (!Number.isSafeInteger(ms)) {
    throw new AccountValidityError('INVALID_FORMAT', `Duration out of range: "${value}"`);
  }
  return ms;
}
