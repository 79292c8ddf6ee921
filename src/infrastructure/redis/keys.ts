// ═══════════════════════════════════════════════════════════════════════════════
// REDIS KEYS — Validity Keyspace Builders
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Key builders for one validity keyspace.
 */
export interface ValidityKeyspace {
  /** Hash holding one account's record */
  account(accountId: string): string;

  /** Sorted set of not-yet-notified accounts scored by expiration */
  readonly pending: string;

  /** Prefix of link-token index keys (passed to scripts) */
  readonly tokenPrefix: string;

  /** Index key mapping a link token to its owner */
  token(token: string): string;
}

export class KeyError extends Error {
  readonly name = 'KeyError';
}

/**
 * Build the keyspace under `prefix` (e.g. "validity").
 */
export function createValidityKeyspace(prefix: string): ValidityKeyspace {
  if (prefix.length === 0 || /\s/.test(prefix)) {
    throw new KeyError(`Invalid key prefix: "${prefix}"`);
  }

  const tokenPrefix = `${prefix}:token:`;

  return {
    account: (accountId) => `${prefix}:account:${accountId}`,
    pending: `${prefix}:pending`,
    tokenPrefix,
    token: (token) => `${tokenPrefix}${token}`,
  };
}
