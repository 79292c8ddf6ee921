// ═══════════════════════════════════════════════════════════════════════════════
// LOG REDACTION — Sensitive Keys and E-mail Addresses
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Redaction options.
 */
export interface RedactionOptions {
  /** Key fragments (lower-case) whose values are replaced entirely */
  sensitiveKeys?: readonly string[];

  /** Replace e-mail addresses found inside string values */
  redactEmails?: boolean;

  /** Maximum object depth walked before giving up */
  maxDepth?: number;
}

export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'key',
  'authorization',
];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

export const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string, sensitiveKeys: readonly string[]): boolean {
  const lowerKey = key.toLowerCase();
  return sensitiveKeys.some((fragment) => lowerKey.includes(fragment));
}

function redactValue(
  value: unknown,
  options: Required<RedactionOptions>,
  depth: number
): unknown {
  if (depth > options.maxDepth) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return options.redactEmails ? value.replace(EMAIL_PATTERN, '[EMAIL]') : value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, options, depth + 1));
  }

  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, options.sensitiveKeys)
        ? REDACTED
        : redactValue(inner, options, depth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Return a copy of a log entry with sensitive values replaced.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const resolved: Required<RedactionOptions> = {
    sensitiveKeys: options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS,
    redactEmails: options.redactEmails ?? true,
    maxDepth: options.maxDepth ?? 5,
  };

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    result[key] = isSensitiveKey(key, resolved.sensitiveKeys)
      ? REDACTED
      : redactValue(value, resolved, 1);
  }
  return result;
}
