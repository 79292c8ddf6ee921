// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Account Validity Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Configuration is validated once, before anything starts. A missing required
// value fails with MISSING_CONFIG, a malformed one with INVALID_FORMAT.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { parseDuration } from './duration.js';
import { AccountValidityError } from '../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

function envBool(env: Env, key: string): boolean | string | undefined {
  const value = env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  return value;
}

/**
 * Integer strings become numbers; anything else passes through for the
 * schema to accept (durations) or reject.
 */
function envNumber(env: Env, key: string): number | string | undefined {
  const value = env[key]?.trim();
  if (value === undefined || value === '') return undefined;
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
}

function envString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Duration given as milliseconds or as a suffixed string ("6w").
 */
const DurationSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  })
  .pipe(z.number().int().positive('Duration must be positive'));

export const AccountValidityConfigSchema = z.object({
  /** Length of one validity period */
  period: DurationSchema,

  /** Notice window before expiration in which renewal e-mails go out */
  renewAt: DurationSchema,

  /** Send clickable link tokens (true) or 8-digit manual codes (false) */
  sendLinks: z.boolean().default(true),

  /** Public base URL renewal links are built from */
  publicBaseUrl: z.string().url(),

  /** Path of the renewal endpoint below the public base URL */
  renewPath: z.string().startsWith('/').default('/account_validity/renew'),

  /** Application name used in the e-mail subject */
  appName: z.string().min(1).default('Account Service'),

  /** Subject template; `{app}` is replaced by the application name */
  renewEmailSubject: z.string().min(1).default('Renew your {app} account'),

  /** Interval between expiry scans */
  scanInterval: DurationSchema.default('30m'),

  /** Accounts handled per bootstrap migration batch */
  populateBatchSize: z.number().int().positive().default(100),

  /** Run the bootstrap migration when the service starts */
  populateOnStart: z.boolean().default(true),

  /** Link-token issuance attempts before giving up */
  maxTokenAttempts: z.number().int().positive().default(5),

  /** Capacity of the expiration lookup cache */
  cacheMaxEntries: z.number().int().positive().default(10_000),

  redis: z
    .object({
      url: z.string().min(1).default('redis://localhost:6379'),
      keyPrefix: z.string().min(1).default('validity'),
    })
    .default({}),

  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8080),
    })
    .default({}),
});

export type AccountValidityConfig = z.infer<typeof AccountValidityConfigSchema>;
export type AccountValidityConfigInput = z.input<typeof AccountValidityConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

function isMissingIssue(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.invalid_union) {
    return issue.unionErrors.every((unionError) => unionError.issues.some(isMissingIssue));
  }
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';
}

/**
 * Format zod issues as "path: message" lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object.
 */
export function validateConfig(input: unknown): AccountValidityConfig {
  const result = AccountValidityConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues.filter(isMissingIssue);
  const messages = formatConfigErrors(result.error);

  if (missing.length > 0) {
    throw new AccountValidityError(
      'MISSING_CONFIG',
      `Missing required configuration: ${missing.map((i) => i.path.join('.')).join(', ')}`,
      { details: { issues: messages } }
    );
  }

  throw new AccountValidityError(
    'INVALID_FORMAT',
    `Invalid configuration: ${messages.join('; ')}`,
    { details: { issues: messages } }
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build a raw configuration object from environment variables.
 * Unset variables stay undefined so schema defaults apply.
 */
export function readConfigFromEnv(env: Env = process.env): Record<string, unknown> {
  return {
    period: envNumber(env, 'ACCOUNT_VALIDITY_PERIOD'),
    renewAt: envNumber(env, 'ACCOUNT_VALIDITY_RENEW_AT'),
    sendLinks: envBool(env, 'ACCOUNT_VALIDITY_SEND_LINKS'),
    publicBaseUrl: envString(env, 'PUBLIC_BASEURL'),
    renewPath: envString(env, 'ACCOUNT_VALIDITY_RENEW_PATH'),
    appName: envString(env, 'APP_NAME'),
    renewEmailSubject: envString(env, 'ACCOUNT_VALIDITY_EMAIL_SUBJECT'),
    scanInterval: envNumber(env, 'ACCOUNT_VALIDITY_SCAN_INTERVAL'),
    populateBatchSize: envNumber(env, 'ACCOUNT_VALIDITY_POPULATE_BATCH_SIZE'),
    populateOnStart: envBool(env, 'ACCOUNT_VALIDITY_POPULATE_ON_START'),
    maxTokenAttempts: envNumber(env, 'ACCOUNT_VALIDITY_MAX_TOKEN_ATTEMPTS'),
    cacheMaxEntries: envNumber(env, 'ACCOUNT_VALIDITY_CACHE_MAX_ENTRIES'),
    redis: {
      url: envString(env, 'REDIS_URL'),
      keyPrefix: envString(env, 'REDIS_KEY_PREFIX'),
    },
    server: {
      port: envNumber(env, 'PORT'),
    },
  };
}

let cachedConfig: AccountValidityConfig | null = null;

/**
 * Load and validate configuration from the environment. Cached after the
 * first successful load.
 */
export function loadConfig(env: Env = process.env): AccountValidityConfig {
  if (!cachedConfig) {
    cachedConfig = validateConfig(readConfigFromEnv(env));
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export { parseDuration, DURATION_UNITS_MS, type DurationUnit } from './duration.js';
