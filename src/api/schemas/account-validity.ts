// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY SCHEMAS — Request Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

const TokenSchema = z
  .string({ required_error: 'Token is required' })
  .trim()
  .min(1, 'Token is required')
  .max(256, 'Token is too long');

/**
 * @example
 * GET /account_validity/renew?token=abcdef...
 */
export const RenewQuerySchema = z.object({
  token: TokenSchema,
});

/**
 * @example
 * POST /account_validity/renew
 * { "token": "12345678" }
 */
export const RenewBodySchema = z.object({
  token: TokenSchema,
});

/**
 * @example
 * POST /account_validity/admin
 * { "user_id": "@alice:example.test", "expiration_ts": 1700000000000, "enable_renewal_emails": false }
 */
export const AdminValidityBodySchema = z.object({
  user_id: z.string({ required_error: 'user_id is required' }).min(1, 'user_id is required'),
  expiration_ts: z.number().int().nonnegative().optional(),
  enable_renewal_emails: z.boolean().optional().default(true),
});

export type RenewQuery = z.infer<typeof RenewQuerySchema>;
export type RenewBody = z.infer<typeof RenewBodySchema>;
export type AdminValidityBody = z.infer<typeof AdminValidityBodySchema>;
