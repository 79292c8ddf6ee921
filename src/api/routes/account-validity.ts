// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY ROUTES — Renewal, Renewal E-mail, Admin
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET   /renew?token=…   Renew with a link token (no authentication); HTML page
//   POST  /renew           Renew with a token; authenticated caller optional
//   POST  /send_mail       Send the caller a fresh renewal e-mail
//   POST  /admin           Set an account's validity (administrators)
//
// Authentication is the host's: `resolveRequester` maps a request to the
// calling account, or null.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { z } from 'zod';
import { getLogger } from '../../observability/logging/index.js';
import {
  buildRenewalPage,
  type AccountValidityService,
  type RenewalOutcome,
} from '../../services/account-validity/index.js';
import {
  asyncHandler,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
} from '../middleware/error-handler.js';
import {
  RenewQuerySchema,
  RenewBodySchema,
  AdminValidityBodySchema,
} from '../schemas/index.js';

const logger = getLogger({ component: 'validity-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Authenticated caller of a request.
 */
export interface Requester {
  readonly accountId: string;
  readonly isAdmin: boolean;
}

export type ResolveRequester = (req: Request) => Promise<Requester | null>;

export interface AccountValidityRouterOptions {
  service: AccountValidityService;
  resolveRequester: ResolveRequester;

  /** Application name shown on the renewal pages */
  appName: string;
}

type Handler = (req: Request, res: Response) => Promise<void>;

export interface AccountValidityHandlers {
  renewWithLink: Handler;
  renew: Handler;
  sendMail: Handler;
  setValidity: Handler;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => issue.message).join(', '),
      { fields: result.error.flatten().fieldErrors }
    );
  }
  return result.data;
}

/**
 * Valid and stale outcomes answer 200; an unknown token answers 404.
 */
function sendOutcome(res: Response, outcome: RenewalOutcome): void {
  res.status(outcome.valid || outcome.stale ? 200 : 404).json({
    valid: outcome.valid,
    stale: outcome.stale,
    expiration_ts: outcome.expirationTs,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function createAccountValidityHandlers(
  options: AccountValidityRouterOptions
): AccountValidityHandlers {
  const { service, resolveRequester, appName } = options;

  const requireRequester = async (req: Request): Promise<Requester> => {
    const requester = await resolveRequester(req);
    if (!requester) {
      throw new UnauthorizedError();
    }
    return requester;
  };

  return {
    async renewWithLink(req, res) {
      const { token } = parseInput(RenewQuerySchema, req.query);
      const page = buildRenewalPage(appName, await service.renew(token));
      res.status(page.status).type('html').send(page.html);
    },

    async renew(req, res) {
      const { token } = parseInput(RenewBodySchema, req.body);
      const requester = await resolveRequester(req);
      sendOutcome(res, await service.renew(token, requester?.accountId));
    },

    async sendMail(req, res) {
      const requester = await requireRequester(req);
      await service.sendRenewalEmail(requester.accountId);
      res.json({});
    },

    async setValidity(req, res) {
      const requester = await requireRequester(req);
      if (!requester.isAdmin) {
        throw new ForbiddenError('Administrator access required');
      }

      const body = parseInput(AdminValidityBodySchema, req.body);
      logger.info('Admin validity update', { admin: requester.accountId, accountId: body.user_id });

      const expirationTs = await service.adminSetValidity({
        accountId: body.user_id,
        expirationTs: body.expiration_ts,
        enableRenewalEmails: body.enable_renewal_emails,
      });
      res.json({ expiration_ts: expirationTs });
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createAccountValidityRouter(options: AccountValidityRouterOptions): Router {
  const router = Router();
  const handlers = createAccountValidityHandlers(options);

  router.get('/renew', asyncHandler(handlers.renewWithLink));
  router.post('/renew', asyncHandler(handlers.renew));
  router.post('/send_mail', asyncHandler(handlers.sendMail));
  router.post('/admin', asyncHandler(handlers.setValidity));

  return router;
}
