// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  createAccountValidityRouter,
  createAccountValidityHandlers,
  type Requester,
  type ResolveRequester,
  type AccountValidityRouterOptions,
  type AccountValidityHandlers,
} from './account-validity.js';
