// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY SERVICE — Public Surface
// ═══════════════════════════════════════════════════════════════════════════════

export * from './services/account-validity/index.js';
export { createApp, startServer, ROUTE_PREFIX, type AppOptions, type HostCollaborators, type RunningServer } from './server.js';
export { createAccountValidityRouter, type Requester, type ResolveRequester } from './api/routes/index.js';
export { errorHandler, ApiError } from './api/middleware/error-handler.js';
export {
  loadConfig,
  validateConfig,
  resetConfig,
  parseDuration,
  type AccountValidityConfig,
  type AccountValidityConfigInput,
} from './config/index.js';
export { AccountValidityError, ValidityErrorCode, isAccountValidityError } from './types/errors.js';
export { initiateShutdown } from './infrastructure/shutdown/index.js';
export { configureLogger, getLogger } from './observability/logging/index.js';
