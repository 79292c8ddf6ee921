// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE INDEX — Graceful Shutdown Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ShutdownPriority,
  PRIORITY_ORDER,
  type ShutdownHookFn,
  type ShutdownHook,
  type HookResult,
  type ShutdownResult,
  registerShutdownHook,
  clearShutdownHooks,
  executeShutdownHooks,
  createServerCloseHook,
  createDisconnectHook,
} from './hooks.js';

export {
  type ShutdownConfig,
  DEFAULT_SHUTDOWN_CONFIG,
  configureShutdown,
  installSignalHandlers,
  initiateShutdown,
  shouldAcceptRequests,
  resetShutdownState,
} from './handler.js';
