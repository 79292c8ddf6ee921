// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Graceful Shutdown Coordinator
// ═══════════════════════════════════════════════════════════════════════════════
//
// Signal handling, a global timeout over the hook run, and the exit code.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { executeShutdownHooks, type ShutdownResult } from './hooks.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShutdownConfig {
  /** Total timeout for shutdown in ms */
  readonly timeoutMs: number;

  readonly signals: NodeJS.Signals[];

  readonly exitCodeSuccess: number;
  readonly exitCodeFailure: number;
  readonly exitCodeTimeout: number;

  /** Whether to call process.exit() */
  readonly exitProcess: boolean;

  /** Called when shutdown completes */
  readonly onShutdownComplete?: (result: ShutdownResult) => void;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 30000,
  signals: ['SIGTERM', 'SIGINT'],
  exitCodeSuccess: 0,
  exitCodeFailure: 1,
  exitCodeTimeout: 124,
  exitProcess: true,
};

interface ShutdownState {
  readonly isShuttingDown: boolean;
  readonly shutdownStartedAt?: number;
  readonly signal?: string;
  readonly result?: ShutdownResult;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLER STATE
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'shutdown' });

let config: ShutdownConfig = { ...DEFAULT_SHUTDOWN_CONFIG };
let state: ShutdownState = { isShuttingDown: false };
let handlersInstalled = false;
let shutdownPromise: Promise<ShutdownResult> | null = null;

export function configureShutdown(options: Partial<ShutdownConfig>): void {
  config = { ...config, ...options };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SIGNAL HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function installSignalHandlers(): void {
  if (handlersInstalled) {
    logger.warn('Signal handlers already installed');
    return;
  }

  for (const signal of config.signals) {
    process.on(signal, () => handleSignal(signal));
  }

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    if (state.isShuttingDown) {
      forceExit('unhandled_rejection');
    }
  });

  handlersInstalled = true;
  logger.debug('Signal handlers installed', { signals: config.signals });
}

function handleSignal(signal: string): void {
  if (state.isShuttingDown) {
    logger.warn('Received signal during shutdown, ignoring', { signal });
    return;
  }

  logger.info('Received shutdown signal', { signal });
  initiateShutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error, { signal });
    forceExit('shutdown_failed');
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// SHUTDOWN EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Initiate graceful shutdown. Repeated calls share one run.
 */
export function initiateShutdown(reason = 'manual'): Promise<ShutdownResult> {
  if (!shutdownPromise) {
    shutdownPromise = performShutdown(reason);
  }
  return shutdownPromise;
}

async function performShutdown(reason: string): Promise<ShutdownResult> {
  state = { isShuttingDown: true, shutdownStartedAt: Date.now(), signal: reason };
  logger.info('Starting graceful shutdown', { reason, timeoutMs: config.timeoutMs });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<ShutdownResult>((resolve) => {
    timer = setTimeout(() => resolve({
      success: false,
      totalDurationMs: config.timeoutMs,
      hooks: [],
      failed: ['timeout'],
      timedOut: ['global'],
    }), config.timeoutMs);
  });

  const result = await Promise.race([executeShutdownHooks(), timeoutPromise]);
  clearTimeout(timer);

  state = { ...state, result };

  let exitCode: number;
  if (result.timedOut.includes('global')) {
    exitCode = config.exitCodeTimeout;
    logger.error('Shutdown timed out', undefined, { timeoutMs: config.timeoutMs });
  } else if (result.success) {
    exitCode = config.exitCodeSuccess;
    logger.info('Graceful shutdown completed', {
      totalDurationMs: result.totalDurationMs,
      hooksExecuted: result.hooks.length,
    });
  } else {
    exitCode = config.exitCodeFailure;
    logger.warn('Shutdown completed with failures', { failed: result.failed });
  }

  config.onShutdownComplete?.(result);

  if (config.exitProcess) {
    process.exit(exitCode);
  }

  return result;
}

function forceExit(reason: string): void {
  logger.error('Forcing exit', undefined, { reason });
  process.exit(config.exitCodeFailure);
}

/**
 * Whether the service should take new work.
 */
export function shouldAcceptRequests(): boolean {
  return !state.isShuttingDown;
}

/**
 * Reset shutdown state (for testing).
 */
export function resetShutdownState(): void {
  state = { isShuttingDown: false };
  shutdownPromise = null;
}
