// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HOOKS — Shutdown Hook Registry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Hooks run in priority groups, highest first; hooks in one group run in
// parallel. Each hook has its own timeout and a failing hook does not stop
// the others.
//
// Typical order for this service:
//   critical  http-server     stop accepting requests
//   high      account-validity stop the scanner, let the in-flight pass finish
//   normal    redis           close the connection
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'high', 'normal', 'low'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;

  /** Timeout in ms (0 = DEFAULT_HOOK_TIMEOUT_MS) */
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut?: boolean;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: HookResult[];
  readonly failed: string[];
  readonly timedOut: string[];
}

class HookTimeoutError extends Error {
  readonly name = 'HookTimeoutError';
}

// ─────────────────────────────────────────────────────────────────────────────────
// HOOKS REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

const hooks = new Map<string, ShutdownHook>();
const logger = getLogger({ component: 'shutdown' });

const DEFAULT_HOOK_TIMEOUT_MS = 5000;
let isShuttingDown = false;

export function registerShutdownHook(
  name: string,
  fn: ShutdownHookFn,
  options?: { priority?: ShutdownPriority; timeoutMs?: number }
): void {
  if (hooks.has(name)) {
    logger.warn('Overwriting existing shutdown hook', { name });
  }

  const priority = options?.priority ?? 'normal';
  hooks.set(name, { name, fn, priority, timeoutMs: options?.timeoutMs ?? 0 });
  logger.debug('Registered shutdown hook', { name, priority });
}

/**
 * Clear all hooks and the in-progress flag (for testing).
 */
export function clearShutdownHooks(): void {
  hooks.clear();
  isShuttingDown = false;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HOOK EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

async function executeHook(hook: ShutdownHook): Promise<HookResult> {
  const startTime = Date.now();
  const timeout = hook.timeoutMs > 0 ? hook.timeoutMs : DEFAULT_HOOK_TIMEOUT_MS;
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    await Promise.race([
      Promise.resolve().then(hook.fn),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new HookTimeoutError(`Hook ${hook.name} timed out`)), timeout);
      }),
    ]);

    const durationMs = Date.now() - startTime;
    logger.debug('Shutdown hook completed', { name: hook.name, durationMs });
    return { name: hook.name, success: true, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const timedOut = error instanceof HookTimeoutError;

    logger.error('Shutdown hook failed', error, { name: hook.name, durationMs, timedOut });

    return {
      name: hook.name,
      success: false,
      durationMs,
      error: error instanceof Error ? error : new Error(String(error)),
      timedOut,
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Execute all hooks in priority order.
 */
export async function executeShutdownHooks(): Promise<ShutdownResult> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress');
    return { success: false, totalDurationMs: 0, hooks: [], failed: [], timedOut: [] };
  }

  isShuttingDown = true;
  const startTime = Date.now();
  const results: HookResult[] = [];

  logger.info('Executing shutdown hooks', { count: hooks.size });

  for (const priority of PRIORITY_ORDER) {
    const group = Array.from(hooks.values()).filter((hook) => hook.priority === priority);
    if (group.length === 0) continue;

    results.push(...await Promise.all(group.map(executeHook)));
  }

  const failed = results.filter((r) => !r.success).map((r) => r.name);
  const timedOut = results.filter((r) => r.timedOut).map((r) => r.name);
  const totalDurationMs = Date.now() - startTime;

  logger.info('Shutdown hooks completed', {
    success: failed.length === 0,
    totalDurationMs,
    failed,
  });

  return { success: failed.length === 0, totalDurationMs, hooks: results, failed, timedOut };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Hook closing an HTTP server.
 */
export function createServerCloseHook(
  server: { close: (callback?: (err?: Error) => void) => void }
): ShutdownHookFn {
  return () => new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Hook closing a client connection (e.g. ioredis `quit`).
 */
export function createDisconnectHook(
  client: { quit: () => Promise<unknown> }
): ShutdownHookFn {
  return async () => {
    await client.quit();
  };
}
