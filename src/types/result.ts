// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Handling of Expected Failures
// ═══════════════════════════════════════════════════════════════════════════════
//
// Store operations whose failure is part of the normal flow (a token that does
// not exist, a token already owned by someone else) return a Result instead of
// throwing. Faults of the backing store still throw.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * @example
 * ```typescript
 * const resolved = await store.resolveToken(token);
 * if (!resolved.ok) {
 *   return INVALID_OUTCOME;
 * }
 * console.log(resolved.value.expirationTs);
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Async Result type — Promise that resolves to a Result.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Create a success Result with no value (void).
 */
export function okVoid(): Ok<void> {
  return { ok: true, value: undefined };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON ERROR TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Application error value carried inside an Err.
 */
export interface AppError<C extends string = string> {
  readonly code: C;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

/**
 * Create an AppError.
 */
export function appError<C extends string>(
  code: C,
  message: string,
  context?: Record<string, unknown>
): AppError<C> {
  return context ? { code, message, context } : { code, message };
}
