// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Outcomes
// Provisioning Resilience Engine — Core Types
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
 * Used wherever a failure is an expected outcome the caller must inspect,
 * rather than an exception that unwinds the stack.
 *
 * @example
 * ```typescript
 * const outcome = await runDeployment('analytics', async (tx) => provision(tx));
 * if (!outcome.ok) {
 *   escalate(outcome.error, outcome.rollback);
 * }
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

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run an async function, capturing a rejection as Err.
 * The rejection value is passed through untouched so callers can still
 * inspect the root cause.
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): AsyncResult<T, unknown> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(error);
  }
}

/**
 * Normalize an unknown thrown value into an Error for logging and records.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
