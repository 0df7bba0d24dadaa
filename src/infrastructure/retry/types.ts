// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Types and Configuration
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { EngineError, ErrorCode } from '../../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CALLABLES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Zero-argument remote call. Invoked afresh on every attempt.
 */
export type Operation<T> = () => Promise<T>;

/**
 * Classifies a failure as transient. Supplied by every call site; the policy
 * has no built-in opinion about which errors are retryable.
 */
export type IsRetryable = (error: unknown) => boolean;

/**
 * Timer-based sleep. Rejects if the signal aborts before the delay elapses.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Uniform random source in [0, 1).
 */
export type RandomSource = () => number;

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy configuration.
 */
export interface RetryConfig {
  /** Total attempts, including the first (≥ 1) */
  readonly maxAttempts: number;

  /** Delay before the second attempt in ms */
  readonly initialDelayMs: number;

  /** Cap on any computed backoff delay in ms */
  readonly maxDelayMs: number;

  /** Exponential growth factor (> 1) */
  readonly backoffFactor: number;

  /** Relative jitter applied to each delay (0–1) */
  readonly jitterFraction: number;

  /**
   * Delay used when a failure is rate-limited but carries no retry-after hint.
   * Only applies together with `isRateLimited`.
   */
  readonly rateLimitDelayMs?: number;

  /** Identifies rate-limit failures for `rateLimitDelayMs` */
  readonly isRateLimited?: (error: unknown) => boolean;

  /** Called before each backoff sleep */
  readonly onRetry?: (event: RetryEvent) => void;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffFactor: 2,
  jitterFraction: 0.1,
};

/**
 * Injectable collaborators, replaced by deterministic fakes in tests.
 */
export interface RetryDependencies {
  readonly sleep?: Sleeper;
  readonly random?: RandomSource;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Where a backoff delay came from.
 */
export type DelaySource = 'backoff' | 'retry_after' | 'rate_limit_default';

/**
 * Emitted after a retryable failure, before sleeping.
 */
export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;

  readonly maxAttempts: number;

  readonly error: unknown;

  /** Delay before the next attempt in ms */
  readonly delayMs: number;

  readonly delaySource: DelaySource;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One attempt within a single execute call.
 */
export interface RetryAttempt {
  /** 1-based */
  readonly attempt: number;

  /** Absent when the attempt succeeded */
  readonly error?: unknown;

  /** Sleep that followed this attempt, absent on the final one */
  readonly delayMs?: number;
}

export type RetryFailureReason = 'max_attempts' | 'non_retryable' | 'cancelled';

/**
 * Explicit outcome of a retried operation.
 */
export type RetryOutcome<T> =
  | {
      readonly success: true;
      readonly value: T;
      readonly attempts: number;
      readonly history: readonly RetryAttempt[];
    }
  | {
      readonly success: false;
      readonly error: unknown;
      readonly attempts: number;
      readonly history: readonly RetryAttempt[];
      readonly reason: RetryFailureReason;
    };

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Raised when the caller's AbortSignal fires. Never retried.
 */
export class RetryCancelledError extends EngineError {
  readonly name = 'RetryCancelledError';
  readonly code = ErrorCode.RETRY_CANCELLED;

  constructor(readonly attempts: number, reason: unknown) {
    super(`Retry cancelled after ${attempts} attempt(s)`, { cause: reason });
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy interface.
 */
export interface RetryPolicy {
  /**
   * Run with retry. Resolves with the first success; otherwise rejects with
   * the final error exactly as the operation threw it.
   */
  execute<T>(operation: Operation<T>, isRetryable: IsRetryable, signal?: AbortSignal): Promise<T>;

  /** Run with retry and report the outcome instead of throwing */
  executeWithResult<T>(
    operation: Operation<T>,
    isRetryable: IsRetryable,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>>;

  getConfig(): RetryConfig;
}

/**
 * Backoff calculator interface.
 */
export interface BackoffCalculator {
  /** Delay before the next attempt, before jitter */
  baseDelay(attempt: number): number;

  /** Delay before the next attempt, jittered and clamped */
  calculate(attempt: number): number;
}
