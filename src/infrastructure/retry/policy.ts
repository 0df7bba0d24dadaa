// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Retry with Backoff Implementation
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Retry policy implementation with:
// - Bounded total attempts
// - Exponential backoff with jitter, capped per attempt
// - Retry-after hints overriding the computed delay
// - AbortSignal cancellation before each attempt and during sleep
//
// The policy performs no I/O of its own. Observers subscribe through onRetry;
// the resilient executor is the logging decorator.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type DelaySource,
  type IsRetryable,
  type Operation,
  type RandomSource,
  type RetryAttempt,
  type RetryConfig,
  type RetryDependencies,
  type RetryOutcome,
  type RetryPolicy,
  type Sleeper,
  type BackoffCalculator,
  DEFAULT_RETRY_CONFIG,
  RetryCancelledError,
} from './types.js';
import { createBackoffCalculator, sleepWithAbort } from './backoff.js';
import { getRetryAfterMs, isRateLimitedError } from './classifiers.js';
import { tryCatchAsync } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY POLICY IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy implementation.
 */
export class RetryPolicyImpl implements RetryPolicy {
  private readonly config: RetryConfig;
  private readonly backoff: BackoffCalculator;
  private readonly sleep: Sleeper;

  constructor(config: Partial<RetryConfig> = {}, deps: RetryDependencies = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    validateRetryConfig(this.config);

    const random: RandomSource = deps.random ?? Math.random;
    this.backoff = createBackoffCalculator(this.config, random);
    this.sleep = deps.sleep ?? sleepWithAbort;
  }

  getConfig(): RetryConfig {
    return this.config;
  }

  /**
   * Execute with retry, rethrowing the final error unchanged.
   */
  async execute<T>(operation: Operation<T>, isRetryable: IsRetryable, signal?: AbortSignal): Promise<T> {
    const outcome = await this.executeWithResult(operation, isRetryable, signal);

    if (outcome.success) {
      return outcome.value;
    }

    throw outcome.error;
  }

  /**
   * Execute with retry, returning detailed result.
   */
  async executeWithResult<T>(
    operation: Operation<T>,
    isRetryable: IsRetryable,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>> {
    const history: RetryAttempt[] = [];
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return this.cancelled(attempt - 1, history, signal.reason);
      }

      const result = await tryCatchAsync(operation);

      if (result.ok) {
        history.push({ attempt });
        return { success: true, value: result.value, attempts: attempt, history };
      }

      const { error } = result;

      if (signal?.aborted) {
        history.push({ attempt, error });
        return this.cancelled(attempt, history, signal.reason);
      }

      if (!isRetryable(error)) {
        history.push({ attempt, error });
        return { success: false, error, attempts: attempt, history, reason: 'non_retryable' };
      }

      if (attempt >= maxAttempts) {
        history.push({ attempt, error });
        return { success: false, error, attempts: attempt, history, reason: 'max_attempts' };
      }

      const { delayMs, delaySource } = this.nextDelay(attempt, error);
      history.push({ attempt, error, delayMs });

      this.config.onRetry?.({ attempt, maxAttempts, error, delayMs, delaySource });

      const slept = await tryCatchAsync(() => this.sleep(delayMs, signal));
      if (!slept.ok) {
        return this.cancelled(attempt, history, signal?.reason ?? slept.error);
      }
    }
  }

  /**
   * Delay before the attempt following `attempt`.
   */
  private nextDelay(attempt: number, error: unknown): { delayMs: number; delaySource: DelaySource } {
    const hinted = getRetryAfterMs(error);
    if (hinted !== undefined) {
      return { delayMs: hinted, delaySource: 'retry_after' };
    }

    const { rateLimitDelayMs, isRateLimited } = this.config;
    if (rateLimitDelayMs !== undefined && isRateLimited?.(error)) {
      return { delayMs: rateLimitDelayMs, delaySource: 'rate_limit_default' };
    }

    return { delayMs: this.backoff.calculate(attempt), delaySource: 'backoff' };
  }

  private cancelled<T>(attempts: number, history: RetryAttempt[], reason: unknown): RetryOutcome<T> {
    return {
      success: false,
      error: new RetryCancelledError(attempts, reason),
      attempts,
      history,
      reason: 'cancelled',
    };
  }
}

/**
 * @throws RangeError when a bound is out of range
 */
export function validateRetryConfig(config: RetryConfig): void {
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${config.maxAttempts}`);
  }
  if (config.initialDelayMs < 0 || config.maxDelayMs < 0) {
    throw new RangeError('Backoff delays must not be negative');
  }
  if (config.backoffFactor <= 1) {
    throw new RangeError(`backoffFactor must be > 1, got ${config.backoffFactor}`);
  }
  if (config.jitterFraction < 0 || config.jitterFraction > 1) {
    throw new RangeError(`jitterFraction must be within [0, 1], got ${config.jitterFraction}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a retry policy with custom configuration.
 */
export function createRetryPolicy(config?: Partial<RetryConfig>, deps?: RetryDependencies): RetryPolicy {
  return new RetryPolicyImpl(config, deps);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVENIENCE FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One-shot retry of an operation.
 */
export async function retry<T>(
  operation: Operation<T>,
  isRetryable: IsRetryable,
  config?: Partial<RetryConfig>,
  deps?: RetryDependencies
): Promise<T> {
  return createRetryPolicy(config, deps).execute(operation, isRetryable);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PRESETS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Preset configurations for provisioning calls.
 */
export const RetryPresets = {
  /** Most provisioning API calls */
  standard: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60_000,
    backoffFactor: 2,
    jitterFraction: 0.1,
  },

  /** Throttled endpoints; waits a full minute on 429 without a hint */
  rateLimited: {
    maxAttempts: 5,
    initialDelayMs: 2000,
    maxDelayMs: 120_000,
    backoffFactor: 2,
    jitterFraction: 0.1,
    rateLimitDelayMs: 60_000,
    isRateLimited: isRateLimitedError,
  },
} as const satisfies Record<string, Partial<RetryConfig>>;
