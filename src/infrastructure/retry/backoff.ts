// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Jitter
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// delay(attempt) = min(maxDelay, initialDelay * factor^(attempt - 1))
// jittered       = delay * (1 ± jitterFraction * random()), clamped to [0, maxDelay]
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffCalculator, RandomSource, RetryConfig } from './types.js';

export type BackoffSettings = Pick<
  RetryConfig,
  'initialDelayMs' | 'maxDelayMs' | 'backoffFactor' | 'jitterFraction'
>;

// ─────────────────────────────────────────────────────────────────────────────────
// PURE FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Un-jittered delay after the given failed attempt (1-based).
 */
export function computeBackoffDelay(
  attempt: number,
  settings: Pick<BackoffSettings, 'initialDelayMs' | 'maxDelayMs' | 'backoffFactor'>
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(settings.maxDelayMs, settings.initialDelayMs * Math.pow(settings.backoffFactor, exponent));
}

/**
 * Spread a delay by ±jitterFraction. The sign and the magnitude each take
 * one draw from `random`.
 */
export function applyJitter(
  delayMs: number,
  jitterFraction: number,
  maxDelayMs: number,
  random: RandomSource = Math.random
): number {
  if (jitterFraction <= 0) {
    return delayMs;
  }
  const sign = random() < 0.5 ? -1 : 1;
  const jittered = delayMs * (1 + sign * jitterFraction * random());
  return Math.min(maxDelayMs, Math.max(0, jittered));
}

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF CALCULATOR IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class BackoffCalculatorImpl implements BackoffCalculator {
  constructor(
    private readonly settings: BackoffSettings,
    private readonly random: RandomSource = Math.random
  ) {}

  baseDelay(attempt: number): number {
    return computeBackoffDelay(attempt, this.settings);
  }

  calculate(attempt: number): number {
    return applyJitter(
      this.baseDelay(attempt),
      this.settings.jitterFraction,
      this.settings.maxDelayMs,
      this.random
    );
  }
}

export function createBackoffCalculator(
  settings: BackoffSettings,
  random?: RandomSource
): BackoffCalculator {
  return new BackoffCalculatorImpl(settings, random);
}

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Sleep with abort support. Rejects with the signal's reason on abort.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
