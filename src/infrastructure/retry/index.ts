// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export {
  // Callables
  type Operation,
  type IsRetryable,
  type Sleeper,
  type RandomSource,

  // Configuration
  type RetryConfig,
  type RetryDependencies,
  DEFAULT_RETRY_CONFIG,

  // Events
  type DelaySource,
  type RetryEvent,

  // Result
  type RetryAttempt,
  type RetryFailureReason,
  type RetryOutcome,

  // Errors
  RetryCancelledError,

  // Interfaces
  type RetryPolicy,
  type BackoffCalculator,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

export {
  type BackoffSettings,
  computeBackoffDelay,
  applyJitter,
  BackoffCalculatorImpl,
  createBackoffCalculator,
  sleepWithAbort,
  formatDelay,
} from './backoff.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIERS
// ─────────────────────────────────────────────────────────────────────────────────

export {
  RETRYABLE_STATUS_CODES,
  TRANSIENT_ERROR_CODES,
  getStatusCode,
  getErrorCode,
  getRetryAfterMs,
  isRateLimitedError,
  httpStatusClassifier,
  errorCodeClassifier,
  anyOf,
  isTransientError,
} from './classifiers.js';

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

export {
  RetryPolicyImpl,
  validateRetryConfig,
  createRetryPolicy,
  retry,
  RetryPresets,
} from './policy.js';
