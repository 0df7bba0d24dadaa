// ═══════════════════════════════════════════════════════════════════════════════
// RETRY CLASSIFIERS — Opt-In Retryable Error Predicates
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// None of these are applied implicitly. A call site picks one (or combines
// several with anyOf) and passes it as `isRetryable`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { IsRetryable } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

/** Timeout, throttling and upstream-unavailable responses */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];

/** Node socket and DNS errors that usually clear on their own */
export const TRANSIENT_ERROR_CODES: readonly string[] = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
];

// ─────────────────────────────────────────────────────────────────────────────────
// PROPERTY READERS
// ─────────────────────────────────────────────────────────────────────────────────

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function readNumber(value: unknown, key: string): number | undefined {
  const property = readProperty(value, key);
  return typeof property === 'number' && Number.isFinite(property) ? property : undefined;
}

/**
 * HTTP status carried by an error: `status`, `statusCode`, or the AWS SDK's
 * `$metadata.httpStatusCode`.
 */
export function getStatusCode(error: unknown): number | undefined {
  return readNumber(error, 'status')
    ?? readNumber(error, 'statusCode')
    ?? readNumber(readProperty(error, '$metadata'), 'httpStatusCode');
}

/**
 * Node-style string error code (`ECONNRESET`, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  const code = readProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Explicit rate-limit hint in ms, read from `retryAfterMs` or
 * `retryAfterSeconds`. Negative values are ignored.
 */
export function getRetryAfterMs(error: unknown): number | undefined {
  const ms = readNumber(error, 'retryAfterMs');
  if (ms !== undefined && ms >= 0) {
    return ms;
  }
  const seconds = readNumber(error, 'retryAfterSeconds');
  if (seconds !== undefined && seconds >= 0) {
    return seconds * 1000;
  }
  return undefined;
}

export function isRateLimitedError(error: unknown): boolean {
  return getStatusCode(error) === 429;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIER FACTORIES
// ─────────────────────────────────────────────────────────────────────────────────

export function httpStatusClassifier(statuses: readonly number[] = RETRYABLE_STATUS_CODES): IsRetryable {
  const retryable = new Set(statuses);
  return (error) => {
    const status = getStatusCode(error);
    return status !== undefined && retryable.has(status);
  };
}

export function errorCodeClassifier(codes: readonly string[] = TRANSIENT_ERROR_CODES): IsRetryable {
  const retryable = new Set(codes);
  return (error) => {
    const code = getErrorCode(error);
    return code !== undefined && retryable.has(code);
  };
}

/**
 * Retryable when any of the given classifiers says so.
 */
export function anyOf(...classifiers: IsRetryable[]): IsRetryable {
  return (error) => classifiers.some(classify => classify(error));
}

/**
 * HTTP status or transient socket error, the usual choice for a remote
 * provisioning API.
 */
export const isTransientError: IsRetryable = anyOf(httpStatusClassifier(), errorCodeClassifier());
