// ═══════════════════════════════════════════════════════════════════════════════
// SECRETS TYPES — Secret Store and Cache Definitions
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { Clock } from '../../types/clock.js';
import type { FeatureToggle } from '../../config/feature-flags.js';
import type { IsRetryable, RetryPolicy } from '../retry/index.js';
import { EngineError, ErrorCode } from '../../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKENDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Remote secret store. `fetch` rejects when the secret cannot be read.
 */
export interface SecretStore {
  /** Store name for logging */
  readonly name: string;

  fetch(name: string): Promise<string>;

  /** Write a new value; read-only stores leave this out */
  put?(name: string, value: string): Promise<void>;
}

/**
 * Local configuration source consulted when the remote store is off or failing.
 */
export interface LocalSecretSource {
  readonly name: string;

  get(name: string): Promise<string | undefined>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHE
// ─────────────────────────────────────────────────────────────────────────────────

export interface CachedSecret {
  readonly value: string;
  readonly expiresAt: number;
}

export interface SecretCacheOptions {
  readonly store: SecretStore;
  readonly fallback: LocalSecretSource;

  /** Cache lifetime in ms (default: 1 hour) */
  readonly ttlMs?: number;

  readonly toggles?: FeatureToggle;

  /** Policy for remote fetches (default: standard preset); bypassed when useRetry is off */
  readonly retryPolicy?: RetryPolicy;

  /** Classifier for remote fetch errors (default: isTransientError) */
  readonly isRetryable?: IsRetryable;

  readonly now?: Clock;
}

export interface SecretCacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  readonly fallbacks: number;
  readonly ttlMs: number;
  readonly remoteEnabled: boolean;
}

export interface SecretCache {
  /** Secret value, or undefined when neither the store nor the fallback has it */
  get(name: string): Promise<string | undefined>;

  /** @throws SecretNotFoundError */
  require(name: string): Promise<string>;

  /**
   * Write to the remote store and drop the cached entry.
   * @throws SecretStoreError when the remote store is disabled or read-only
   */
  set(name: string, value: string): Promise<void>;

  invalidate(name: string): boolean;
  clear(): void;
  getStats(): SecretCacheStats;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class SecretNotFoundError extends EngineError {
  readonly name = 'SecretNotFoundError';
  readonly code = ErrorCode.SECRET_NOT_FOUND;

  constructor(
    readonly secretName: string,
    options?: { cause?: unknown }
  ) {
    super(`Secret '${secretName}' not found`, options);
  }
}

/**
 * The store answered but the secret could not be used.
 */
export class SecretStoreError extends EngineError {
  readonly name = 'SecretStoreError';
  readonly code = ErrorCode.SECRET_STORE_ERROR;

  constructor(
    readonly store: string,
    readonly secretName: string,
    message: string
  ) {
    super(`${store}: ${message} (secret '${secretName}')`);
  }
}
