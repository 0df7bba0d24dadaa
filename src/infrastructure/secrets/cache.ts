// ═══════════════════════════════════════════════════════════════════════════════
// SECRET CACHE — TTL Cache over a Remote Store with Local Fallback
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Lookup order:
//   1. Remote store disabled → local fallback
//   2. Fresh cache entry → cached value
//   3. Remote fetch through the retry policy → cached for ttlMs
//   4. Fetch failed after retries → local fallback (never cached)
//
// Entries are evicted lazily when read after expiry. Concurrent misses for
// one name share a single remote fetch.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  SecretNotFoundError,
  SecretStoreError,
  type CachedSecret,
  type LocalSecretSource,
  type SecretCache,
  type SecretCacheOptions,
  type SecretCacheStats,
  type SecretStore,
} from './types.js';
import { AwsSecretsManagerStore } from './aws-store.js';
import { EnvironmentSecretSource } from './providers.js';
import {
  createRetryPolicy,
  isTransientError,
  RetryPresets,
  type IsRetryable,
  type RetryPolicy,
} from '../retry/index.js';
import { EnvironmentFeatureToggle, type FeatureToggle } from '../../config/feature-flags.js';
import type { SecretSettings } from '../../config/schema.js';
import { getLogger } from '../../observability/logging/index.js';
import { systemClock, type Clock } from '../../types/clock.js';
import { toError, tryCatchAsync } from '../../types/result.js';

export const DEFAULT_SECRET_TTL_MS = 3_600_000;

export class SecretCacheImpl implements SecretCache {
  private readonly store: SecretStore;
  private readonly fallback: LocalSecretSource;
  private readonly ttlMs: number;
  private readonly toggles: FeatureToggle;
  private readonly retryPolicy: RetryPolicy;
  private readonly isRetryable: IsRetryable;
  private readonly now: Clock;
  private readonly logger = getLogger({ component: 'secrets' });

  private readonly entries = new Map<string, CachedSecret>();
  private readonly inFlight = new Map<string, Promise<string | undefined>>();
  private hits = 0;
  private misses = 0;
  private fallbacks = 0;

  constructor(options: SecretCacheOptions) {
    if (options.ttlMs !== undefined && options.ttlMs < 0) {
      throw new RangeError(`ttlMs must not be negative, got ${options.ttlMs}`);
    }
    this.store = options.store;
    this.fallback = options.fallback;
    this.ttlMs = options.ttlMs ?? DEFAULT_SECRET_TTL_MS;
    this.toggles = options.toggles ?? new EnvironmentFeatureToggle();
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy(RetryPresets.standard);
    this.isRetryable = options.isRetryable ?? isTransientError;
    this.now = options.now ?? systemClock;
  }

  async get(name: string): Promise<string | undefined> {
    if (!this.toggles.isEnabled('useRemoteSecretStore')) {
      return this.readFallback(name);
    }

    const cached = this.entries.get(name);
    if (cached) {
      if (cached.expiresAt > this.now()) {
        this.hits++;
        return cached.value;
      }
      this.entries.delete(name);
    }

    const pending = this.inFlight.get(name);
    if (pending) {
      return pending;
    }

    this.misses++;
    const lookup = this.fetchRemote(name).finally(() => this.inFlight.delete(name));
    this.inFlight.set(name, lookup);
    return lookup;
  }

  async require(name: string): Promise<string> {
    const value = await this.get(name);
    if (value === undefined) {
      throw new SecretNotFoundError(name);
    }
    return value;
  }

  async set(name: string, value: string): Promise<void> {
    if (!this.toggles.isEnabled('useRemoteSecretStore')) {
      throw new SecretStoreError(this.store.name, name, 'remote secret store is disabled');
    }
    const { store } = this;
    const put = store.put?.bind(store);
    if (!put) {
      throw new SecretStoreError(store.name, name, 'store is read-only');
    }

    const result = await tryCatchAsync(() => put(name, value));
    if (!result.ok) {
      this.logger.error('Failed to update secret in store', result.error, {
        secretName: name,
        store: store.name,
      });
      throw result.error;
    }

    this.invalidate(name);
    this.logger.info('Secret updated in store', { secretName: name, store: store.name });
  }

  invalidate(name: string): boolean {
    return this.entries.delete(name);
  }

  clear(): void {
    this.entries.clear();
    this.logger.info('Secret cache cleared');
  }

  getStats(): SecretCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      fallbacks: this.fallbacks,
      ttlMs: this.ttlMs,
      remoteEnabled: this.toggles.isEnabled('useRemoteSecretStore'),
    };
  }

  private async fetchRemote(name: string): Promise<string | undefined> {
    const result = await tryCatchAsync(() =>
      this.toggles.isEnabled('useRetry')
        ? this.retryPolicy.execute(() => this.store.fetch(name), this.isRetryable)
        : this.store.fetch(name)
    );

    if (result.ok) {
      this.entries.set(name, { value: result.value, expiresAt: this.now() + this.ttlMs });
      this.logger.debug('Fetched secret from store', { secretName: name, store: this.store.name });
      return result.value;
    }

    this.fallbacks++;
    this.logger.warn('Secret store read failed; using local fallback', {
      secretName: name,
      store: this.store.name,
      fallback: this.fallback.name,
      reason: toError(result.error).message,
    });
    return this.readFallback(name);
  }

  private async readFallback(name: string): Promise<string | undefined> {
    const value = await this.fallback.get(name);
    if (value === undefined) {
      this.logger.debug('Secret not found in local fallback', { secretName: name, fallback: this.fallback.name });
    }
    return value;
  }
}

/**
 * Secret cache over AWS Secrets Manager with environment fallback,
 * configured from the loaded engine settings.
 */
export function createSecretCache(
  settings: SecretSettings,
  toggles: FeatureToggle,
  overrides: Partial<SecretCacheOptions> = {}
): SecretCache {
  const { store, fallback, ...rest } = overrides;
  return new SecretCacheImpl({
    store: store ?? new AwsSecretsManagerStore({ region: settings.region, secretPrefix: settings.prefix }),
    fallback: fallback ?? new EnvironmentSecretSource(),
    ttlMs: settings.cacheTtlMs,
    toggles,
    ...rest,
  });
}
