// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE — Composition Root
// Provisioning Resilience Engine
// ═══════════════════════════════════════════════════════════════════════════════
//
// Builds one instance of every shared component from a validated config:
// toggles, breaker registry, transaction monitor, secret cache and executor.
// Nothing here is a module-level singleton; callers hold the Engine.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Router } from 'express';
import { getEngineConfig, type EngineConfig } from './config/index.js';
import { StaticFeatureToggle, type FeatureToggle } from './config/feature-flags.js';
import {
  createCircuitBreakerRegistry,
  type CircuitBreakerRegistry,
} from './infrastructure/circuit-breaker/index.js';
import {
  createTransactionMonitor,
  runDeployment,
  type DeploymentResult,
  type DeploymentTransaction,
  type TransactionMonitor,
  type TransactionOptions,
} from './infrastructure/transaction/index.js';
import {
  createSecretCache,
  type LocalSecretSource,
  type SecretCache,
  type SecretCacheOptions,
  type SecretStore,
} from './infrastructure/secrets/index.js';
import { ResilientExecutor } from './infrastructure/resilience/index.js';
import { createRetryPolicy, type RetryDependencies } from './infrastructure/retry/index.js';
import { buildHealthReport, createHealthRouter, type HealthReport } from './api/routes/index.js';
import { getLogger } from './observability/logging/index.js';
import type { Clock } from './types/clock.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface EngineOverrides {
  /** Replaces the toggles built from config.features */
  readonly toggles?: FeatureToggle;
  readonly secretStore?: SecretStore;
  readonly secretFallback?: LocalSecretSource;
  readonly retryDependencies?: RetryDependencies;
  readonly now?: Clock;
}

export type DeploymentOptions = Omit<TransactionOptions, 'toggles' | 'monitor' | 'now'>;

export interface Engine {
  readonly config: EngineConfig;
  readonly toggles: FeatureToggle;
  readonly registry: CircuitBreakerRegistry;
  readonly monitor: TransactionMonitor;
  readonly secrets: SecretCache;
  readonly executor: ResilientExecutor;

  /** runDeployment bound to this engine's toggles, monitor and clock */
  runDeployment<T>(
    name: string,
    work: (transaction: DeploymentTransaction) => Promise<T>,
    options?: DeploymentOptions
  ): Promise<DeploymentResult<T>>;

  health(): HealthReport;
  healthRouter(): Router;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createEngine(
  config: EngineConfig = getEngineConfig(),
  overrides: EngineOverrides = {}
): Engine {
  const toggles = overrides.toggles ?? new StaticFeatureToggle(config.features);
  const clock = overrides.now ? { now: overrides.now } : {};

  const registry = createCircuitBreakerRegistry(config.circuitBreaker, clock);
  const monitor = createTransactionMonitor();

  // Secret reads retry under the same settings as the executor.
  const secretOverrides: Partial<SecretCacheOptions> = {
    ...(overrides.secretStore && { store: overrides.secretStore }),
    ...(overrides.secretFallback && { fallback: overrides.secretFallback }),
    retryPolicy: createRetryPolicy(config.retry, overrides.retryDependencies),
    ...clock,
  };
  const secrets = createSecretCache(config.secrets, toggles, secretOverrides);

  const executor = new ResilientExecutor({
    registry,
    toggles,
    retry: config.retry,
    retryDependencies: overrides.retryDependencies,
  });

  getLogger({ component: 'engine' }).info('Engine created', {
    environment: config.environment,
    features: config.features,
  });

  return {
    config,
    toggles,
    registry,
    monitor,
    secrets,
    executor,

    runDeployment: (name, work, options = {}) =>
      runDeployment(name, work, { ...options, ...clock, toggles, monitor }),

    health: () => buildHealthReport({ registry, toggles, monitor, secrets, ...clock }),

    healthRouter: () => createHealthRouter({ registry, toggles, monitor, secrets, ...clock }),
  };
}
