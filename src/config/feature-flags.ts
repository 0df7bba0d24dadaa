// ═══════════════════════════════════════════════════════════════════════════════
// FEATURE FLAGS — Process-Wide Resilience Toggles
// Provisioning Resilience Engine — Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { envBool, type Env } from './env.js';
import type { FeatureSettings } from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type FeatureFlag = keyof FeatureSettings;

/**
 * Read-only switch lookup consulted before each resilience behavior.
 */
export interface FeatureToggle {
  isEnabled(flag: FeatureFlag): boolean;
}

export const FEATURE_FLAGS: readonly FeatureFlag[] = [
  'useRetry',
  'useCircuitBreaker',
  'useRemoteSecretStore',
  'useRollback',
  'useHealthChecks',
];

/**
 * Environment variable backing each flag.
 */
export const FEATURE_FLAG_ENV_VARS: Readonly<Record<FeatureFlag, string>> = {
  useRetry: 'FEATURE_USE_RETRY_LOGIC',
  useCircuitBreaker: 'FEATURE_USE_CIRCUIT_BREAKER',
  useRemoteSecretStore: 'FEATURE_USE_REMOTE_SECRET_STORE',
  useRollback: 'FEATURE_USE_ROLLBACK',
  useHealthChecks: 'FEATURE_USE_HEALTH_CHECKS',
};

/**
 * Remote secret store is opt-in; everything else is on unless switched off.
 */
export const DEFAULT_FEATURE_FLAGS: Readonly<FeatureSettings> = Object.freeze({
  useRetry: true,
  useCircuitBreaker: true,
  useRemoteSecretStore: false,
  useRollback: true,
  useHealthChecks: true,
});

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Reads the environment on every lookup, so a changed variable takes effect
 * without a restart.
 */
export class EnvironmentFeatureToggle implements FeatureToggle {
  constructor(private readonly env: Env = process.env) {}

  isEnabled(flag: FeatureFlag): boolean {
    return envBool(this.env, FEATURE_FLAG_ENV_VARS[flag]) ?? DEFAULT_FEATURE_FLAGS[flag];
  }
}

/**
 * Fixed flag values, typically built from a loaded EngineConfig or in tests.
 */
export class StaticFeatureToggle implements FeatureToggle {
  private readonly flags: FeatureSettings;

  constructor(overrides: Partial<FeatureSettings> = {}) {
    this.flags = { ...DEFAULT_FEATURE_FLAGS, ...overrides };
  }

  isEnabled(flag: FeatureFlag): boolean {
    return this.flags[flag];
  }
}

/**
 * Current value of every flag.
 */
export function snapshotFlags(toggle: FeatureToggle): Record<FeatureFlag, boolean> {
  return {
    useRetry: toggle.isEnabled('useRetry'),
    useCircuitBreaker: toggle.isEnabled('useCircuitBreaker'),
    useRemoteSecretStore: toggle.isEnabled('useRemoteSecretStore'),
    useRollback: toggle.isEnabled('useRollback'),
    useHealthChecks: toggle.isEnabled('useHealthChecks'),
  };
}
