// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment → Validated EngineConfig
// Provisioning Resilience Engine — Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { envBool, envNumber, envString, type Env } from './env.js';
import { FEATURE_FLAG_ENV_VARS } from './feature-flags.js';
import {
  EngineConfigSchema,
  formatConfigErrors,
  type EngineConfig,
  type EngineConfigInput,
} from './schema.js';
import { EngineError, ErrorCode } from '../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigValidationError extends EngineError {
  readonly name = 'ConfigValidationError';
  readonly code = ErrorCode.CONFIG_INVALID;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid engine configuration:\n  ${issues.join('\n  ')}`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map environment variables onto the schema input. Unset variables stay
 * undefined and pick up schema defaults.
 */
export function readEngineConfigInput(env: Env): EngineConfigInput {
  const environment = envString(env, 'NODE_ENV');

  return {
    environment: environment === 'staging' || environment === 'production' ? environment : 'development',
    retry: {
      maxAttempts: envNumber(env, 'RETRY_MAX_ATTEMPTS'),
      initialDelayMs: envNumber(env, 'RETRY_INITIAL_DELAY_MS'),
      maxDelayMs: envNumber(env, 'RETRY_MAX_DELAY_MS'),
      backoffFactor: envNumber(env, 'RETRY_BACKOFF_FACTOR'),
      jitterFraction: envNumber(env, 'RETRY_JITTER_FRACTION'),
    },
    circuitBreaker: {
      failureThreshold: envNumber(env, 'CIRCUIT_FAILURE_THRESHOLD'),
      cooldownMs: envNumber(env, 'CIRCUIT_COOLDOWN_MS'),
      successThreshold: envNumber(env, 'CIRCUIT_SUCCESS_THRESHOLD'),
      halfOpenMaxConcurrent: envNumber(env, 'CIRCUIT_HALF_OPEN_MAX_CONCURRENT'),
    },
    secrets: {
      cacheTtlMs: envNumber(env, 'SECRET_CACHE_TTL_MS'),
      region: envString(env, 'SECRET_STORE_REGION'),
      prefix: envString(env, 'SECRET_STORE_PREFIX'),
    },
    features: {
      useRetry: envBool(env, FEATURE_FLAG_ENV_VARS.useRetry),
      useCircuitBreaker: envBool(env, FEATURE_FLAG_ENV_VARS.useCircuitBreaker),
      useRemoteSecretStore: envBool(env, FEATURE_FLAG_ENV_VARS.useRemoteSecretStore),
      useRollback: envBool(env, FEATURE_FLAG_ENV_VARS.useRollback),
      useHealthChecks: envBool(env, FEATURE_FLAG_ENV_VARS.useHealthChecks),
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate raw input against the schema.
 * @throws ConfigValidationError listing every invalid field
 */
export function validateEngineConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatConfigErrors(result.error));
  }

  const config = result.data;
  Object.freeze(config.retry);
  Object.freeze(config.circuitBreaker);
  Object.freeze(config.secrets);
  Object.freeze(config.features);
  return Object.freeze(config);
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return validateEngineConfig(readEngineConfigInput(env));
}

let cachedConfig: EngineConfig | null = null;

/**
 * Load once from process.env and reuse.
 */
export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached config (for testing).
 */
export function resetEngineConfig(): void {
  cachedConfig = null;
}
