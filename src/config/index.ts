// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Engine Settings and Feature Toggles
// ═══════════════════════════════════════════════════════════════════════════════

export { envBool, envNumber, envString, type Env } from './env.js';

export {
  EnvironmentSchema,
  RetrySettingsSchema,
  CircuitBreakerSettingsSchema,
  SecretSettingsSchema,
  FeatureSettingsSchema,
  EngineConfigSchema,
  formatConfigErrors,
  type Environment,
  type EngineConfig,
  type EngineConfigInput,
  type RetrySettings,
  type CircuitBreakerSettings,
  type SecretSettings,
  type FeatureSettings,
} from './schema.js';

export {
  ConfigValidationError,
  readEngineConfigInput,
  validateEngineConfig,
  loadEngineConfig,
  getEngineConfig,
  resetEngineConfig,
} from './loader.js';

export {
  FEATURE_FLAGS,
  FEATURE_FLAG_ENV_VARS,
  DEFAULT_FEATURE_FLAGS,
  EnvironmentFeatureToggle,
  StaticFeatureToggle,
  snapshotFlags,
  type FeatureFlag,
  type FeatureToggle,
} from './feature-flags.js';
