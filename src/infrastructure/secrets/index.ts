// ═══════════════════════════════════════════════════════════════════════════════
// SECRETS MODULE INDEX — Secret Cache Exports
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type SecretStore,
  type LocalSecretSource,
  type CachedSecret,
  type SecretCacheOptions,
  type SecretCacheStats,
  type SecretCache,
  SecretNotFoundError,
  SecretStoreError,
} from './types.js';

export { SecretCacheImpl, createSecretCache, DEFAULT_SECRET_TTL_MS } from './cache.js';

export {
  toEnvVarName,
  EnvironmentSecretSource,
  StaticSecretSource,
  InMemorySecretStore,
} from './providers.js';

export {
  type GetSecretValueSender,
  type PutSecretValueSender,
  type AwsSecretsManagerStoreOptions,
  AwsSecretsManagerStore,
} from './aws-store.js';
