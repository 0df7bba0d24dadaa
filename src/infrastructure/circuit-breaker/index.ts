// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER MODULE INDEX — Circuit Breaker Exports
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export {
  // States
  type CircuitState,

  // Configuration
  type CircuitBreakerConfig,
  type CircuitBreakerOptions,
  type CircuitBreakerDependencies,
  DEFAULT_CIRCUIT_CONFIG,

  // Events
  type StateChangeEvent,
  type StateChangeListener,
  type Unsubscribe,
  type CircuitRejectionReason,

  // Snapshot
  type CircuitSnapshot,

  // Errors
  CircuitOpenError,

  // Interfaces
  type CircuitBreaker,
  type CircuitBreakerRegistry,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export {
  CircuitBreakerImpl,
  validateCircuitConfig,
  withCircuitBreaker,
} from './breaker.js';

export {
  CircuitBreakerRegistryImpl,
  createCircuitBreakerRegistry,
} from './registry.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PRESETS
// ─────────────────────────────────────────────────────────────────────────────────

export {
  type ConfigPreset,
  CircuitPresets,
  fromPreset,
} from './config.js';
