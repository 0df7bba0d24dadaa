// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER CONFIG — Presets
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { CircuitBreakerOptions } from './types.js';
import { DEFAULT_CIRCUIT_CONFIG } from './types.js';

/**
 * Configuration preset types.
 */
export type ConfigPreset =
  | 'aggressive'    // Fast failure, quick recovery (metadata lookups)
  | 'moderate'      // Balanced (most provisioning endpoints)
  | 'tolerant'      // Slow to open, patient recovery (long-running creates)
  | 'critical';     // Single probe, long cooldown (identity and role bindings)

/**
 * Preset configurations, applied per dependency through
 * `registry.configure(name, CircuitPresets.tolerant)`.
 */
export const CircuitPresets: Readonly<Record<ConfigPreset, CircuitBreakerOptions>> = {
  aggressive: {
    failureThreshold: 3,
    cooldownMs: 10_000,
    successThreshold: 1,
    halfOpenMaxConcurrent: 2,
  },

  moderate: {
    ...DEFAULT_CIRCUIT_CONFIG,
  },

  tolerant: {
    failureThreshold: 10,
    cooldownMs: 120_000,
    successThreshold: 3,
    halfOpenMaxConcurrent: 5,
  },

  critical: {
    failureThreshold: 2,
    cooldownMs: 300_000,
    successThreshold: 3,
    halfOpenMaxConcurrent: 1,
  },
};

/**
 * A preset with selective overrides.
 */
export function fromPreset(
  preset: ConfigPreset,
  overrides: Partial<CircuitBreakerOptions> = {}
): CircuitBreakerOptions {
  return { ...CircuitPresets[preset], ...overrides };
}
