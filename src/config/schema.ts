// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE CONFIG SCHEMA — Zod Validation for Resilience Settings
// Provisioning Resilience Engine — Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'staging', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY
// ─────────────────────────────────────────────────────────────────────────────────

export const RetrySettingsSchema = z
  .object({
    maxAttempts: z.number().int().min(1, 'maxAttempts must be at least 1').default(3),
    initialDelayMs: z.number().min(0).default(1000),
    maxDelayMs: z.number().min(0).default(60_000),
    backoffFactor: z.number().gt(1, 'backoffFactor must be greater than 1').default(2),
    jitterFraction: z.number().min(0).max(1).default(0.1),
  })
  .refine(s => s.maxDelayMs >= s.initialDelayMs, {
    message: 'maxDelayMs must not be less than initialDelayMs',
    path: ['maxDelayMs'],
  });

// ─────────────────────────────────────────────────────────────────────────────────
// CIRCUIT BREAKER
// ─────────────────────────────────────────────────────────────────────────────────

export const CircuitBreakerSettingsSchema = z.object({
  failureThreshold: z.number().int().min(1).default(5),
  cooldownMs: z.number().min(0).default(60_000),
  successThreshold: z.number().int().min(1).default(2),
  halfOpenMaxConcurrent: z.number().int().min(1).default(3),
});

// ─────────────────────────────────────────────────────────────────────────────────
// SECRETS
// ─────────────────────────────────────────────────────────────────────────────────

export const SecretSettingsSchema = z.object({
  cacheTtlMs: z.number().min(0).default(3_600_000),
  region: z.string().min(1).optional(),
  prefix: z.string().default(''),
});

// ─────────────────────────────────────────────────────────────────────────────────
// FEATURE TOGGLES
// ─────────────────────────────────────────────────────────────────────────────────

export const FeatureSettingsSchema = z.object({
  useRetry: z.boolean().default(true),
  useCircuitBreaker: z.boolean().default(true),
  useRemoteSecretStore: z.boolean().default(false),
  useRollback: z.boolean().default(true),
  useHealthChecks: z.boolean().default(true),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const EngineConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  retry: RetrySettingsSchema.default({}),
  circuitBreaker: CircuitBreakerSettingsSchema.default({}),
  secrets: SecretSettingsSchema.default({}),
  features: FeatureSettingsSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type RetrySettings = EngineConfig['retry'];
export type CircuitBreakerSettings = EngineConfig['circuitBreaker'];
export type SecretSettings = EngineConfig['secrets'];
export type FeatureSettings = EngineConfig['features'];

/**
 * Render zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
