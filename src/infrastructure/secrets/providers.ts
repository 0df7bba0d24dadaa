// ═══════════════════════════════════════════════════════════════════════════════
// SECRET PROVIDERS — Environment, Static and In-Memory Backends
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { envString, type Env } from '../../config/env.js';
import { SecretNotFoundError, type LocalSecretSource, type SecretStore } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT VARIABLE SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * `provisioning-api-key` → `PROVISIONING_API_KEY`
 */
export function toEnvVarName(name: string): string {
  return name.toUpperCase().replace(/[-.]/g, '_');
}

/**
 * Reads secrets from environment variables, trying the UPPER_SNAKE form
 * of the name first and then the name as given.
 */
export class EnvironmentSecretSource implements LocalSecretSource {
  readonly name = 'environment';

  constructor(private readonly env: Env = process.env) {}

  async get(name: string): Promise<string | undefined> {
    return envString(this.env, toEnvVarName(name)) ?? envString(this.env, name);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// STATIC SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Fixed values, for local runs and tests.
 */
export class StaticSecretSource implements LocalSecretSource {
  readonly name = 'static';
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Readonly<Record<string, string>> = {}) {
    this.values = new Map(Object.entries(values));
  }

  async get(name: string): Promise<string | undefined> {
    return this.values.get(name);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// IN-MEMORY STORE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Remote-store stand-in for tests and local runs.
 */
export class InMemorySecretStore implements SecretStore {
  readonly name = 'in-memory';
  private readonly secrets: Map<string, string>;
  private fetches = 0;

  constructor(secrets: Readonly<Record<string, string>> = {}) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async fetch(name: string): Promise<string> {
    this.fetches++;
    const value = this.secrets.get(name);
    if (value === undefined) {
      throw new SecretNotFoundError(name);
    }
    return value;
  }

  async put(name: string, value: string): Promise<void> {
    this.secrets.set(name, value);
  }

  // Test helpers
  set(name: string, value: string): void {
    this.secrets.set(name, value);
  }

  delete(name: string): void {
    this.secrets.delete(name);
  }

  get fetchCount(): number {
    return this.fetches;
  }
}
