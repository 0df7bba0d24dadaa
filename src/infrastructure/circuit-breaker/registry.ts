// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER REGISTRY — Shared Breakers Keyed by Dependency Name
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every caller of a dependency must see the same breaker, so failures seen by
// one caller protect all of them. The registry is constructed once at the
// composition root and injected; there is no module-level instance.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type CircuitBreaker,
  type CircuitBreakerDependencies,
  type CircuitBreakerOptions,
  type CircuitBreakerRegistry,
  type CircuitSnapshot,
  type StateChangeListener,
  type Unsubscribe,
  DEFAULT_CIRCUIT_CONFIG,
} from './types.js';
import { CircuitBreakerImpl } from './breaker.js';
import { getLogger } from '../../observability/logging/index.js';

export class CircuitBreakerRegistryImpl implements CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly overrides = new Map<string, Partial<CircuitBreakerOptions>>();
  private readonly listeners = new Set<StateChangeListener>();
  private readonly defaults: CircuitBreakerOptions;
  private readonly logger = getLogger({ component: 'circuit-registry' });

  constructor(
    defaults: Partial<CircuitBreakerOptions> = {},
    private readonly deps: CircuitBreakerDependencies = {}
  ) {
    this.defaults = { ...DEFAULT_CIRCUIT_CONFIG, ...defaults };
  }

  /**
   * Register overrides for a dependency. Takes effect when the breaker is
   * first created; an existing breaker keeps its configuration.
   */
  configure(name: string, overrides: Partial<CircuitBreakerOptions>): void {
    if (this.breakers.has(name)) {
      this.logger.warn('Circuit breaker already created; configuration ignored', { circuit: name });
      return;
    }
    this.overrides.set(name, { ...this.overrides.get(name), ...overrides });
  }

  get(name: string): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreakerImpl(
      { ...this.defaults, ...this.overrides.get(name), name },
      this.deps
    );
    breaker.onStateChange((event) => {
      for (const listener of this.listeners) {
        listener(event);
      }
    });
    this.breakers.set(name, breaker);

    return breaker;
  }

  find(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  getAll(): CircuitBreaker[] {
    return Array.from(this.breakers.values());
  }

  getSnapshots(): CircuitSnapshot[] {
    return this.getAll().map(b => b.getSnapshot());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  onStateChange(listener: StateChangeListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Create a registry whose breakers default to the given settings.
 */
export function createCircuitBreakerRegistry(
  defaults?: Partial<CircuitBreakerOptions>,
  deps?: CircuitBreakerDependencies
): CircuitBreakerRegistry {
  return new CircuitBreakerRegistryImpl(defaults, deps);
}
