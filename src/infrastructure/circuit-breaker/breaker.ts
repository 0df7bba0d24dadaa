// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER — Implementation
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Circuit breaker pattern implementation:
// - State machine: CLOSED → OPEN → HALF_OPEN → CLOSED
// - Consecutive-failure counting, reset by any success
// - Bounded concurrent probes in HALF_OPEN
// - Generation counter so outcomes from an earlier state are ignored
//
// Every read-then-write of breaker state runs synchronously between awaits,
// so concurrent callers on the event loop never interleave inside it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerDependencies,
  type CircuitSnapshot,
  type CircuitBreaker,
  type CircuitRejectionReason,
  type StateChangeEvent,
  type StateChangeListener,
  type Unsubscribe,
  CircuitOpenError,
} from './types.js';
import { getLogger } from '../../observability/logging/index.js';
import { tryCatchAsync } from '../../types/result.js';
import { systemClock, type Clock } from '../../types/clock.js';

type Admission =
  | { readonly admitted: true; readonly state: CircuitState; readonly generation: number }
  | { readonly admitted: false; readonly reason: CircuitRejectionReason; readonly retryAfterMs: number };

// ─────────────────────────────────────────────────────────────────────────────────
// CIRCUIT BREAKER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker implementation.
 */
export class CircuitBreakerImpl implements CircuitBreaker {
  readonly name: string;

  private readonly config: CircuitBreakerConfig;
  private readonly now: Clock;
  private readonly logger = getLogger({ component: 'circuit-breaker' });
  private readonly listeners = new Set<StateChangeListener>();

  // State
  private state: CircuitState = 'CLOSED';
  private generation = 0;
  private openedAt = 0;
  private lastStateChangeTime: number;

  // Counters
  private consecutiveFailures = 0;    // Failures in CLOSED
  private halfOpenSuccesses = 0;      // Successes in HALF_OPEN
  private halfOpenInFlight = 0;       // Current probes in HALF_OPEN

  // Lifetime metrics
  private totalCalls = 0;
  private successfulCalls = 0;
  private failedCalls = 0;
  private rejectedCalls = 0;

  // Timestamps
  private lastFailureTime?: number;
  private lastSuccessTime?: number;

  constructor(config: CircuitBreakerConfig, deps: CircuitBreakerDependencies = {}) {
    validateCircuitConfig(config);
    this.name = config.name;
    this.config = config;
    this.now = deps.now ?? systemClock;
    this.lastStateChangeTime = this.now();

    this.logger.debug('Circuit breaker created', {
      circuit: this.name,
      failureThreshold: config.failureThreshold,
      cooldownMs: config.cooldownMs,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────────

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.now() - this.openedAt >= this.config.cooldownMs) {
      this.transitionTo('HALF_OPEN', 'Cooldown elapsed');
    }
    return this.state;
  }

  onStateChange(listener: StateChangeListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transitionTo(newState: CircuitState, reason: string): void {
    const oldState = this.state;
    if (oldState === newState) return;

    const timestamp = this.now();
    this.state = newState;
    this.generation++;
    this.lastStateChangeTime = timestamp;

    // Reset counters on state change
    if (newState === 'OPEN') {
      this.openedAt = timestamp;
      this.halfOpenSuccesses = 0;
    } else if (newState === 'HALF_OPEN') {
      this.halfOpenSuccesses = 0;
      this.halfOpenInFlight = 0;
    } else {
      this.consecutiveFailures = 0;
      this.halfOpenSuccesses = 0;
      this.halfOpenInFlight = 0;
    }

    const event: StateChangeEvent = {
      name: this.name,
      from: oldState,
      to: newState,
      timestamp,
      reason,
      consecutiveFailures: this.consecutiveFailures,
    };

    const context = { circuit: this.name, from: oldState, to: newState, reason };
    if (newState === 'CLOSED') {
      this.logger.info('Circuit state changed', context);
    } else {
      this.logger.warn('Circuit state changed', context);
    }

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('State change listener failed', error, { circuit: this.name });
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Request handling
  // ─────────────────────────────────────────────────────────────────────────────

  async guard<T>(operation: () => Promise<T>): Promise<T> {
    const admission = this.admit();

    if (!admission.admitted) {
      this.rejectedCalls++;
      throw new CircuitOpenError(this.name, admission.reason, admission.retryAfterMs);
    }

    this.totalCalls++;
    const result = await tryCatchAsync(operation);

    if (admission.state === 'HALF_OPEN' && admission.generation === this.generation) {
      this.halfOpenInFlight--;
    }

    if (result.ok) {
      this.recordSuccess(admission.generation);
      return result.value;
    }

    const countsAsFailure = this.config.isFailure?.(result.error) ?? true;
    if (countsAsFailure) {
      this.recordFailure(admission.generation);
    } else {
      this.recordSuccess(admission.generation);
    }

    throw result.error;
  }

  /**
   * Decide synchronously whether a call may proceed, reserving a probe slot
   * when HALF_OPEN.
   */
  private admit(): Admission {
    const state = this.getState();

    if (state === 'OPEN') {
      return { admitted: false, reason: 'circuit_open', retryAfterMs: this.remainingCooldown() };
    }

    if (state === 'HALF_OPEN') {
      if (this.halfOpenInFlight >= this.config.halfOpenMaxConcurrent) {
        return { admitted: false, reason: 'half_open_capacity', retryAfterMs: 0 };
      }
      this.halfOpenInFlight++;
    }

    return { admitted: true, state, generation: this.generation };
  }

  private remainingCooldown(): number {
    if (this.state !== 'OPEN') return 0;
    return Math.max(0, this.config.cooldownMs - (this.now() - this.openedAt));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Recording
  // ─────────────────────────────────────────────────────────────────────────────

  private recordSuccess(generation: number): void {
    this.successfulCalls++;
    this.lastSuccessTime = this.now();

    // Started under an earlier state
    if (generation !== this.generation) return;

    if (this.state === 'CLOSED') {
      this.consecutiveFailures = 0;
    } else if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.successThreshold) {
        this.transitionTo(
          'CLOSED',
          `Success threshold reached (${this.halfOpenSuccesses}/${this.config.successThreshold})`
        );
      }
    }
  }

  private recordFailure(generation: number): void {
    this.failedCalls++;
    this.lastFailureTime = this.now();

    if (generation !== this.generation) return;

    if (this.state === 'HALF_OPEN') {
      // Any failure in HALF_OPEN reopens the circuit
      this.transitionTo('OPEN', 'Failure during recovery probe');
    } else if (this.state === 'CLOSED') {
      this.consecutiveFailures++;
      if (this.consecutiveFailures >= this.config.failureThreshold) {
        this.transitionTo(
          'OPEN',
          `Failure threshold reached (${this.consecutiveFailures}/${this.config.failureThreshold})`
        );
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Control
  // ─────────────────────────────────────────────────────────────────────────────

  forceOpen(): void {
    if (this.state === 'OPEN') {
      this.openedAt = this.now();
      return;
    }
    this.transitionTo('OPEN', 'Forced open');
  }

  reset(): void {
    this.transitionTo('CLOSED', 'Reset');
    this.generation++;
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;
    this.halfOpenInFlight = 0;
    this.openedAt = 0;

    // Reset lifetime metrics
    this.totalCalls = 0;
    this.successfulCalls = 0;
    this.failedCalls = 0;
    this.rejectedCalls = 0;
    this.lastFailureTime = undefined;
    this.lastSuccessTime = undefined;

    this.logger.info('Circuit breaker reset', { circuit: this.name });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Snapshot
  // ─────────────────────────────────────────────────────────────────────────────

  getSnapshot(): CircuitSnapshot {
    const state = this.getState();

    return {
      name: this.name,
      state,
      consecutiveFailures: this.consecutiveFailures,
      halfOpenSuccesses: this.halfOpenSuccesses,
      halfOpenInFlight: this.halfOpenInFlight,
      retryAfterMs: this.remainingCooldown(),
      totalCalls: this.totalCalls,
      successfulCalls: this.successfulCalls,
      failedCalls: this.failedCalls,
      rejectedCalls: this.rejectedCalls,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      lastStateChangeTime: this.lastStateChangeTime,
    };
  }
}

/**
 * @throws RangeError when a threshold is out of range
 */
export function validateCircuitConfig(config: CircuitBreakerConfig): void {
  const positiveInts: Array<[string, number]> = [
    ['failureThreshold', config.failureThreshold],
    ['successThreshold', config.successThreshold],
    ['halfOpenMaxConcurrent', config.halfOpenMaxConcurrent],
  ];
  for (const [field, value] of positiveInts) {
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`Circuit '${config.name}': ${field} must be an integer >= 1, got ${value}`);
    }
  }
  if (config.cooldownMs < 0) {
    throw new RangeError(`Circuit '${config.name}': cooldownMs must not be negative`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// WRAPPER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Wrap a function with circuit breaker protection.
 */
export function withCircuitBreaker<TArgs extends unknown[], TResult>(
  breaker: CircuitBreaker,
  fn: (...args: TArgs) => Promise<TResult>
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    return breaker.guard(() => fn(...args));
  };
}
