// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER TYPES — States, Configuration, Events
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Circuit breaker pattern implementation types:
// - State machine: CLOSED → OPEN → HALF_OPEN → CLOSED
// - Consecutive failure counting
// - Bounded concurrent probes while recovering
//
// ═══════════════════════════════════════════════════════════════════════════════

import { EngineError, ErrorCode } from '../../types/errors.js';
import type { Clock } from '../../types/clock.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker states.
 *
 * CLOSED: Normal operation, requests pass through
 * OPEN: Failing fast, requests are rejected immediately
 * HALF_OPEN: Testing recovery, limited concurrent probes allowed
 */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /** Dependency this breaker guards; unique within a registry */
  readonly name: string;

  /** Consecutive failures in CLOSED before opening */
  readonly failureThreshold: number;

  /** Time in ms to stay OPEN before admitting probes */
  readonly cooldownMs: number;

  /** Consecutive HALF_OPEN successes before closing */
  readonly successThreshold: number;

  /** Probes allowed in flight at once while HALF_OPEN */
  readonly halfOpenMaxConcurrent: number;

  /**
   * Whether an error reflects dependency health. Errors it rejects (a 404,
   * a validation error) count as a healthy response. Defaults to every error.
   */
  readonly isFailure?: (error: unknown) => boolean;
}

export type CircuitBreakerOptions = Omit<CircuitBreakerConfig, 'name'>;

/**
 * Default configuration values.
 */
export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerOptions = {
  failureThreshold: 5,
  cooldownMs: 60_000,
  successThreshold: 2,
  halfOpenMaxConcurrent: 3,
};

export interface CircuitBreakerDependencies {
  readonly now?: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * State change event.
 */
export interface StateChangeEvent {
  /** Circuit breaker name */
  readonly name: string;

  readonly from: CircuitState;
  readonly to: CircuitState;

  readonly timestamp: number;

  /** Reason for change */
  readonly reason: string;

  readonly consecutiveFailures: number;
}

export type StateChangeListener = (event: StateChangeEvent) => void;

export type Unsubscribe = () => void;

export type CircuitRejectionReason = 'circuit_open' | 'half_open_capacity';

// ─────────────────────────────────────────────────────────────────────────────────
// SNAPSHOT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of a breaker for health reporting.
 */
export interface CircuitSnapshot {
  readonly name: string;
  readonly state: CircuitState;

  /** Consecutive failures counted in CLOSED */
  readonly consecutiveFailures: number;

  /** Consecutive successes counted in HALF_OPEN */
  readonly halfOpenSuccesses: number;

  readonly halfOpenInFlight: number;

  /** Remaining cooldown while OPEN, otherwise 0 */
  readonly retryAfterMs: number;

  readonly totalCalls: number;
  readonly successfulCalls: number;
  readonly failedCalls: number;
  readonly rejectedCalls: number;

  readonly lastFailureTime?: number;
  readonly lastSuccessTime?: number;
  readonly lastStateChangeTime: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown without invoking the operation while the circuit rejects calls.
 */
export class CircuitOpenError extends EngineError {
  readonly name = 'CircuitOpenError';
  readonly code = ErrorCode.CIRCUIT_OPEN;

  constructor(
    readonly circuitName: string,
    readonly reason: CircuitRejectionReason,
    readonly retryAfterMs: number
  ) {
    super(
      reason === 'circuit_open'
        ? `Circuit breaker '${circuitName}' is open. Retry after ${retryAfterMs}ms`
        : `Circuit breaker '${circuitName}' is half-open and at probe capacity`
    );
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Circuit breaker interface.
 */
export interface CircuitBreaker {
  readonly name: string;

  /** Current state; moves OPEN → HALF_OPEN when the cooldown has elapsed */
  getState(): CircuitState;

  getSnapshot(): CircuitSnapshot;

  /** Run the operation under breaker protection */
  guard<T>(operation: () => Promise<T>): Promise<T>;

  onStateChange(listener: StateChangeListener): Unsubscribe;

  /** Open immediately and restart the cooldown (maintenance) */
  forceOpen(): void;

  /** Return to CLOSED with all counters cleared */
  reset(): void;
}

/**
 * Name → breaker map. The same name always yields the same instance.
 */
export interface CircuitBreakerRegistry {
  /** Get or lazily create */
  get(name: string): CircuitBreaker;

  /** Per-name overrides applied when the breaker is created */
  configure(name: string, overrides: Partial<CircuitBreakerOptions>): void;

  find(name: string): CircuitBreaker | undefined;

  getAll(): CircuitBreaker[];

  getSnapshots(): CircuitSnapshot[];

  resetAll(): void;

  /** Listen to transitions of every breaker, present and future */
  onStateChange(listener: StateChangeListener): Unsubscribe;
}
