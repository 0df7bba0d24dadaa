// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER TESTS — State Machine, Probing, Registry
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreakerImpl, withCircuitBreaker } from '../breaker.js';
import { CircuitBreakerRegistryImpl, createCircuitBreakerRegistry } from '../registry.js';
import { CircuitPresets, fromPreset } from '../config.js';
import {
  CircuitOpenError,
  type CircuitBreakerConfig,
  type StateChangeEvent,
} from '../types.js';
import { ManualClock } from '../../../types/clock.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

class UpstreamError extends Error {
  readonly name = 'UpstreamError';
}

class NotFoundError extends Error {
  readonly name = 'NotFoundError';
}

const fail = async (): Promise<string> => {
  throw new UpstreamError('503 from provisioning API');
};

const succeed = async (): Promise<string> => 'ok';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

let clock: ManualClock;

function createBreaker(overrides: Partial<CircuitBreakerConfig> = {}): CircuitBreakerImpl {
  return new CircuitBreakerImpl(
    {
      name: 'provisioning-api',
      failureThreshold: 5,
      cooldownMs: 60_000,
      successThreshold: 2,
      halfOpenMaxConcurrent: 3,
      ...overrides,
    },
    { now: clock.now }
  );
}

beforeEach(() => {
  clock = new ManualClock(1_000_000);
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLOSED → OPEN
// ─────────────────────────────────────────────────────────────────────────────────

describe('CircuitBreakerImpl', () => {
  describe('opening', () => {
    it('should stay closed below the failure threshold', async () => {
      const breaker = createBreaker();
      for (let i = 0; i < 4; i++) {
        await rejection(breaker.guard(fail));
      }
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getSnapshot().consecutiveFailures).toBe(4);
    });

    it('should open after exactly failureThreshold consecutive failures and fail fast', async () => {
      const breaker = createBreaker();
      for (let i = 0; i < 5; i++) {
        await rejection(breaker.guard(fail));
      }
      expect(breaker.getState()).toBe('OPEN');

      const operation = vi.fn(succeed);
      const error = await rejection(breaker.guard(operation));

      expect(operation).not.toHaveBeenCalled();
      expect(error).toBeInstanceOf(CircuitOpenError);
      if (error instanceof CircuitOpenError) {
        expect(error.reason).toBe('circuit_open');
        expect(error.circuitName).toBe('provisioning-api');
        expect(error.retryAfterMs).toBe(60_000);
      }
    });

    it('should open on the third failure and reject the fourth call unrun', async () => {
      const breaker = createBreaker({ failureThreshold: 3 });
      const operation = vi.fn(fail);

      for (let i = 0; i < 3; i++) {
        expect(await rejection(breaker.guard(operation))).toBeInstanceOf(UpstreamError);
      }
      expect(await rejection(breaker.guard(operation))).toBeInstanceOf(CircuitOpenError);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should reset the consecutive count on any success', async () => {
      const breaker = createBreaker({ failureThreshold: 3 });
      await rejection(breaker.guard(fail));
      await rejection(breaker.guard(fail));
      await breaker.guard(succeed);
      await rejection(breaker.guard(fail));
      await rejection(breaker.guard(fail));

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getSnapshot().consecutiveFailures).toBe(2);
    });

    it('should not count errors rejected by isFailure', async () => {
      const breaker = createBreaker({
        failureThreshold: 2,
        isFailure: (error) => !(error instanceof NotFoundError),
      });
      const missing = async (): Promise<string> => {
        throw new NotFoundError('workspace not found');
      };

      for (let i = 0; i < 3; i++) {
        expect(await rejection(breaker.guard(missing))).toBeInstanceOf(NotFoundError);
      }
      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────────
  // HALF_OPEN
  // ───────────────────────────────────────────────────────────────────────────────

  describe('half-open probing', () => {
    it('should keep failing fast until the cooldown elapses', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      await rejection(breaker.guard(fail));

      clock.advance(59_999);
      const error = await rejection(breaker.guard(succeed));
      expect(error instanceof CircuitOpenError && error.retryAfterMs).toBe(1);

      clock.advance(1);
      expect(breaker.getState()).toBe('HALF_OPEN');
    });

    it('should attempt the call after cooldown and close after successThreshold successes', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      await rejection(breaker.guard(fail));
      clock.advance(60_000);

      const operation = vi.fn(succeed);
      await expect(breaker.guard(operation)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(1);
      expect(breaker.getState()).toBe('HALF_OPEN');

      await breaker.guard(operation);
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getSnapshot().consecutiveFailures).toBe(0);
    });

    it('should reopen on a probe failure and restart the cooldown', async () => {
      const breaker = createBreaker({ failureThreshold: 1, halfOpenMaxConcurrent: 1 });
      await rejection(breaker.guard(fail));
      clock.advance(60_000);

      await rejection(breaker.guard(fail));

      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getSnapshot().retryAfterMs).toBe(60_000);

      clock.advance(59_999);
      expect(breaker.getState()).toBe('OPEN');
      clock.advance(1);
      expect(breaker.getState()).toBe('HALF_OPEN');
    });

    it('should reject probes beyond halfOpenMaxConcurrent', async () => {
      const breaker = createBreaker({ failureThreshold: 1, successThreshold: 3, halfOpenMaxConcurrent: 2 });
      await rejection(breaker.guard(fail));
      clock.advance(60_000);

      const first = deferred<string>();
      const second = deferred<string>();
      const probe1 = breaker.guard(() => first.promise);
      const probe2 = breaker.guard(() => second.promise);

      const third = vi.fn(succeed);
      const error = await rejection(breaker.guard(third));

      expect(third).not.toHaveBeenCalled();
      expect(error instanceof CircuitOpenError && error.reason).toBe('half_open_capacity');
      expect(breaker.getSnapshot().halfOpenInFlight).toBe(2);

      first.resolve('a');
      second.resolve('b');
      await expect(probe1).resolves.toBe('a');
      await expect(probe2).resolves.toBe('b');

      const snapshot = breaker.getSnapshot();
      expect(snapshot.state).toBe('HALF_OPEN');
      expect(snapshot.halfOpenSuccesses).toBe(2);
      expect(snapshot.halfOpenInFlight).toBe(0);
    });

    it('should ignore outcomes of calls admitted under an earlier state', async () => {
      const breaker = createBreaker({ failureThreshold: 2, cooldownMs: 1000, successThreshold: 1 });
      const slow = deferred<string>();
      const pending = breaker.guard(() => slow.promise);

      await rejection(breaker.guard(fail));
      await rejection(breaker.guard(fail));
      clock.advance(1000);
      expect(breaker.getState()).toBe('HALF_OPEN');

      slow.resolve('late');
      await expect(pending).resolves.toBe('late');

      expect(breaker.getState()).toBe('HALF_OPEN');
      expect(breaker.getSnapshot().halfOpenSuccesses).toBe(0);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────────
  // EVENTS & CONTROL
  // ───────────────────────────────────────────────────────────────────────────────

  describe('events and control', () => {
    it('should emit each transition to listeners', async () => {
      const breaker = createBreaker({ failureThreshold: 1, successThreshold: 1 });
      const events: StateChangeEvent[] = [];
      const unsubscribe = breaker.onStateChange((event) => events.push(event));

      await rejection(breaker.guard(fail));
      clock.advance(60_000);
      await breaker.guard(succeed);

      expect(events.map(e => `${e.from}->${e.to}`)).toEqual([
        'CLOSED->OPEN',
        'OPEN->HALF_OPEN',
        'HALF_OPEN->CLOSED',
      ]);

      unsubscribe();
      breaker.forceOpen();
      expect(events).toHaveLength(3);
    });

    it('should keep running when a listener throws', async () => {
      const breaker = createBreaker({ failureThreshold: 1 });
      breaker.onStateChange(() => {
        throw new Error('listener bug');
      });

      expect(await rejection(breaker.guard(fail))).toBeInstanceOf(UpstreamError);
      expect(breaker.getState()).toBe('OPEN');
    });

    it('should force open and reset', async () => {
      const breaker = createBreaker();
      await breaker.guard(succeed);
      breaker.forceOpen();
      expect(breaker.getState()).toBe('OPEN');

      breaker.reset();
      const snapshot = breaker.getSnapshot();
      expect(snapshot.state).toBe('CLOSED');
      expect(snapshot.totalCalls).toBe(0);
      expect(snapshot.retryAfterMs).toBe(0);
    });

    it('should count calls in the snapshot', async () => {
      const breaker = createBreaker({ failureThreshold: 2 });
      await breaker.guard(succeed);
      await rejection(breaker.guard(fail));
      await rejection(breaker.guard(fail));
      await rejection(breaker.guard(succeed));

      expect(breaker.getSnapshot()).toMatchObject({
        totalCalls: 3,
        successfulCalls: 1,
        failedCalls: 2,
        rejectedCalls: 1,
        lastFailureTime: 1_000_000,
      });
    });

    it('should reject invalid thresholds', () => {
      expect(() => createBreaker({ failureThreshold: 0 })).toThrow(RangeError);
      expect(() => createBreaker({ halfOpenMaxConcurrent: 1.5 })).toThrow(RangeError);
      expect(() => createBreaker({ cooldownMs: -1 })).toThrow(RangeError);
    });

    it('should wrap functions with withCircuitBreaker', async () => {
      const breaker = createBreaker();
      const createWorkspace = withCircuitBreaker(breaker, async (name: string) => `ws-${name}`);
      await expect(createWorkspace('analytics')).resolves.toBe('ws-analytics');
      expect(breaker.getSnapshot().totalCalls).toBe(1);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

describe('CircuitBreakerRegistryImpl', () => {
  it('should return the same instance for the same name', () => {
    const registry = createCircuitBreakerRegistry();
    expect(registry.find('provisioning-api')).toBeUndefined();

    const a = registry.get('provisioning-api');
    const b = registry.get('provisioning-api');

    expect(a).toBe(b);
    expect(registry.get('secret-store')).not.toBe(a);
    expect(registry.getAll()).toHaveLength(2);
  });

  it('should share failure state across callers of one dependency', async () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 2 }, { now: clock.now });
    await rejection(registry.get('provisioning-api').guard(fail));
    await rejection(registry.get('provisioning-api').guard(fail));

    expect(registry.get('provisioning-api').getState()).toBe('OPEN');
  });

  it('should apply per-name configuration on creation', async () => {
    const registry = new CircuitBreakerRegistryImpl({}, { now: clock.now });
    registry.configure('identity', CircuitPresets.critical);
    registry.configure('identity', { failureThreshold: 1 });

    await rejection(registry.get('identity').guard(fail));

    const snapshot = registry.get('identity').getSnapshot();
    expect(snapshot.state).toBe('OPEN');
    expect(snapshot.retryAfterMs).toBe(300_000);
  });

  it('should ignore configuration for an existing breaker', async () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 3 }, { now: clock.now });
    const breaker = registry.get('provisioning-api');
    registry.configure('provisioning-api', { failureThreshold: 1 });

    await rejection(breaker.guard(fail));
    expect(breaker.getState()).toBe('CLOSED');
  });

  it('should fan out state changes from every breaker', async () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 1 }, { now: clock.now });
    const seen: string[] = [];
    registry.onStateChange((event) => seen.push(`${event.name}:${event.to}`));

    await rejection(registry.get('a').guard(fail));
    await rejection(registry.get('b').guard(fail));

    expect(seen).toEqual(['a:OPEN', 'b:OPEN']);
  });

  it('should snapshot and reset every breaker', async () => {
    const registry = new CircuitBreakerRegistryImpl({ failureThreshold: 1 }, { now: clock.now });
    await rejection(registry.get('a').guard(fail));
    registry.get('b');

    expect(registry.getSnapshots().map(s => [s.name, s.state])).toEqual([
      ['a', 'OPEN'],
      ['b', 'CLOSED'],
    ]);

    registry.resetAll();
    expect(registry.getSnapshots().every(s => s.state === 'CLOSED')).toBe(true);
  });
});

describe('fromPreset', () => {
  it('should overlay overrides on a preset', () => {
    expect(fromPreset('tolerant', { cooldownMs: 5000 })).toEqual({
      failureThreshold: 10,
      cooldownMs: 5000,
      successThreshold: 3,
      halfOpenMaxConcurrent: 5,
    });
  });
});
