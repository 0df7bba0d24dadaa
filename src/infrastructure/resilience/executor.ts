// ═══════════════════════════════════════════════════════════════════════════════
// RESILIENT EXECUTOR — Retry around Circuit Breaker for Named Dependencies
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// Composition: retry( breaker.guard( remoteCall ) )
//
// Each attempt passes through the dependency's breaker, so an open circuit
// stops the retry loop at once: CircuitOpenError is never retried.
// The retry policy itself does not log; this executor logs its events.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  createRetryPolicy,
  DEFAULT_RETRY_CONFIG,
  type IsRetryable,
  type Operation,
  type RetryConfig,
  type RetryDependencies,
  type RetryEvent,
  type RetryOutcome,
} from '../retry/index.js';
import { CircuitOpenError, type CircuitBreakerRegistry } from '../circuit-breaker/index.js';
import { EnvironmentFeatureToggle, type FeatureToggle } from '../../config/feature-flags.js';
import { getLogger } from '../../observability/logging/index.js';
import { toError } from '../../types/result.js';

export interface ResilientExecutorOptions {
  readonly registry: CircuitBreakerRegistry;

  /** Retry settings for every call (default: DEFAULT_RETRY_CONFIG) */
  readonly retry?: Partial<RetryConfig>;

  readonly toggles?: FeatureToggle;

  /** Sleep and random sources for the retry policy */
  readonly retryDependencies?: RetryDependencies;
}

export class ResilientExecutor {
  private readonly registry: CircuitBreakerRegistry;
  private readonly retryConfig: RetryConfig;
  private readonly toggles: FeatureToggle;
  private readonly retryDependencies: RetryDependencies;
  private readonly logger = getLogger({ component: 'executor' });

  constructor(options: ResilientExecutorOptions) {
    this.registry = options.registry;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.toggles = options.toggles ?? new EnvironmentFeatureToggle();
    this.retryDependencies = options.retryDependencies ?? {};
  }

  /**
   * Run a remote call for `dependency`. Resolves with its value or rejects
   * with the final error as thrown.
   */
  async execute<T>(
    dependency: string,
    operation: Operation<T>,
    isRetryable: IsRetryable,
    signal?: AbortSignal
  ): Promise<T> {
    const outcome = await this.executeWithResult(dependency, operation, isRetryable, signal);
    if (outcome.success) {
      return outcome.value;
    }
    throw outcome.error;
  }

  /**
   * Same as execute, returning the retry outcome instead of throwing.
   */
  async executeWithResult<T>(
    dependency: string,
    operation: Operation<T>,
    isRetryable: IsRetryable,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>> {
    const useBreaker = this.toggles.isEnabled('useCircuitBreaker');
    const useRetry = this.toggles.isEnabled('useRetry');

    const guarded: Operation<T> = useBreaker
      ? () => this.registry.get(dependency).guard(operation)
      : operation;

    const policy = createRetryPolicy(
      {
        ...this.retryConfig,
        maxAttempts: useRetry ? this.retryConfig.maxAttempts : 1,
        onRetry: (event) => {
          this.logRetry(dependency, event);
          this.retryConfig.onRetry?.(event);
        },
      },
      this.retryDependencies
    );

    const retryable: IsRetryable = (error) =>
      !(error instanceof CircuitOpenError) && isRetryable(error);

    const outcome = await policy.executeWithResult(guarded, retryable, signal);

    if (!outcome.success) {
      this.logger.warn('Remote operation failed', {
        dependency,
        attempts: outcome.attempts,
        reason: outcome.reason,
        circuitOpen: outcome.error instanceof CircuitOpenError,
        error: toError(outcome.error).message,
      });
    } else if (outcome.attempts > 1) {
      this.logger.info('Remote operation succeeded after retry', {
        dependency,
        attempts: outcome.attempts,
      });
    }

    return outcome;
  }

  private logRetry(dependency: string, event: RetryEvent): void {
    this.logger.warn('Retrying remote operation', {
      dependency,
      attempt: event.attempt,
      maxAttempts: event.maxAttempts,
      delayMs: Math.round(event.delayMs),
      delaySource: event.delaySource,
      error: toError(event.error).message,
    });
  }
}

export function createResilientExecutor(options: ResilientExecutorOptions): ResilientExecutor {
  return new ResilientExecutor(options);
}
