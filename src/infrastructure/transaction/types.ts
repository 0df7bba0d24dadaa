// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION TYPES — Deployment Transaction Definitions
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { Clock } from '../../types/clock.js';
import type { FeatureToggle } from '../../config/feature-flags.js';
import { EngineError, ErrorCode } from '../../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STATUS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Transaction lifecycle.
 * FAILED is terminal when rollback was requested while disabled.
 */
export type TransactionStatus = 'ACTIVE' | 'COMMITTED' | 'ROLLED_BACK' | 'FAILED';

// ─────────────────────────────────────────────────────────────────────────────────
// RESOURCES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Undo action for a provisioned resource.
 */
export type CleanupAction = () => Promise<void> | void;

/**
 * Optional descriptors for a tracked resource.
 */
export interface TrackOptions {
  /** Resource kind, e.g. 'workspace', 'data-container', 'role-binding' */
  readonly kind?: string;

  /** Id of the resource this one lives in */
  readonly parentId?: string;

  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Loggable view of a tracked resource (no cleanup action).
 */
export interface TrackedResourceInfo {
  readonly label: string;
  readonly resourceId: string;
  readonly kind?: string;
  readonly parentId?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly trackedAt: number;
}

export interface TrackedResource extends TrackedResourceInfo {
  readonly cleanup: CleanupAction;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROLLBACK SUMMARY
// ─────────────────────────────────────────────────────────────────────────────────

export type RollbackOutcome = 'rolled_back' | 'partial_failure' | 'skipped';

export type RollbackSkipReason =
  | 'already_committed'
  | 'already_rolled_back'
  | 'already_failed'
  | 'rollback_disabled'
  | 'dry_run';

export interface RollbackFailure {
  readonly resource: TrackedResourceInfo;
  readonly error: Error;
}

/**
 * Result of a rollback. Lists are in cleanup order (reverse of tracking).
 */
export interface RollbackSummary {
  readonly transactionId: string;
  readonly name: string;
  readonly outcome: RollbackOutcome;
  readonly skippedReason?: RollbackSkipReason;
  readonly reason?: string;
  readonly cleaned: readonly TrackedResourceInfo[];
  readonly failed: readonly RollbackFailure[];
  /** Resources left in place without an attempted cleanup */
  readonly pending: readonly TrackedResourceInfo[];
  readonly requiresManualIntervention: boolean;
  readonly durationMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STATS
// ─────────────────────────────────────────────────────────────────────────────────

export interface TransactionStats {
  readonly id: string;
  readonly name: string;
  readonly status: TransactionStatus;
  readonly enableRollback: boolean;
  readonly dryRun: boolean;
  readonly startedAt: number;
  readonly completedAt?: number;
  readonly durationMs?: number;
  readonly resourceCount: number;
  readonly resources: readonly TrackedResourceInfo[];
  readonly rollbackErrors: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface TransactionOptions {
  /** Roll back on failure; combined with the useRollback toggle (default: true) */
  readonly enableRollback?: boolean;

  /** Log cleanups instead of running them (default: false) */
  readonly dryRun?: boolean;

  readonly toggles?: FeatureToggle;

  /** Registers the transaction while it is active */
  readonly monitor?: TransactionMonitor;

  readonly now?: Clock;

  /** Fixed id instead of a generated uuid */
  readonly id?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DeploymentTransaction {
  readonly id: string;
  readonly name: string;
  readonly status: TransactionStatus;

  /**
   * Register a resource the remote API confirmed as created.
   * Returns false (and logs) when nothing was tracked.
   */
  track(
    label: string,
    resourceId: string,
    cleanup: CleanupAction | undefined,
    options?: TrackOptions
  ): boolean;

  commit(): void;

  rollback(reason?: string): Promise<RollbackSummary>;

  getStats(): TransactionStats;
}

export interface TransactionMonitor {
  register(transaction: DeploymentTransaction): void;
  unregister(transaction: DeploymentTransaction): void;
  getActive(): TransactionStats[];
  readonly activeCount: number;
}

/**
 * Outcome of runDeployment. The error is the one the work threw, untouched.
 */
export type DeploymentResult<T> =
  | { readonly ok: true; readonly value: T; readonly stats: TransactionStats }
  | { readonly ok: false; readonly error: unknown; readonly rollback: RollbackSummary };

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Aggregates the cleanup failures of a partially failed rollback.
 */
export class RollbackFailedError extends EngineError {
  readonly name = 'RollbackFailedError';
  readonly code = ErrorCode.ROLLBACK_FAILED;
  readonly transactionId: string;
  readonly failures: readonly RollbackFailure[];

  constructor(summary: RollbackSummary) {
    super(
      `Rollback of '${summary.name}' left ${summary.failed.length} resource(s) uncleaned: ` +
        summary.failed.map(f => f.resource.resourceId).join(', '),
      { cause: summary.failed[0]?.error }
    );
    this.transactionId = summary.transactionId;
    this.failures = summary.failed;
  }
}

/**
 * Throw RollbackFailedError when any cleanup failed.
 */
export function assertRollbackComplete(summary: RollbackSummary): void {
  if (summary.failed.length > 0) {
    throw new RollbackFailedError(summary);
  }
}
