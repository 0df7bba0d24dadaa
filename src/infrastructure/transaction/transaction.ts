// ═══════════════════════════════════════════════════════════════════════════════
// DEPLOYMENT TRANSACTION — Tracked Resources with Reverse-Order Rollback
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// A transaction records every resource the remote API confirmed as created,
// together with the action that deletes it. On failure, cleanups run one at
// a time, newest first, so children are removed before their parents.
// A failing cleanup is recorded and the remaining cleanups still run.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import {
  type CleanupAction,
  type DeploymentTransaction,
  type RollbackFailure,
  type RollbackSkipReason,
  type RollbackSummary,
  type TrackedResource,
  type TrackedResourceInfo,
  type TrackOptions,
  type TransactionMonitor,
  type TransactionOptions,
  type TransactionStats,
  type TransactionStatus,
} from './types.js';
import { EnvironmentFeatureToggle, type FeatureToggle } from '../../config/feature-flags.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';
import { systemClock, type Clock } from '../../types/clock.js';
import { toError, tryCatchAsync } from '../../types/result.js';

const SKIP_REASON_BY_STATUS: Readonly<Record<Exclude<TransactionStatus, 'ACTIVE'>, RollbackSkipReason>> = {
  COMMITTED: 'already_committed',
  ROLLED_BACK: 'already_rolled_back',
  FAILED: 'already_failed',
};

function toInfo(resource: TrackedResource): TrackedResourceInfo {
  return {
    label: resource.label,
    resourceId: resource.resourceId,
    kind: resource.kind,
    parentId: resource.parentId,
    metadata: resource.metadata,
    trackedAt: resource.trackedAt,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class DeploymentTransactionImpl implements DeploymentTransaction {
  readonly id: string;
  readonly name: string;

  private readonly enableRollback: boolean;
  private readonly dryRun: boolean;
  private readonly toggles: FeatureToggle;
  private readonly monitor?: TransactionMonitor;
  private readonly now: Clock;
  private readonly logger: ILogger;

  private readonly resources: TrackedResource[] = [];
  private readonly rollbackErrors: string[] = [];
  private currentStatus: TransactionStatus = 'ACTIVE';
  private rollbackInFlight?: Promise<RollbackSummary>;
  private readonly startedAt: number;
  private completedAt?: number;

  constructor(name: string, options: TransactionOptions = {}) {
    this.id = options.id ?? uuidv4();
    this.name = name;
    this.enableRollback = options.enableRollback ?? true;
    this.dryRun = options.dryRun ?? false;
    this.toggles = options.toggles ?? new EnvironmentFeatureToggle();
    this.monitor = options.monitor;
    this.now = options.now ?? systemClock;
    this.startedAt = this.now();
    this.logger = getLogger({
      component: 'transaction',
      context: { transactionId: this.id, transactionName: name },
    });

    this.monitor?.register(this);
    this.logger.info('Transaction started', {
      enableRollback: this.enableRollback,
      dryRun: this.dryRun,
    });
  }

  get status(): TransactionStatus {
    return this.currentStatus;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Tracking
  // ─────────────────────────────────────────────────────────────────────────────

  track(
    label: string,
    resourceId: string,
    cleanup: CleanupAction | undefined,
    options: TrackOptions = {}
  ): boolean {
    if (!this.isOpen()) {
      this.logger.error('Cannot track resource on a finished transaction', undefined, {
        status: this.currentStatus,
        label,
        resourceId,
      });
      return false;
    }

    if (!cleanup) {
      this.logger.error('Resource tracked without a cleanup action; not tracked', undefined, {
        label,
        resourceId,
      });
      return false;
    }

    this.resources.push({
      label,
      resourceId,
      cleanup,
      kind: options.kind,
      parentId: options.parentId,
      metadata: { ...options.metadata },
      trackedAt: this.now(),
    });

    this.logger.debug('Tracked resource', {
      label,
      resourceId,
      kind: options.kind,
      position: this.resources.length,
    });
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Commit
  // ─────────────────────────────────────────────────────────────────────────────

  commit(): void {
    if (!this.isOpen()) {
      this.logger.warn('Transaction already ended; commit ignored', {
        status: this.currentStatus,
        rollingBack: this.rollbackInFlight !== undefined,
      });
      return;
    }

    this.finish('COMMITTED');
    this.logger.info('Transaction committed', {
      resourceCount: this.resources.length,
      durationMs: this.elapsed(),
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Rollback
  // ─────────────────────────────────────────────────────────────────────────────

  rollback(reason?: string): Promise<RollbackSummary> {
    if (this.rollbackInFlight) {
      this.logger.warn('Rollback already in progress');
      return this.rollbackInFlight;
    }

    if (this.currentStatus !== 'ACTIVE') {
      const skippedReason = SKIP_REASON_BY_STATUS[this.currentStatus];
      this.logger.warn('Transaction already ended; rollback skipped', {
        status: this.currentStatus,
      });
      return Promise.resolve(this.summary('skipped', this.now(), {
        skippedReason,
        reason,
      }));
    }

    this.rollbackInFlight = this.runRollback(reason).finally(() => {
      this.rollbackInFlight = undefined;
    });
    return this.rollbackInFlight;
  }

  private async runRollback(reason: string | undefined): Promise<RollbackSummary> {
    const startTime = this.now();
    const ordered = [...this.resources].reverse();

    if (!this.enableRollback || !this.toggles.isEnabled('useRollback')) {
      this.finish('FAILED');
      this.logger.warn('Rollback disabled; resources will not be cleaned up', {
        reason,
        resources: ordered.map(r => r.resourceId),
      });
      return this.summary('skipped', startTime, {
        skippedReason: 'rollback_disabled',
        reason,
        pending: ordered.map(toInfo),
        requiresManualIntervention: ordered.length > 0,
      });
    }

    if (this.dryRun) {
      for (const resource of ordered) {
        this.logger.info('[dry run] Would clean up resource', {
          label: resource.label,
          resourceId: resource.resourceId,
        });
      }
      this.finish('ROLLED_BACK');
      return this.summary('skipped', startTime, {
        skippedReason: 'dry_run',
        reason,
        pending: ordered.map(toInfo),
      });
    }

    this.logger.warn('Rolling back transaction', {
      resourceCount: ordered.length,
      reason,
    });

    const cleaned: TrackedResourceInfo[] = [];
    const failed: RollbackFailure[] = [];

    for (const resource of ordered) {
      const result = await tryCatchAsync(async () => resource.cleanup());

      if (result.ok) {
        cleaned.push(toInfo(resource));
        this.logger.info('Cleaned up resource', {
          label: resource.label,
          resourceId: resource.resourceId,
        });
        continue;
      }

      const error = toError(result.error);
      failed.push({ resource: toInfo(resource), error });
      this.rollbackErrors.push(
        `Failed to clean up ${resource.label} '${resource.resourceId}': ${error.message}`
      );
      this.logger.error('Cleanup failed', result.error, {
        label: resource.label,
        resourceId: resource.resourceId,
      });
    }

    this.finish('ROLLED_BACK');

    if (failed.length > 0) {
      this.logger.error('Rollback completed with errors', undefined, {
        cleaned: cleaned.length,
        failed: failed.length,
        total: ordered.length,
      });
      return this.summary('partial_failure', startTime, {
        reason,
        cleaned,
        failed,
        requiresManualIntervention: true,
      });
    }

    this.logger.info('Rollback completed', { cleaned: cleaned.length });
    return this.summary('rolled_back', startTime, { reason, cleaned });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Stats
  // ─────────────────────────────────────────────────────────────────────────────

  getStats(): TransactionStats {
    return {
      id: this.id,
      name: this.name,
      status: this.currentStatus,
      enableRollback: this.enableRollback,
      dryRun: this.dryRun,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      durationMs: this.completedAt !== undefined ? this.completedAt - this.startedAt : undefined,
      resourceCount: this.resources.length,
      resources: this.resources.map(toInfo),
      rollbackErrors: [...this.rollbackErrors],
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private isOpen(): boolean {
    return this.currentStatus === 'ACTIVE' && this.rollbackInFlight === undefined;
  }

  private elapsed(): number {
    return this.now() - this.startedAt;
  }

  private finish(status: Exclude<TransactionStatus, 'ACTIVE'>): void {
    this.currentStatus = status;
    this.completedAt = this.now();
    this.monitor?.unregister(this);
  }

  private summary(
    outcome: RollbackSummary['outcome'],
    startTime: number,
    parts: Partial<Omit<RollbackSummary, 'transactionId' | 'name' | 'outcome' | 'durationMs'>>
  ): RollbackSummary {
    return {
      transactionId: this.id,
      name: this.name,
      outcome,
      skippedReason: parts.skippedReason,
      reason: parts.reason,
      cleaned: parts.cleaned ?? [],
      failed: parts.failed ?? [],
      pending: parts.pending ?? [],
      requiresManualIntervention: parts.requiresManualIntervention ?? false,
      durationMs: this.now() - startTime,
    };
  }
}

/**
 * Open a new deployment transaction.
 */
export function createTransaction(name: string, options?: TransactionOptions): DeploymentTransaction {
  return new DeploymentTransactionImpl(name, options);
}
