// ═══════════════════════════════════════════════════════════════════════════════
// DEPLOYMENT TRANSACTION TESTS
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  DeploymentTransactionImpl,
  createTransaction,
} from '../transaction.js';
import { runDeployment } from '../run.js';
import { TransactionMonitorImpl } from '../monitor.js';
import { RollbackFailedError, assertRollbackComplete } from '../types.js';
import { StaticFeatureToggle } from '../../../config/feature-flags.js';
import { configureLogger, getLogger, resetLogger } from '../../../observability/logging/index.js';
import { ManualClock } from '../../../types/clock.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

let entries: Array<Readonly<Record<string, unknown>>>;
let clock: ManualClock;
const rollbackOn = new StaticFeatureToggle({ useRollback: true });

beforeEach(() => {
  entries = [];
  clock = new ManualClock(5_000);
  configureLogger({ level: 'debug', sink: (entry) => entries.push(entry) });
});

afterEach(() => {
  resetLogger();
});

function messages(level: string): unknown[] {
  return entries.filter(e => e.level === level).map(e => e.msg);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROLLBACK
// ─────────────────────────────────────────────────────────────────────────────────

describe('DeploymentTransactionImpl', () => {
  it('should generate a uuid v4 id and start ACTIVE', () => {
    const tx = createTransaction('analytics', { toggles: rollbackOn });
    expect(tx.id).toMatch(UUID_V4);
    expect(tx.status).toBe('ACTIVE');
  });

  it('should run cleanups in reverse tracking order', async () => {
    const order: string[] = [];
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });
    for (const id of ['a', 'b', 'c']) {
      tx.track(id, id, () => {
        order.push(id);
      });
    }

    const summary = await tx.rollback('step failed');

    expect(order).toEqual(['c', 'b', 'a']);
    expect(summary.outcome).toBe('rolled_back');
    expect(summary.reason).toBe('step failed');
    expect(summary.cleaned.map(r => r.resourceId)).toEqual(['c', 'b', 'a']);
    expect(tx.status).toBe('ROLLED_BACK');
  });

  it('should clean up role-binding-1 before workspace-1 when a later step fails', async () => {
    const order: string[] = [];
    const tx = new DeploymentTransactionImpl('onboard-team', { toggles: rollbackOn });

    tx.track('workspace', 'workspace-1', async () => {
      order.push('workspace-1');
    }, { kind: 'workspace' });
    tx.track('role binding', 'role-binding-1', async () => {
      order.push('role-binding-1');
    }, { kind: 'role-binding', parentId: 'workspace-1' });

    const provisionContainer = async (): Promise<string> => {
      throw new Error('409 Conflict');
    };
    await expect(provisionContainer()).rejects.toThrow('409 Conflict');

    const summary = await tx.rollback();

    expect(order).toEqual(['role-binding-1', 'workspace-1']);
    expect(summary.failed).toHaveLength(0);
    expect(summary.requiresManualIntervention).toBe(false);
    expect(summary.cleaned[0]).toMatchObject({ kind: 'role-binding', parentId: 'workspace-1' });
  });

  it('should continue past a failing cleanup and report it', async () => {
    const order: string[] = [];
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });
    tx.track('workspace', 'ws-1', () => {
      order.push('ws-1');
    });
    tx.track('container', 'dc-1', async () => {
      throw new Error('403 Forbidden');
    });
    tx.track('binding', 'rb-1', () => {
      order.push('rb-1');
    });

    const summary = await tx.rollback();

    expect(order).toEqual(['rb-1', 'ws-1']);
    expect(summary.outcome).toBe('partial_failure');
    expect(summary.requiresManualIntervention).toBe(true);
    expect(summary.failed).toHaveLength(1);
    expect(summary.failed[0]?.resource.resourceId).toBe('dc-1');
    expect(summary.failed[0]?.error.message).toBe('403 Forbidden');
    expect(tx.getStats().rollbackErrors).toEqual([
      "Failed to clean up container 'dc-1': 403 Forbidden",
    ]);

    expect(() => assertRollbackComplete(summary)).toThrow(RollbackFailedError);
    expect(() => assertRollbackComplete(summary)).toThrow(
      "Rollback of 'analytics' left 1 resource(s) uncleaned: dc-1"
    );
  });

  it('should invoke no cleanup after commit', async () => {
    const cleanup = vi.fn();
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });
    tx.track('workspace', 'ws-1', cleanup);
    tx.commit();

    const summary = await tx.rollback();

    expect(cleanup).not.toHaveBeenCalled();
    expect(summary.outcome).toBe('skipped');
    expect(summary.skippedReason).toBe('already_committed');
    expect(tx.status).toBe('COMMITTED');
    expect(messages('warn')).toContain('Transaction already ended; rollback skipped');
  });

  it('should treat a second commit as a warned no-op', () => {
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });
    tx.commit();
    tx.commit();

    expect(tx.status).toBe('COMMITTED');
    expect(messages('warn')).toEqual(['Transaction already ended; commit ignored']);
  });

  it('should roll back only once', async () => {
    const cleanup = vi.fn();
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });
    tx.track('workspace', 'ws-1', cleanup);

    const first = tx.rollback();
    const concurrent = tx.rollback();
    await Promise.all([first, concurrent]);
    const late = await tx.rollback();

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(late.skippedReason).toBe('already_rolled_back');
  });

  it('should reject tracking misuse without throwing', () => {
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn });

    expect(tx.track('workspace', 'ws-1', undefined)).toBe(false);
    tx.commit();
    expect(tx.track('workspace', 'ws-2', () => undefined)).toBe(false);

    expect(tx.getStats().resourceCount).toBe(0);
    expect(messages('error')).toEqual([
      'Resource tracked without a cleanup action; not tracked',
      'Cannot track resource on a finished transaction',
    ]);
  });

  it('should mark the transaction FAILED when rollback is disabled', async () => {
    const cleanup = vi.fn();
    const tx = new DeploymentTransactionImpl('analytics', { enableRollback: false, toggles: rollbackOn });
    tx.track('workspace', 'ws-1', cleanup);
    tx.track('binding', 'rb-1', cleanup);

    const summary = await tx.rollback();

    expect(cleanup).not.toHaveBeenCalled();
    expect(tx.status).toBe('FAILED');
    expect(summary.skippedReason).toBe('rollback_disabled');
    expect(summary.pending.map(r => r.resourceId)).toEqual(['rb-1', 'ws-1']);
    expect(summary.requiresManualIntervention).toBe(true);
  });

  it('should honour the useRollback toggle', async () => {
    const cleanup = vi.fn();
    const tx = new DeploymentTransactionImpl('analytics', {
      toggles: new StaticFeatureToggle({ useRollback: false }),
    });
    tx.track('workspace', 'ws-1', cleanup);

    const summary = await tx.rollback();

    expect(cleanup).not.toHaveBeenCalled();
    expect(summary.skippedReason).toBe('rollback_disabled');
    expect(tx.status).toBe('FAILED');
  });

  it('should log instead of cleaning up in dry-run mode', async () => {
    const cleanup = vi.fn();
    const tx = new DeploymentTransactionImpl('analytics', { dryRun: true, toggles: rollbackOn });
    tx.track('workspace', 'ws-1', cleanup);

    const summary = await tx.rollback();

    expect(cleanup).not.toHaveBeenCalled();
    expect(summary.skippedReason).toBe('dry_run');
    expect(summary.pending.map(r => r.resourceId)).toEqual(['ws-1']);
    expect(tx.status).toBe('ROLLED_BACK');
    expect(messages('info')).toContain('[dry run] Would clean up resource');
  });

  it('should report stats with durations from the clock', () => {
    const tx = new DeploymentTransactionImpl('analytics', { toggles: rollbackOn, now: clock.now, id: 'tx-1' });
    tx.track('workspace', 'ws-1', () => undefined, { metadata: { region: 'westeurope' } });
    clock.advance(250);
    tx.commit();

    expect(tx.getStats()).toEqual({
      id: 'tx-1',
      name: 'analytics',
      status: 'COMMITTED',
      enableRollback: true,
      dryRun: false,
      startedAt: 5_000,
      completedAt: 5_250,
      durationMs: 250,
      resourceCount: 1,
      resources: [{
        label: 'workspace',
        resourceId: 'ws-1',
        kind: undefined,
        parentId: undefined,
        metadata: { region: 'westeurope' },
        trackedAt: 5_000,
      }],
      rollbackErrors: [],
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MONITOR
// ─────────────────────────────────────────────────────────────────────────────────

describe('TransactionMonitorImpl', () => {
  it('should list transactions until they end', async () => {
    const monitor = new TransactionMonitorImpl();
    const a = createTransaction('a', { monitor, toggles: rollbackOn });
    const b = createTransaction('b', { monitor, toggles: rollbackOn });

    expect(monitor.activeCount).toBe(2);
    expect(monitor.getActive().map(s => s.name)).toEqual(['a', 'b']);

    a.commit();
    await b.rollback();
    expect(monitor.activeCount).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// RUN DEPLOYMENT
// ─────────────────────────────────────────────────────────────────────────────────

describe('runDeployment', () => {
  it('should commit and return the value on success', async () => {
    const result = await runDeployment('analytics', async (tx) => {
      tx.track('workspace', 'ws-1', () => undefined);
      return 'ws-1';
    }, { toggles: rollbackOn });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBe('ws-1');
      expect(result.stats.status).toBe('COMMITTED');
    }
  });

  it('should roll back exactly once and return the original error', async () => {
    const failure = new TypeError('bad payload');
    const cleanup = vi.fn();

    const result = await runDeployment('analytics', async (tx) => {
      tx.track('workspace', 'ws-1', cleanup);
      throw failure;
    }, { toggles: rollbackOn });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(failure);
      expect(result.rollback.outcome).toBe('rolled_back');
      expect(result.rollback.reason).toBe('TypeError: bad payload');
    }
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('should not roll back work that committed before throwing', async () => {
    const cleanup = vi.fn();

    const result = await runDeployment('analytics', async (tx) => {
      tx.track('workspace', 'ws-1', cleanup);
      tx.commit();
      throw new Error('post-commit notification failed');
    }, { toggles: rollbackOn });

    expect(cleanup).not.toHaveBeenCalled();
    expect(!result.ok && result.rollback.skippedReason).toBe('already_committed');
  });

  it('should tag log lines inside the work with the transaction id', async () => {
    const result = await runDeployment('analytics', async () => {
      await Promise.resolve();
      getLogger({ component: 'provisioner' }).info('Creating workspace');
    }, { toggles: rollbackOn });

    const line = entries.find(e => e.msg === 'Creating workspace');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(line?.transactionId).toBe(result.stats.id);
    }
    expect(line?.transactionName).toBe('analytics');
  });
});
