// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION MONITOR — Active Transaction Registry
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { DeploymentTransaction, TransactionMonitor, TransactionStats } from './types.js';

/**
 * Tracks transactions from start until commit or rollback.
 * Passed to transactions and to the health report; never a global.
 */
export class TransactionMonitorImpl implements TransactionMonitor {
  private readonly active = new Map<string, DeploymentTransaction>();

  register(transaction: DeploymentTransaction): void {
    this.active.set(transaction.id, transaction);
  }

  unregister(transaction: DeploymentTransaction): void {
    this.active.delete(transaction.id);
  }

  getActive(): TransactionStats[] {
    return Array.from(this.active.values(), t => t.getStats());
  }

  get activeCount(): number {
    return this.active.size;
  }
}

export function createTransactionMonitor(): TransactionMonitor {
  return new TransactionMonitorImpl();
}
