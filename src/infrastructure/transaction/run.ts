// ═══════════════════════════════════════════════════════════════════════════════
// RUN DEPLOYMENT — Scoped Transaction Helper
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

import type { DeploymentResult, DeploymentTransaction, TransactionOptions } from './types.js';
import { createTransaction } from './transaction.js';
import { runWithLoggingContext } from '../../observability/logging/index.js';
import { tryCatchAsync } from '../../types/result.js';

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Run provisioning work inside a transaction.
 *
 * Commits when the work resolves. When it throws, rolls back once and
 * returns the thrown value unchanged next to the rollback summary.
 * Every log line emitted during the work carries the transaction id.
 *
 * @example
 * ```typescript
 * const outcome = await runDeployment('analytics-workspace', async (tx) => {
 *   const ws = await executor.execute('provisioning-api', () => api.createWorkspace('analytics'), isTransientError);
 *   tx.track('workspace', ws.id, () => api.deleteWorkspace(ws.id), { kind: 'workspace' });
 *   return ws;
 * });
 * ```
 */
export async function runDeployment<T>(
  name: string,
  work: (transaction: DeploymentTransaction) => Promise<T>,
  options: TransactionOptions = {}
): Promise<DeploymentResult<T>> {
  const transaction = createTransaction(name, options);

  return runWithLoggingContext(
    { transactionId: transaction.id, transactionName: name },
    async (): Promise<DeploymentResult<T>> => {
      const result = await tryCatchAsync(() => work(transaction));

      if (result.ok) {
        transaction.commit();
        return { ok: true, value: result.value, stats: transaction.getStats() };
      }

      const rollback = await transaction.rollback(describeFailure(result.error));
      return { ok: false, error: result.error, rollback };
    }
  );
}
