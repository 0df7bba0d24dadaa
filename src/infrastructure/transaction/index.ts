// ═══════════════════════════════════════════════════════════════════════════════
// TRANSACTION MODULE INDEX — Deployment Transaction Exports
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type TransactionStatus,
  type CleanupAction,
  type TrackOptions,
  type TrackedResource,
  type TrackedResourceInfo,
  type RollbackOutcome,
  type RollbackSkipReason,
  type RollbackFailure,
  type RollbackSummary,
  type TransactionStats,
  type TransactionOptions,
  type DeploymentTransaction,
  type TransactionMonitor,
  type DeploymentResult,
  RollbackFailedError,
  assertRollbackComplete,
} from './types.js';

export { DeploymentTransactionImpl, createTransaction } from './transaction.js';
export { TransactionMonitorImpl, createTransactionMonitor } from './monitor.js';
export { runDeployment } from './run.js';
