// ═══════════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE MODULE — Resilience Building Blocks
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════
//
// This module provides:
// - Retry policies with exponential backoff and jitter
// - Circuit breakers shared through an injected registry
// - Deployment transactions with reverse-order rollback
// - A TTL secret cache over AWS Secrets Manager
// - The executor composing retry and circuit breaking per dependency
//
// Quick Start:
//   const registry = createCircuitBreakerRegistry();
//   const executor = new ResilientExecutor({ registry });
//
//   const outcome = await runDeployment('analytics', async (tx) => {
//     const ws = await executor.execute('provisioning-api', () => api.createWorkspace('analytics'), isTransientError);
//     tx.track('workspace', ws.id, () => api.deleteWorkspace(ws.id));
//     return ws;
//   });
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './retry/index.js';
export * from './circuit-breaker/index.js';
export * from './transaction/index.js';
export * from './secrets/index.js';
export * from './resilience/index.js';
