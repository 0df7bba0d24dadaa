// ═══════════════════════════════════════════════════════════════════════════════
// RESILIENCE MODULE INDEX — Executor Exports
// Provisioning Resilience Engine — Infrastructure
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ResilientExecutorOptions,
  ResilientExecutor,
  createResilientExecutor,
} from './executor.js';
