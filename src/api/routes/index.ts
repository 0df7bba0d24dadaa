// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// Provisioning Resilience Engine — API Layer
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createHealthRouter } from './api/routes/index.js';
//   app.use(createHealthRouter({ registry, toggles, monitor, secrets }));
//
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type HealthStatus,
  type ComponentHealth,
  type HealthReport,
  type HealthDependencies,
  type JsonResponder,
  buildHealthReport,
  createHealthHandlers,
  createHealthRouter,
} from './health.js';
