// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /health/circuits endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { CircuitBreakerRegistry, CircuitSnapshot } from '../../infrastructure/circuit-breaker/index.js';
import type { TransactionMonitor } from '../../infrastructure/transaction/index.js';
import type { SecretCache } from '../../infrastructure/secrets/index.js';
import { snapshotFlags, type FeatureFlag, type FeatureToggle } from '../../config/feature-flags.js';
import { getLogger } from '../../observability/logging/index.js';
import { systemClock, type Clock } from '../../types/clock.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'disabled';

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  message?: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  checks?: {
    circuits: ComponentHealth;
    transactions: ComponentHealth;
    secrets?: ComponentHealth;
  };
  features: Record<FeatureFlag, boolean>;
}

export interface HealthDependencies {
  readonly registry: CircuitBreakerRegistry;
  readonly toggles: FeatureToggle;
  readonly monitor?: TransactionMonitor;
  readonly secrets?: SecretCache;
  readonly now?: Clock;
}

/**
 * The part of an Express response the handlers use.
 */
export interface JsonResponder {
  status(code: number): JsonResponder;
  json(body: unknown): unknown;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

function namesIn(snapshots: readonly CircuitSnapshot[], state: CircuitSnapshot['state']): string[] {
  return snapshots.filter(s => s.state === state).map(s => s.name);
}

function checkCircuits(registry: CircuitBreakerRegistry): ComponentHealth {
  const snapshots = registry.getSnapshots();
  const open = namesIn(snapshots, 'OPEN');
  const halfOpen = namesIn(snapshots, 'HALF_OPEN');

  return {
    status: open.length > 0 ? 'down' : (halfOpen.length > 0 ? 'degraded' : 'up'),
    message: `${open.length} open, ${halfOpen.length} half-open of ${snapshots.length}`,
    details: { open, halfOpen },
  };
}

function checkTransactions(monitor: TransactionMonitor | undefined): ComponentHealth {
  if (!monitor) {
    return { status: 'up', message: 'Not monitored' };
  }

  return {
    status: 'up',
    message: `${monitor.activeCount} active`,
    details: {
      active: monitor.getActive().map(t => ({
        id: t.id,
        name: t.name,
        resourceCount: t.resourceCount,
        startedAt: t.startedAt,
      })),
    },
  };
}

function checkSecrets(secrets: SecretCache): ComponentHealth {
  const stats = secrets.getStats();
  return {
    status: 'up',
    message: stats.remoteEnabled ? 'Remote store enabled' : 'Local source only',
    details: { ...stats },
  };
}

/**
 * Overall status: any OPEN breaker is unhealthy, any HALF_OPEN is degraded.
 */
export function buildHealthReport(deps: HealthDependencies): HealthReport {
  const now = deps.now ?? systemClock;
  const base = {
    timestamp: new Date(now()).toISOString(),
    uptime: process.uptime(),
    features: snapshotFlags(deps.toggles),
  };

  if (!deps.toggles.isEnabled('useHealthChecks')) {
    return { status: 'disabled', ...base };
  }

  const circuits = checkCircuits(deps.registry);
  const status: HealthStatus = circuits.status === 'down'
    ? 'unhealthy'
    : (circuits.status === 'degraded' ? 'degraded' : 'healthy');

  return {
    status,
    ...base,
    checks: {
      circuits,
      transactions: checkTransactions(deps.monitor),
      ...(deps.secrets && { secrets: checkSecrets(deps.secrets) }),
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthHandlers(deps: HealthDependencies): {
  health(res: JsonResponder): void;
  circuits(res: JsonResponder): void;
} {
  const logger = getLogger({ component: 'health' });
  const now = deps.now ?? systemClock;

  return {
    health(res) {
      const report = buildHealthReport(deps);

      if (report.status === 'unhealthy' || report.status === 'degraded') {
        logger.warn('Health check degraded', {
          status: report.status,
          circuits: report.checks?.circuits.message,
        });
      }

      res.status(report.status === 'unhealthy' ? 503 : 200).json(report);
    },

    circuits(res) {
      res.status(200).json({
        timestamp: new Date(now()).toISOString(),
        circuits: deps.registry.getSnapshots(),
      });
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();
  const handlers = createHealthHandlers(deps);

  // ─── HEALTH CHECK ───
  // 503 while any circuit is open
  router.get('/health', (_req: Request, res: Response) => {
    handlers.health(res);
  });

  // ─── CIRCUIT SNAPSHOTS ───
  router.get('/health/circuits', (_req: Request, res: Response) => {
    handlers.circuits(res);
  });

  return router;
}
