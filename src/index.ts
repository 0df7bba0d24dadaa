// ═══════════════════════════════════════════════════════════════════════════════
// PROVISIONING RESILIENCE ENGINE — Public API
// ═══════════════════════════════════════════════════════════════════════════════

export * from './infrastructure/index.js';
export * from './config/index.js';
export * from './api/routes/index.js';

export {
  type Engine,
  type EngineOverrides,
  type DeploymentOptions,
  createEngine,
} from './engine.js';

export {
  type LogLevel,
  type LogSink,
  type LoggerConfig,
  type ILogger,
  type LoggingContext,
  configureLogger,
  getLogger,
  resetLogger,
  runWithLoggingContext,
  getLoggingContext,
} from './observability/logging/index.js';

export {
  type Result,
  type AsyncResult,
  ok,
  err,
  tryCatchAsync,
} from './types/result.js';

export { ErrorCode, EngineError, hasErrorCode } from './types/errors.js';
export { type Clock, systemClock, ManualClock } from './types/clock.js';
