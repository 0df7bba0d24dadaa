// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LogSink,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
} from './logger.js';

export {
  type LoggingContext,
  runWithLoggingContext,
  getLoggingContext,
  getTransactionId,
  getCorrelationId,
} from './context.js';

export { type RedactionOptions, redact } from './redaction.js';
