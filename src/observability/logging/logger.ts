// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Context & Redaction
// Provisioning Resilience Engine — Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Structured logging with:
// - JSON output for production, pretty-print for development
// - Automatic transaction ID injection from AsyncLocalStorage
// - Secret-field redaction
// - Component-based child loggers
//
// Usage:
//   import { getLogger } from './observability/logging/index.js';
//
//   const logger = getLogger({ component: 'transaction' });
//   logger.warn('Rollback requested after commit', { transaction: 'deploy-1' });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Receives every formatted entry that passes the level filter.
 */
export type LogSink = (entry: Readonly<Record<string, unknown>>) => void;

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Enable secret-field redaction */
  redactSecrets?: boolean;

  /** Additional redaction options */
  redactionOptions?: RedactionOptions;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Custom base context added to all logs */
  base?: Record<string, unknown>;

  /** Replace console output (tests, log shipping) */
  sink?: LogSink;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redactSecrets: true,
  serviceName: 'provisioning-engine',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    ...globalConfig.base,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component && { component }),
    ...getLoggingContext(),
    ...context,
  };

  if (globalConfig.redactSecrets) {
    return redact(entry, globalConfig.redactionOptions);
  }

  return entry;
}

const STANDARD_FIELDS = new Set([
  'level', 'levelNum', 'time', 'msg', 'service', 'env', 'component', 'transactionId',
]);

/**
 * Pretty print a log entry (for development).
 */
function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const colors: Record<LogLevel, string> = {
    trace: '\x1b[90m',  // Gray
    debug: '\x1b[36m',  // Cyan
    info: '\x1b[32m',   // Green
    warn: '\x1b[33m',   // Yellow
    error: '\x1b[31m',  // Red
    fatal: '\x1b[35m',  // Magenta
  };
  const reset = '\x1b[0m';
  const dim = '\x1b[2m';

  const time = typeof entry.time === 'string' ? entry.time : '';
  const timeStr = time.split('T')[1]?.replace('Z', '') ?? '';
  const componentStr = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const txStr = typeof entry.transactionId === 'string' ? `[${entry.transactionId.slice(0, 8)}]` : '';

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      contextFields[key] = value;
    }
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${dim}${JSON.stringify(contextFields)}${reset}`
    : '';

  return `${dim}${timeStr}${reset} ${colors[level]}${level.toUpperCase().padEnd(5)}${reset} ${txStr}${componentStr} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  if (globalConfig.sink) {
    globalConfig.sink(entry);
    return;
  }

  const output = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (level === 'error' || level === 'fatal') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) {
      return;
    }
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (!enabled(level)) {
      return;
    }
    const errorContext = error !== undefined ? formatError(error) : {};
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: enabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = { ...DEFAULT_CONFIG };
}
