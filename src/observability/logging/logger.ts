// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Console Logging with Components & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON output for production, pretty-print for development
// - Component-based child loggers
// - Redaction of sensitive keys and e-mail addresses
//
// Usage:
//   import { getLogger } from '../observability/logging/index.js';
//
//   const logger = getLogger({ component: 'scanner' });
//   logger.info('Scan completed', { candidates: 3 });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values.
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
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Enable redaction of sensitive values */
  redactPII?: boolean;

  /** Additional redaction options */
  redactionOptions?: RedactionOptions;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Request ID */
  requestId?: string;

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

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redactPII: true,
  serviceName: 'account-validity',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

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

/**
 * Format error for logging.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const formatted: Record<string, unknown> = {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
    };
    if ('code' in error && typeof error.code === 'string') {
      formatted.errorCode = error.code;
    }
    if (error.cause) {
      formatted.errorCause = String(error.cause);
    }
    return formatted;
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

/**
 * Format log entry for output.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    ...(globalConfig.timestamp && { time: new Date().toISOString() }),
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component && { component }),
    ...context,
  };

  if (globalConfig.redactPII) {
    return redact(entry, globalConfig.redactionOptions);
  }

  return entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set([
  'level', 'levelNum', 'time', 'msg', 'service', 'env', 'component', 'requestId',
]);

/**
 * Pretty print a log entry (for development).
 */
function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time : '';
  const component = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const requestId = typeof entry.requestId === 'string' ? `[${entry.requestId.slice(0, 8)}]` : '';

  const timeStr = time.split('T')[1]?.replace('Z', '') ?? '';
  const levelStr = level.toUpperCase().padEnd(5);

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key)) contextFields[key] = value;
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${timeStr}${RESET} ${COLORS[level]}${levelStr}${RESET} ${requestId}${component} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
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
  const { component, requestId, context: baseContext = {} } = options;

  const levelNum = LOG_LEVELS[getEffectiveLevel()];

  const log = (
    level: LogLevel,
    message: string,
    context: Record<string, unknown> = {},
    error?: unknown
  ): void => {
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }

    const errorContext = error !== undefined ? formatError(error) : {};
    const fullContext = {
      ...(requestId && { requestId }),
      ...baseContext,
      ...context,
      ...errorContext,
    };

    writeLog(level, formatLogEntry(level, message, fullContext, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
    fatal: (message, error, context) => log('fatal', message, context, error),

    child: (childOptions: LoggerOptions): ILogger => createLoggerImpl({
      component: childOptions.component ?? component,
      requestId: childOptions.requestId ?? requestId,
      context: { ...baseContext, ...childOptions.context },
    }),

    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum,
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
