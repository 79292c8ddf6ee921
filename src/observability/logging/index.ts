// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  LOG_LEVELS,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  configureLogger,
  getLoggerConfig,
  formatError,
  formatLogEntry,
  getLogger,
} from './logger.js';

export {
  type RedactionOptions,
  DEFAULT_SENSITIVE_KEYS,
  REDACTED,
  redact,
} from './redaction.js';
