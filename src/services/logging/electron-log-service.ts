/**
 * ElectronLogService - logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Optional session-based log files: `<datetime>-<uuid>.log`
 * - Environment variable configuration for level, console output and file output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types.js";
import { LogLevel as LogLevelValues } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Level used when PYBOOTSTRAP_LOGLEVEL is unset or invalid.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LogLevelValues, value);
}

/**
 * Parse and validate PYBOOTSTRAP_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = withContext(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Parse PYBOOTSTRAP_LOGGER to get the set of allowed logger names.
 *
 * @returns Set of allowed names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger that is a no-op unless its name is in the allowed set.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<string> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration:
 * - Default level: WARN
 * - Override via PYBOOTSTRAP_LOGLEVEL
 * - Console output via PYBOOTSTRAP_PRINT_LOGS (any non-empty value)
 * - Logger filtering via PYBOOTSTRAP_LOGGER (comma-separated logger names)
 * - File output via PYBOOTSTRAP_LOG_DIR (off when unset, so dry runs write nothing)
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService();
 * const logger = loggingService.createLogger('venv');
 * logger.info('Created', { envDir: '/work/.venv' });
 * // Output: [2025-12-16 10:30:00.123] [info] [venv] Created envDir=/work/.venv
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.logLevel = parseLogLevel(env.PYBOOTSTRAP_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    this.allowedLoggers = parseLoggerFilter(env.PYBOOTSTRAP_LOGGER);

    const enableConsole = !!env.PYBOOTSTRAP_PRINT_LOGS;
    const logsDir = env.PYBOOTSTRAP_LOG_DIR;

    if (logsDir) {
      const filename = generateSessionFilename();
      log.transports.file.resolvePathFn = (): string => join(logsDir, filename);
      log.transports.file.level = this.logLevel;
    } else {
      log.transports.file.level = false;
    }

    log.transports.console.level = enableConsole ? this.logLevel : false;

    log.transports.file.format = LOG_FORMAT;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If PYBOOTSTRAP_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }
}
