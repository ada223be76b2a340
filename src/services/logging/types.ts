/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 *
 * Diagnostics only. The provisioning plan the user sees is written through
 * the Terminal, never through a Logger.
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the tool.
 */
export type LoggerName =
  | "process" // ExecaProcessRunner - process spawning
  | "network" // DefaultNetworkLayer - HTTP
  | "fs" // DefaultFileSystemLayer - filesystem operations
  | "interpreter" // InterpreterLocator - interpreter resolution
  | "runtime-install" // RuntimeInstaller - Miniforge download and install
  | "venv" // EnvironmentBuilder - virtual environment creation
  | "packages" // PackageInstaller - pip upgrades and installs
  | "provision" // Provisioner - pipeline driver
  | "cli"; // Command-line entry point

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety.
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async doWork(): Promise<void> {
 *     this.logger.debug('Starting work', { envDir: '/work/.venv' });
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-chunk/per-line details that would be overwhelming in debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for significant operations (stage start/finish, downloads).
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers for the services of one run.
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;
}
