/**
 * Logger doubles for tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";

type LogLevelName = "silly" | "debug" | "info" | "warn" | "error";

/**
 * Logger whose methods are vitest spies.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * Logging service handing out one MockLogger per scope.
 */
export interface MockLoggingService extends LoggingService {
  /** Scopes requested so far, in request order. */
  getCreatedLoggerNames(): LoggerName[];
  /** The logger handed out for a scope, if any. */
  getLogger(name: LoggerName): MockLogger | undefined;
}

function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * @example
 * const loggingService = createMockLoggingService();
 * await createProvisioner(config, { ...platform, loggingService }).run(config);
 * expect(loggingService.getLogger("venv")?.debug).toHaveBeenCalledWith("Environment ready", {
 *   envDir: "/work/.venv",
 *   envPython: "/work/.venv/bin/python",
 * });
 */
export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger(name: LoggerName): Logger {
      let logger = loggers.get(name);
      if (logger === undefined) {
        logger = createMockLogger();
        loggers.set(name, logger);
      }
      return logger;
    },
    getCreatedLoggerNames: () => [...loggers.keys()],
    getLogger: (name) => loggers.get(name),
  };
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

export interface LoggedMessage {
  readonly level: LogLevelName;
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Logger that keeps what was logged, for asserting on messages rather than calls.
 */
export interface BehavioralLogger extends Logger {
  getMessages(): readonly LoggedMessage[];
  getMessagesByLevel(level: LogLevelName): readonly LoggedMessage[];
}

/**
 * @example
 * const logger = createBehavioralLogger();
 * const layer = new DefaultNetworkLayer(logger);
 * await layer.fetch("https://downloads.test/x").catch(() => undefined);
 * expect(logger.getMessagesByLevel("warn")).toEqual([
 *   { level: "warn", message: "Fetch failed", context: { url: "https://downloads.test/x", error: "fetch failed" } },
 * ]);
 */
export function createBehavioralLogger(): BehavioralLogger {
  const messages: LoggedMessage[] = [];
  const record =
    (level: LogLevelName) =>
    (message: string, context?: LogContext): void => {
      messages.push({ level, message, context });
    };

  return {
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getMessages: () => [...messages],
    getMessagesByLevel: (level) => messages.filter((m) => m.level === level),
  };
}
