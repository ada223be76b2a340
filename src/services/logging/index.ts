/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel } from "./types.js";
export { ElectronLogService, DEFAULT_LOG_LEVEL } from "./electron-log-service.js";
