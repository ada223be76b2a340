/**
 * Service error definitions.
 *
 * Every error the provisioning pipeline raises is a ServiceError subclass so the
 * CLI can report it uniformly. Nothing in the pipeline recovers from these.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for portable runtime installation.
 */
export type RuntimeInstallErrorCode = "UNSUPPORTED_ARCHITECTURE" | "DOWNLOAD_FAILED";

/**
 * Error codes for interpreter resolution.
 */
export type InterpreterErrorCode = "INTERPRETER_NOT_FOUND" | "VENV_INTERPRETER_MISSING";

/**
 * Error codes for configuration validation.
 */
export type ConfigErrorCode = "INVALID_OPTIONS";

/**
 * Discriminator shared by all service errors.
 */
export type ServiceErrorType = "runtime-install" | "interpreter" | "command" | "filesystem" | "config";

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: ServiceErrorType;
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error from portable runtime installation (architecture lookup, download).
 */
export class RuntimeInstallError extends ServiceError {
  readonly type = "runtime-install" as const;

  constructor(
    message: string,
    readonly errorCode: RuntimeInstallErrorCode
  ) {
    super(message, errorCode);
    this.name = "RuntimeInstallError";
  }
}

/**
 * Error from interpreter resolution: a missing override or a missing
 * in-environment interpreter after venv creation.
 */
export class InterpreterError extends ServiceError {
  readonly type = "interpreter" as const;

  constructor(
    message: string,
    readonly errorCode: InterpreterErrorCode,
    /** The interpreter path that could not be found */
    readonly path: string
  ) {
    super(message, errorCode);
    this.name = "InterpreterError";
  }
}

/**
 * An external command exited unsuccessfully.
 */
export class CommandError extends ServiceError {
  readonly type = "command" as const;

  constructor(
    /** Exit code, or null when the process did not exit normally */
    readonly exitCode: number | null,
    /** Full command line as printed to the user */
    readonly commandLine: string,
    /** Signal name when the process was killed */
    readonly signal?: string
  ) {
    super(`Command failed (${describeExit(exitCode, signal)}): ${commandLine}`, "COMMAND_FAILED");
    this.name = "CommandError";
  }
}

function describeExit(exitCode: number | null, signal: string | undefined): string {
  if (exitCode !== null) return String(exitCode);
  return signal ?? "no exit code";
}

/**
 * Invalid CLI options.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(message: string) {
    super(message, "INVALID_OPTIONS");
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Extract a message string from an unknown error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
