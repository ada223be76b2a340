/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with the in-memory state mock
 * - Boundary testing of DefaultFileSystemLayer against a real temp directory
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FileSystemError } from "../errors.js";
import type { Logger } from "../logging/index.js";

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. Methods throw FileSystemError on failures.
 */
export interface FileSystemLayer {
  /**
   * Check whether a file or directory exists at the path.
   * Only "not found" answers false; other failures (EACCES, ...) throw.
   *
   * @example
   * if (await fs.exists('/work/.venv')) { ... }
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   * @throws FileSystemError with code EACCES if permission denied
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Create a uniquely named directory `<parent>/<prefix>XXXXXX` and return its path.
   *
   * @example
   * const dir = await fs.mkdtemp('/tmp', 'python-bootstrap-');
   * // -> '/tmp/python-bootstrap-a1B2c3'
   */
  mkdtemp(parent: string, prefix: string): Promise<string>;

  /**
   * Delete file or directory.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code ENOTEMPTY if directory not empty (unless recursive: true)
   *
   * @example Remove directory tree if present
   * await fs.rm('/tmp/python-bootstrap-a1B2c3', { recursive: true, force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Write binary content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /**
   * Make a file executable (chmod 755). No-op on Windows.
   */
  makeExecutable(path: string): Promise<void>;

  /**
   * Absolute path with symlinks resolved. Only the longest existing prefix is
   * resolved; missing trailing segments are appended unchanged.
   *
   * @example
   * // /work/envs -> /data/envs
   * await fs.canonicalize('/work/envs/bot/.venv'); // '/data/envs/bot/.venv'
   */
  canonicalize(path: string): Promise<string>;
}

// ============================================================================
// Error Mapping
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * Handles both ErrnoException (regular fs errors) and SystemError (rm errors),
 * where the latter carries codes like ERR_FS_EISDIR but info.code holds "EISDIR".
 */
function extractErrorCode(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    if ("code" in error.info && typeof error.info.code === "string") {
      return error.info.code;
    }
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);
  if (code !== undefined && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.stat(targetPath);
      return true;
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (fsError.fsCode === "ENOENT" || fsError.fsCode === "ENOTDIR") {
        return false;
      }
      this.logger.warn("Stat failed", {
        path: targetPath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.failed("Mkdir", error, dirPath);
    }
  }

  async mkdtemp(parent: string, prefix: string): Promise<string> {
    try {
      const created = await fs.mkdtemp(path.join(parent, prefix));
      this.logger.debug("Mkdtemp", { path: created });
      return created;
    } catch (error) {
      throw this.failed("Mkdtemp", error, parent);
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
        return;
      }
      const stat = await fs.stat(targetPath);
      if (stat.isDirectory()) {
        // rmdir fails with ENOTEMPTY if not empty
        await fs.rmdir(targetPath);
      } else {
        await fs.rm(targetPath, { force });
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      this.logWarning("Rm", fsError);
      throw fsError;
    }
  }

  async writeFileBuffer(filePath: string, content: Buffer): Promise<void> {
    this.logger.debug("WriteBuffer", { path: filePath, size: content.length });
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      throw this.failed("WriteBuffer", error, filePath);
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    // On Windows, executability is determined by file extension, not permissions
    if (this.platform === "win32") {
      return;
    }
    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw this.failed("Chmod", error, filePath);
    }
  }

  async canonicalize(targetPath: string): Promise<string> {
    const missing: string[] = [];
    let current = path.resolve(targetPath);
    for (;;) {
      try {
        const real = await fs.realpath(current);
        return path.join(real, ...missing);
      } catch (error) {
        const fsError = mapError(error, current);
        const parent = path.dirname(current);
        if ((fsError.fsCode !== "ENOENT" && fsError.fsCode !== "ENOTDIR") || parent === current) {
          this.logWarning("Realpath", fsError);
          throw fsError;
        }
        missing.unshift(path.basename(current));
        current = parent;
      }
    }
  }

  private failed(operation: string, error: unknown, targetPath: string): FileSystemError {
    const fsError = mapError(error, targetPath);
    this.logWarning(operation, fsError);
    return fsError;
  }

  private logWarning(operation: string, fsError: FileSystemError): void {
    this.logger.warn(`${operation} failed`, {
      path: fsError.path,
      code: fsError.fsCode,
      error: fsError.message,
    });
  }
}
