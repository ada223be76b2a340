/**
 * Interpreter resolution.
 *
 * Resolves the interpreter used to build the virtual environment with the
 * following priority:
 * 1. Explicit path from --python-bin
 * 2. python3 / python / py in the working directory or on the search path
 * 3. A portable runtime installed by an earlier run
 * 4. A portable runtime installed now
 */

import * as path from "node:path";
import { InterpreterError } from "../errors.js";
import { resolveUserPath } from "../config/options.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Terminal } from "../platform/terminal.js";
import { portableInterpreterPath } from "./miniforge.js";
import type { RuntimeInstaller } from "./runtime-installer.js";
import type { PlatformTag, ResolvedInterpreter } from "./types.js";

/** Interpreter names looked up on the host, in order */
export const SYSTEM_INTERPRETER_CANDIDATES = ["python3", "python", "py"] as const;

export interface InterpreterLocatorDeps {
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
  readonly runtimeInstaller: RuntimeInstaller;
  readonly terminal: Terminal;
  readonly logger: Logger;
  readonly platformInfo: Pick<PlatformInfo, "homeDir" | "cwd">;
  readonly platform: PlatformTag;
  readonly dryRun: boolean;
}

export interface LocateOptions {
  /** Interpreter override as given by the user */
  readonly explicit?: string | undefined;
  /** Where the portable runtime lives or will be installed */
  readonly runtimeDir: string;
}

export class InterpreterLocator {
  private readonly fileSystem: FileSystemLayer;
  private readonly processRunner: ProcessRunner;
  private readonly runtimeInstaller: RuntimeInstaller;
  private readonly terminal: Terminal;
  private readonly logger: Logger;
  private readonly platformInfo: Pick<PlatformInfo, "homeDir" | "cwd">;
  private readonly platform: PlatformTag;
  private readonly dryRun: boolean;

  constructor(deps: InterpreterLocatorDeps) {
    this.fileSystem = deps.fileSystem;
    this.processRunner = deps.processRunner;
    this.runtimeInstaller = deps.runtimeInstaller;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
    this.platformInfo = deps.platformInfo;
    this.platform = deps.platform;
    this.dryRun = deps.dryRun;
  }

  /**
   * Resolve an interpreter, installing the portable runtime if nothing else is available.
   *
   * @throws InterpreterError INTERPRETER_NOT_FOUND when the explicit path does not exist
   */
  async resolve(options: LocateOptions): Promise<ResolvedInterpreter> {
    if (options.explicit) {
      return this.resolveExplicit(options.explicit);
    }

    const systemPath = await this.findSystemInterpreter();
    if (systemPath !== null) {
      this.terminal.write(`Detected existing python interpreter: ${systemPath}`);
      return { path: systemPath, source: "system" };
    }

    const runtimePython = portableInterpreterPath(this.platform, options.runtimeDir);
    if (await this.fileSystem.exists(runtimePython)) {
      this.terminal.write(`Reusing portable runtime at ${runtimePython}`);
      return { path: runtimePython, source: "portable-existing" };
    }

    this.terminal.write(
      `No python detected. Installing portable runtime into ${options.runtimeDir}...`
    );
    await this.runtimeInstaller.install(options.runtimeDir, this.platform);
    return { path: runtimePython, source: "portable-installed" };
  }

  private async resolveExplicit(explicit: string): Promise<ResolvedInterpreter> {
    const resolved = await this.fileSystem.canonicalize(resolveUserPath(explicit, this.platformInfo));
    if (this.dryRun || (await this.fileSystem.exists(resolved))) {
      this.terminal.write(`Using user-specified python interpreter: ${resolved}`);
      return { path: resolved, source: "explicit" };
    }
    throw new InterpreterError(
      `Specified python interpreter not found: ${resolved}`,
      "INTERPRETER_NOT_FOUND",
      resolved
    );
  }

  /**
   * Look up the candidate names: first as a path relative to the working
   * directory, then on the search path.
   */
  async findSystemInterpreter(): Promise<string | null> {
    for (const candidate of SYSTEM_INTERPRETER_CANDIDATES) {
      const local = path.resolve(this.platformInfo.cwd, candidate);
      if (await this.fileSystem.exists(local)) {
        this.logger.debug("Found interpreter in working directory", { path: local });
        return local;
      }

      const onPath = await this.lookupOnPath(candidate);
      if (onPath !== null) {
        this.logger.debug("Found interpreter on search path", { name: candidate, path: onPath });
        return onPath;
      }
    }
    this.logger.debug("No system interpreter found");
    return null;
  }

  private async lookupOnPath(name: string): Promise<string | null> {
    const command = this.platform === "windows" ? "where" : "which";
    const result = await this.processRunner.run(command, [name]).wait();
    if (result.exitCode !== 0) {
      return null;
    }
    // 'where' can return multiple lines - use first
    const firstLine = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line !== "");
    return firstLine ?? null;
  }
}
