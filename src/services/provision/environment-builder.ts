/**
 * Virtual environment creation.
 */

import { InterpreterError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { Terminal } from "../platform/terminal.js";
import type { CommandExecutor } from "./command-executor.js";
import { venvInterpreterPath } from "./miniforge.js";
import type { PlatformTag } from "./types.js";

export interface EnvironmentBuilderDeps {
  readonly fileSystem: FileSystemLayer;
  readonly executor: CommandExecutor;
  readonly terminal: Terminal;
  readonly logger: Logger;
  readonly platform: PlatformTag;
}

export class EnvironmentBuilder {
  private readonly fileSystem: FileSystemLayer;
  private readonly executor: CommandExecutor;
  private readonly terminal: Terminal;
  private readonly logger: Logger;
  private readonly platform: PlatformTag;

  constructor(deps: EnvironmentBuilderDeps) {
    this.fileSystem = deps.fileSystem;
    this.executor = deps.executor;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
    this.platform = deps.platform;
  }

  /**
   * Create the environment unless envDir already exists, and return its interpreter.
   * An existing directory is reused as-is, whatever it contains.
   *
   * @throws InterpreterError VENV_INTERPRETER_MISSING when the interpreter is absent
   *   afterwards (not checked in simulation mode)
   */
  async ensure(envDir: string, interpreter: string): Promise<string> {
    if (await this.fileSystem.exists(envDir)) {
      this.terminal.write(`Using existing virtual environment at ${envDir}.`);
    } else {
      this.terminal.write(`Creating virtual environment at ${envDir}...`);
      await this.executor.execute(interpreter, ["-m", "venv", envDir]);
    }

    const envPython = venvInterpreterPath(this.platform, envDir);
    if (!this.executor.dryRun && !(await this.fileSystem.exists(envPython))) {
      throw new InterpreterError(
        `Cannot locate interpreter inside venv: ${envPython}`,
        "VENV_INTERPRETER_MISSING",
        envPython
      );
    }

    this.logger.debug("Environment ready", { envDir, envPython });
    return envPython;
  }
}
