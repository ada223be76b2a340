/**
 * pip invocations inside the virtual environment.
 */

import type { Logger } from "../logging/index.js";
import type { Terminal } from "../platform/terminal.js";
import type { CommandExecutor } from "./command-executor.js";

/** Packaging tools refreshed before anything else is installed */
export const TOOLING_PACKAGES = ["pip", "setuptools", "wheel"] as const;

export interface PackageInstallerDeps {
  readonly executor: CommandExecutor;
  readonly terminal: Terminal;
  readonly logger: Logger;
}

export class PackageInstaller {
  private readonly executor: CommandExecutor;
  private readonly terminal: Terminal;
  private readonly logger: Logger;

  constructor(deps: PackageInstallerDeps) {
    this.executor = deps.executor;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
  }

  /**
   * Upgrade pip, setuptools and wheel. Always runs, even when nothing else is installed.
   */
  async upgradeTooling(envPython: string): Promise<void> {
    this.terminal.write("Upgrading pip, setuptools, and wheel...");
    await this.executor.execute(envPython, ["-m", "pip", "install", "--upgrade", ...TOOLING_PACKAGES]);
  }

  /**
   * Install all packages in a single pip invocation.
   */
  async install(envPython: string, packages: readonly string[]): Promise<void> {
    if (packages.length === 0) {
      this.terminal.write("No packages requested.");
      return;
    }

    this.terminal.write(`Installing ${packages.length} packages...`);
    this.logger.debug("Installing packages", { count: packages.length, packages: packages.join(",") });
    await this.executor.execute(envPython, ["-m", "pip", "install", "--upgrade", ...packages]);
  }
}
