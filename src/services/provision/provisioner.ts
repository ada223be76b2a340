/**
 * Provisioning pipeline driver.
 *
 * Runs interpreter resolution, environment creation, tooling upgrade and
 * package installation in order. The first failing stage aborts the run and
 * its error propagates unchanged.
 */

import type { ProvisionConfig } from "../config/types.js";
import type { Logger } from "../logging/index.js";
import type { Terminal } from "../platform/terminal.js";
import type { EnvironmentBuilder } from "./environment-builder.js";
import type { InterpreterLocator } from "./interpreter-locator.js";
import { activationHint } from "./miniforge.js";
import type { PackageInstaller } from "./package-installer.js";
import { gatherPackages } from "./packages.js";
import type { PlatformTag, ProvisionResult } from "./types.js";

export interface ProvisionerDeps {
  readonly locator: InterpreterLocator;
  readonly environmentBuilder: EnvironmentBuilder;
  readonly packageInstaller: PackageInstaller;
  readonly terminal: Terminal;
  readonly logger: Logger;
  readonly platform: PlatformTag;
}

export class Provisioner {
  private readonly locator: InterpreterLocator;
  private readonly environmentBuilder: EnvironmentBuilder;
  private readonly packageInstaller: PackageInstaller;
  private readonly terminal: Terminal;
  private readonly logger: Logger;
  private readonly platform: PlatformTag;

  constructor(deps: ProvisionerDeps) {
    this.locator = deps.locator;
    this.environmentBuilder = deps.environmentBuilder;
    this.packageInstaller = deps.packageInstaller;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
    this.platform = deps.platform;
  }

  async run(config: ProvisionConfig): Promise<ProvisionResult> {
    this.logger.info("Provisioning started", {
      platform: this.platform,
      envDir: config.envDir,
      dryRun: config.dryRun,
    });

    const interpreter = await this.locator.resolve({
      explicit: config.pythonBin,
      runtimeDir: config.runtimeDir,
    });
    this.logger.debug("Interpreter resolved", {
      path: interpreter.path,
      source: interpreter.source,
    });

    const envPython = await this.environmentBuilder.ensure(config.envDir, interpreter.path);
    await this.packageInstaller.upgradeTooling(envPython);

    const packages = gatherPackages(this.platform, config.extras, config.catalog);
    await this.packageInstaller.install(envPython, packages);

    const hint = activationHint(this.platform, config.envDir);
    this.terminal.write("");
    this.terminal.write("Environment ready!");
    this.terminal.write("Activate it with:");
    this.terminal.write(`  ${hint}`);

    this.logger.info("Provisioning finished", { envDir: config.envDir });
    return {
      platform: this.platform,
      interpreter,
      envDir: config.envDir,
      envPython,
      packages,
      activationHint: hint,
    };
  }
}
