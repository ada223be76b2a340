/**
 * Wires the pipeline stages for one run.
 */

import type { ProvisionConfig } from "../config/types.js";
import type { LoggingService } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Terminal } from "../platform/terminal.js";
import { CommandExecutor } from "./command-executor.js";
import { EnvironmentBuilder } from "./environment-builder.js";
import { InterpreterLocator } from "./interpreter-locator.js";
import { PackageInstaller } from "./package-installer.js";
import { detectPlatform } from "./platform-detector.js";
import { Provisioner } from "./provisioner.js";
import { RuntimeInstaller } from "./runtime-installer.js";

/**
 * Platform boundaries the pipeline runs against.
 */
export interface ProvisionPlatform {
  readonly processRunner: ProcessRunner;
  readonly fileSystem: FileSystemLayer;
  readonly httpClient: HttpClient;
  readonly terminal: Terminal;
  readonly platformInfo: PlatformInfo;
  readonly loggingService: LoggingService;
}

/**
 * Create a Provisioner for the given configuration.
 * The platform tag is detected here, once per run.
 */
export function createProvisioner(config: ProvisionConfig, deps: ProvisionPlatform): Provisioner {
  const platform = detectPlatform(deps.platformInfo.osName);
  const { terminal, fileSystem, loggingService } = deps;

  const executor = new CommandExecutor({
    processRunner: deps.processRunner,
    terminal,
    logger: loggingService.createLogger("process"),
    dryRun: config.dryRun,
  });

  const runtimeInstaller = new RuntimeInstaller({
    fileSystem,
    httpClient: deps.httpClient,
    executor,
    terminal,
    logger: loggingService.createLogger("runtime-install"),
    platformInfo: deps.platformInfo,
    baseUrl: config.miniforgeBaseUrl,
  });

  return new Provisioner({
    locator: new InterpreterLocator({
      fileSystem,
      processRunner: deps.processRunner,
      runtimeInstaller,
      terminal,
      logger: loggingService.createLogger("interpreter"),
      platformInfo: deps.platformInfo,
      platform,
      dryRun: config.dryRun,
    }),
    environmentBuilder: new EnvironmentBuilder({
      fileSystem,
      executor,
      terminal,
      logger: loggingService.createLogger("venv"),
      platform,
    }),
    packageInstaller: new PackageInstaller({
      executor,
      terminal,
      logger: loggingService.createLogger("packages"),
    }),
    terminal,
    logger: loggingService.createLogger("provision"),
    platform,
  });
}
