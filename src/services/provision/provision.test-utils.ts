/**
 * Test harness wiring every pipeline stage to state mocks.
 */

import { createProvisioner } from "./create-provisioner.js";
import { CommandExecutor } from "./command-executor.js";
import { EnvironmentBuilder } from "./environment-builder.js";
import { InterpreterLocator } from "./interpreter-locator.js";
import { PackageInstaller } from "./package-installer.js";
import { RuntimeInstaller } from "./runtime-installer.js";
import { detectPlatform } from "./platform-detector.js";
import type { Provisioner } from "./provisioner.js";
import type { PlatformTag } from "./types.js";
import { MINIFORGE_BASE_URL, type ProvisionConfig } from "../config/types.js";
import { buildProvisionConfig } from "../config/options.js";
import {
  createMockProcessRunner,
  type MockProcessRunner,
  type SpawnConfig,
} from "../platform/process.state-mock.js";
import {
  createFileSystemMock,
  type Entry,
  type MockFileSystemLayer,
} from "../platform/filesystem.state-mock.js";
import {
  createMockHttpClient,
  type ConfiguredResponse,
  type MockHttpClient,
} from "../platform/http-client.state-mock.js";
import { createRecordingTerminal, type RecordingTerminal } from "../platform/terminal.test-utils.js";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessOptions } from "../platform/process.js";
import {
  createMockLoggingService,
  type MockLoggingService,
} from "../logging/logging.test-utils.js";

export interface ProvisionHarnessOptions {
  readonly dryRun?: boolean;
  readonly platformInfo?: Partial<PlatformInfo>;
  /** Initial filesystem entries */
  readonly entries?: Record<string, Entry>;
  /**
   * Per-spawn results. Lookups (which/where) that this returns nothing for
   * report "not found"; every other command succeeds.
   */
  readonly onSpawn?: (
    command: string,
    args: readonly string[],
    options: ProcessOptions | undefined
  ) => SpawnConfig | undefined;
  readonly responses?: Record<string, ConfiguredResponse>;
}

export interface ProvisionHarness {
  readonly processRunner: MockProcessRunner;
  readonly fileSystem: MockFileSystemLayer;
  readonly httpClient: MockHttpClient;
  readonly terminal: RecordingTerminal;
  readonly loggingService: MockLoggingService;
  readonly platformInfo: PlatformInfo;
  readonly platform: PlatformTag;
  readonly executor: CommandExecutor;
  readonly runtimeInstaller: RuntimeInstaller;
  readonly locator: InterpreterLocator;
  readonly environmentBuilder: EnvironmentBuilder;
  readonly packageInstaller: PackageInstaller;
  /** Build a config as the CLI would from raw options */
  config(rawOptions?: Record<string, unknown>): ProvisionConfig;
  /** Build a provisioner through the production wiring */
  provisioner(config: ProvisionConfig): Provisioner;
}

/**
 * Answers which/where with "not found" unless the test says otherwise.
 */
function withLookupMisses(
  onSpawn: ProvisionHarnessOptions["onSpawn"]
): NonNullable<ProvisionHarnessOptions["onSpawn"]> {
  return (command, args, options) => {
    const configured = onSpawn?.(command, args, options);
    if (configured !== undefined) {
      return configured;
    }
    if (command === "which" || command === "where") {
      return { exitCode: 1 };
    }
    return undefined;
  };
}

export function createProvisionHarness(options: ProvisionHarnessOptions = {}): ProvisionHarness {
  const dryRun = options.dryRun ?? false;
  const processRunner = createMockProcessRunner({ onSpawn: withLookupMisses(options.onSpawn) });
  const fileSystem = createFileSystemMock(
    options.entries !== undefined ? { entries: options.entries } : {}
  );
  const httpClient = createMockHttpClient(
    options.responses !== undefined ? { responses: options.responses } : {}
  );
  const terminal = createRecordingTerminal();
  const loggingService = createMockLoggingService();
  const platformInfo = createMockPlatformInfo(options.platformInfo);
  const platform = detectPlatform(platformInfo.osName);

  const executor = new CommandExecutor({
    processRunner,
    terminal,
    logger: loggingService.createLogger("process"),
    dryRun,
  });
  const runtimeInstaller = new RuntimeInstaller({
    fileSystem,
    httpClient,
    executor,
    terminal,
    logger: loggingService.createLogger("runtime-install"),
    platformInfo,
    baseUrl: MINIFORGE_BASE_URL,
  });

  return {
    processRunner,
    fileSystem,
    httpClient,
    terminal,
    loggingService,
    platformInfo,
    platform,
    executor,
    runtimeInstaller,
    locator: new InterpreterLocator({
      fileSystem,
      processRunner,
      runtimeInstaller,
      terminal,
      logger: loggingService.createLogger("interpreter"),
      platformInfo,
      platform,
      dryRun,
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
    config: (rawOptions = {}) => buildProvisionConfig({ dryRun, ...rawOptions }, platformInfo),
    provisioner: (config) =>
      createProvisioner(config, {
        processRunner,
        fileSystem,
        httpClient,
        terminal,
        platformInfo,
        loggingService,
      }),
  };
}
