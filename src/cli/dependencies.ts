/**
 * Composition root: the production implementations of every platform boundary.
 */

import { ElectronLogService } from "../services/logging/index.js";
import {
  DefaultFileSystemLayer,
  DefaultNetworkLayer,
  ExecaProcessRunner,
  ProcessTerminal,
  createHostPlatformInfo,
} from "../services/platform/index.js";
import type { ProvisionPlatform } from "../services/provision/index.js";

export function createCliDependencies(env: NodeJS.ProcessEnv = process.env): ProvisionPlatform {
  const loggingService = new ElectronLogService(env);
  return {
    loggingService,
    processRunner: new ExecaProcessRunner(loggingService.createLogger("process")),
    fileSystem: new DefaultFileSystemLayer(loggingService.createLogger("fs")),
    httpClient: new DefaultNetworkLayer(loggingService.createLogger("network")),
    terminal: new ProcessTerminal(),
    platformInfo: createHostPlatformInfo(),
  };
}
