/**
 * Provisioning pipeline module.
 */

export { createProvisioner, type ProvisionPlatform } from "./create-provisioner.js";
export { Provisioner, type ProvisionerDeps } from "./provisioner.js";
export { InterpreterLocator, SYSTEM_INTERPRETER_CANDIDATES } from "./interpreter-locator.js";
export { RuntimeInstaller, TEMP_DIR_PREFIX } from "./runtime-installer.js";
export { EnvironmentBuilder } from "./environment-builder.js";
export { PackageInstaller, TOOLING_PACKAGES } from "./package-installer.js";
export { CommandExecutor, formatCommandLine } from "./command-executor.js";
export { detectPlatform } from "./platform-detector.js";
export { gatherPackages } from "./packages.js";
export {
  activationHint,
  buildInstallerCommand,
  buildMiniforgeFilename,
  buildMiniforgeUrl,
  portableInterpreterPath,
  venvInterpreterPath,
} from "./miniforge.js";
export type {
  InterpreterSource,
  PlatformTag,
  ProvisionResult,
  ResolvedInterpreter,
} from "./types.js";
