/**
 * Miniforge release naming and per-platform layout of the portable runtime
 * and of virtual environments.
 */

import * as path from "node:path";
import { RuntimeInstallError } from "../errors.js";
import type { PlatformTag } from "./types.js";

/**
 * CPU families with published installers.
 */
type InstallerArch = "x86_64" | "arm64";

/**
 * Raw machine names (lowercased) accepted for each installer family.
 */
const MACHINE_ALIASES: Readonly<Record<string, InstallerArch>> = {
  x86_64: "x86_64",
  amd64: "x86_64",
  arm64: "arm64",
  aarch64: "arm64",
};

/**
 * Installer file name per platform and CPU family.
 * Linux publishes ARM builds as "aarch64", Windows and macOS as "arm64".
 */
const INSTALLER_FILENAMES: Readonly<Record<PlatformTag, Record<InstallerArch, string>>> = {
  windows: {
    x86_64: "Miniforge3-Windows-x86_64.exe",
    arm64: "Miniforge3-Windows-arm64.exe",
  },
  mac: {
    x86_64: "Miniforge3-MacOSX-x86_64.sh",
    arm64: "Miniforge3-MacOSX-arm64.sh",
  },
  linux: {
    x86_64: "Miniforge3-Linux-x86_64.sh",
    arm64: "Miniforge3-Linux-aarch64.sh",
  },
};

/**
 * Get the Miniforge installer file name for a platform and raw machine name.
 *
 * @throws RuntimeInstallError with code UNSUPPORTED_ARCHITECTURE for other machines
 *
 * @example
 * buildMiniforgeFilename("linux", "aarch64") // "Miniforge3-Linux-aarch64.sh"
 * buildMiniforgeFilename("windows", "AMD64") // "Miniforge3-Windows-x86_64.exe"
 */
export function buildMiniforgeFilename(platform: PlatformTag, machine: string): string {
  const arch = MACHINE_ALIASES[machine.toLowerCase()];
  if (arch === undefined) {
    throw new RuntimeInstallError(
      `Unsupported architecture '${machine}' for platform '${platform}'.`,
      "UNSUPPORTED_ARCHITECTURE"
    );
  }
  return INSTALLER_FILENAMES[platform][arch];
}

/**
 * Join the release directory URL and the installer file name.
 */
export function buildMiniforgeUrl(filename: string, baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${filename}`;
}

/**
 * Command line that installs Miniforge silently into runtimeDir.
 * The Windows installer needs the target as a single `/D=` argument.
 */
export function buildInstallerCommand(
  platform: PlatformTag,
  installerPath: string,
  runtimeDir: string
): { readonly command: string; readonly args: readonly string[] } {
  if (platform === "windows") {
    return {
      command: installerPath,
      args: ["/InstallationType=JustMe", "/AddToPath=0", "/S", `/D=${runtimeDir}`],
    };
  }
  return { command: "bash", args: [installerPath, "-b", "-p", runtimeDir] };
}

/**
 * Interpreter location inside an installed portable runtime.
 */
export function portableInterpreterPath(platform: PlatformTag, runtimeDir: string): string {
  return platform === "windows"
    ? path.join(runtimeDir, "python.exe")
    : path.join(runtimeDir, "bin", "python");
}

/**
 * Interpreter location inside a virtual environment.
 */
export function venvInterpreterPath(platform: PlatformTag, envDir: string): string {
  return platform === "windows"
    ? path.join(envDir, "Scripts", "python.exe")
    : path.join(envDir, "bin", "python");
}

/**
 * Shell command that activates a virtual environment.
 */
export function activationHint(platform: PlatformTag, envDir: string): string {
  return platform === "windows" ? `${envDir}\\Scripts\\activate` : `source ${envDir}/bin/activate`;
}
