/**
 * Platform information provider.
 * Abstracts os.type(), os.machine(), os.homedir(), os.tmpdir() and process.cwd() for testability.
 */

import * as os from "node:os";

export interface PlatformInfo {
  /** Operating system name as reported by the host: 'Linux', 'Darwin', 'Windows_NT' */
  readonly osName: string;

  /** Raw machine architecture: 'x86_64', 'arm64', 'aarch64', ... */
  readonly machine: string;

  /** User's home directory */
  readonly homeDir: string;

  /** Directory for temporary files */
  readonly tmpDir: string;

  /** Working directory relative paths resolve against */
  readonly cwd: string;
}

/**
 * Read platform information from the running host.
 */
export function createHostPlatformInfo(): PlatformInfo {
  return {
    osName: os.type(),
    machine: os.machine(),
    homeDir: os.homedir(),
    tmpDir: os.tmpdir(),
    cwd: process.cwd(),
  };
}
