/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info.js";

/**
 * Create a mock PlatformInfo with controllable behavior.
 * Defaults to a Linux x86_64 host with test directories.
 *
 * @param overrides - Optional overrides for PlatformInfo properties
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    osName: overrides?.osName ?? "Linux",
    machine: overrides?.machine ?? "x86_64",
    homeDir: overrides?.homeDir ?? "/home/test",
    tmpDir: overrides?.tmpDir ?? "/tmp",
    cwd: overrides?.cwd ?? "/work",
  };
}
