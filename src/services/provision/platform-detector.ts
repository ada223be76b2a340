/**
 * Maps a host OS name to the platform family the pipeline targets.
 */

import type { PlatformTag } from "./types.js";

/**
 * Detect the platform family from an OS name such as os.type() returns.
 * Matching is a case-insensitive substring test; anything unrecognized is linux.
 *
 * @example
 * detectPlatform("Windows_NT") // "windows"
 * detectPlatform("Darwin")     // "mac"
 * detectPlatform("FreeBSD")    // "linux"
 */
export function detectPlatform(osName: string): PlatformTag {
  const name = osName.toLowerCase();
  if (name.includes("windows")) {
    return "windows";
  }
  if (name.includes("darwin")) {
    return "mac";
  }
  return "linux";
}
