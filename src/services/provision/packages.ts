/**
 * Package list assembly.
 */

import { DEFAULT_PACKAGE_CATALOG, type PackageCatalog } from "../config/types.js";
import type { PlatformTag } from "./types.js";

/**
 * Build the ordered install list: base libraries, then the platform list,
 * then each extra not already present. Empty extras are skipped.
 *
 * @example
 * gatherPackages("linux", ["httpx", "requests"])
 * // [...base, "httpx"] - "requests" is already in the base list
 */
export function gatherPackages(
  platform: PlatformTag,
  extras: readonly string[],
  catalog: PackageCatalog = DEFAULT_PACKAGE_CATALOG
): string[] {
  const packages = [
    ...catalog.base,
    ...(platform === "windows" ? catalog.windowsOnly : catalog.unixOnly),
  ];
  const seen = new Set(packages);

  for (const extra of extras) {
    if (extra && !seen.has(extra)) {
      seen.add(extra);
      packages.push(extra);
    }
  }
  return packages;
}
