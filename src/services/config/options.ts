/**
 * Command-line option validation using Zod schemas.
 * Turns raw option values into a ProvisionConfig.
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import {
  DEFAULT_ENV_DIR,
  DEFAULT_PACKAGE_CATALOG,
  DEFAULT_RUNTIME_DIR,
  MINIFORGE_BASE_URL,
  type PackageCatalog,
  type ProvisionConfig,
} from "./types.js";

const nonEmptyPath = z.string().trim().min(1, { message: "must not be empty" });

export const CliOptionsSchema = z.object({
  envDir: nonEmptyPath.default(DEFAULT_ENV_DIR),
  runtimeDir: nonEmptyPath.default(DEFAULT_RUNTIME_DIR),
  pythonBin: nonEmptyPath.optional(),
  dryRun: z.boolean().default(false),
  extra: z.array(z.string()).default([]),
});

/** Options as commander hands them over, before validation. */
export type CliOptions = z.input<typeof CliOptionsSchema>;

/**
 * Expand a leading `~` to the home directory and resolve against the working directory.
 *
 * @example
 * resolveUserPath("~/envs/a", { homeDir: "/home/dev", cwd: "/work" }) // "/home/dev/envs/a"
 * resolveUserPath(".venv", { homeDir: "/home/dev", cwd: "/work" })   // "/work/.venv"
 */
export function resolveUserPath(
  raw: string,
  platform: Pick<PlatformInfo, "homeDir" | "cwd">
): string {
  let expanded = raw;
  if (raw === "~") {
    expanded = platform.homeDir;
  } else if (raw.startsWith("~/") || raw.startsWith("~\\")) {
    expanded = path.join(platform.homeDir, raw.slice(2));
  }
  return path.resolve(platform.cwd, expanded);
}

/**
 * Validate raw options and build the run configuration.
 *
 * @throws ConfigError if an option fails validation
 */
export function buildProvisionConfig(
  rawOptions: unknown,
  platform: Pick<PlatformInfo, "homeDir" | "cwd">,
  overrides?: { readonly catalog?: PackageCatalog; readonly miniforgeBaseUrl?: string }
): ProvisionConfig {
  const result = CliOptionsSchema.safeParse(rawOptions);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${message}`);
  }

  const options = result.data;
  const config: ProvisionConfig = {
    envDir: resolveUserPath(options.envDir, platform),
    runtimeDir: resolveUserPath(options.runtimeDir, platform),
    dryRun: options.dryRun,
    extras: options.extra,
    catalog: overrides?.catalog ?? DEFAULT_PACKAGE_CATALOG,
    miniforgeBaseUrl: overrides?.miniforgeBaseUrl ?? MINIFORGE_BASE_URL,
  };
  return options.pythonBin !== undefined ? { ...config, pythonBin: options.pythonBin } : config;
}

/**
 * Resolve symlinks in the environment and runtime directories so that every
 * printed path and command names the real location.
 */
export async function canonicalizeDirectories(
  config: ProvisionConfig,
  fileSystem: Pick<FileSystemLayer, "canonicalize">
): Promise<ProvisionConfig> {
  return {
    ...config,
    envDir: await fileSystem.canonicalize(config.envDir),
    runtimeDir: await fileSystem.canonicalize(config.runtimeDir),
  };
}
