/**
 * Configuration module.
 */

export {
  type PackageCatalog,
  type ProvisionConfig,
  DEFAULT_PACKAGE_CATALOG,
  DEFAULT_ENV_DIR,
  DEFAULT_RUNTIME_DIR,
  MINIFORGE_BASE_URL,
} from "./types.js";
export {
  CliOptionsSchema,
  buildProvisionConfig,
  canonicalizeDirectories,
  resolveUserPath,
  type CliOptions,
} from "./options.js";
