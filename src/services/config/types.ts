/**
 * Configuration types for a provisioning run.
 *
 * A ProvisionConfig is built once from the command-line options and passed,
 * unchanged, through every pipeline stage.
 */

/**
 * Package lists installed into every environment.
 */
export interface PackageCatalog {
  /** Installed on every platform, in this order */
  readonly base: readonly string[];
  /** Appended on Windows only */
  readonly windowsOnly: readonly string[];
  /** Appended on macOS and Linux only */
  readonly unixOnly: readonly string[];
}

/**
 * Immutable configuration for one provisioning run.
 */
export interface ProvisionConfig {
  /** Absolute path of the virtual environment directory */
  readonly envDir: string;
  /** Absolute path where the portable runtime lives or will be installed */
  readonly runtimeDir: string;
  /** Explicit interpreter override, as given on the command line */
  readonly pythonBin?: string;
  /** Print the plan instead of changing anything */
  readonly dryRun: boolean;
  /** Additional packages requested by the user, in the order given */
  readonly extras: readonly string[];
  readonly catalog: PackageCatalog;
  /** Release directory the Miniforge installers are downloaded from */
  readonly miniforgeBaseUrl: string;
}

/**
 * Libraries every automation environment gets.
 */
export const DEFAULT_PACKAGE_CATALOG: PackageCatalog = Object.freeze({
  base: Object.freeze([
    "requests",
    "urllib3",
    "python-dotenv",
    "pydantic",
    "pandas",
    "numpy",
    "pyyaml",
    "schedule",
    "rich",
    "loguru",
    "click",
    "boto3",
    "paramiko",
    "beautifulsoup4",
    "lxml",
    "selenium",
    "openpyxl",
    "psutil",
  ]),
  windowsOnly: Object.freeze(["pywin32"]),
  unixOnly: Object.freeze([]),
});

export const MINIFORGE_BASE_URL = "https://github.com/conda-forge/miniforge/releases/latest/download";

/** Default virtual environment directory, relative to the working directory */
export const DEFAULT_ENV_DIR = ".venv";

/** Default portable runtime directory, relative to the working directory */
export const DEFAULT_RUNTIME_DIR = "python-runtime";
