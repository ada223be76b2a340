/**
 * Types shared by the provisioning pipeline stages.
 */

/**
 * Platform family the pipeline targets.
 */
export type PlatformTag = "windows" | "mac" | "linux";

/**
 * Where a resolved interpreter came from.
 * - explicit: given with --python-bin
 * - system: found in the working directory or on the search path
 * - portable-existing: a portable runtime installed by an earlier run
 * - portable-installed: a portable runtime installed by this run
 */
export type InterpreterSource = "explicit" | "system" | "portable-existing" | "portable-installed";

/**
 * Interpreter chosen to build the virtual environment.
 */
export interface ResolvedInterpreter {
  /** Absolute path to the interpreter executable */
  readonly path: string;
  readonly source: InterpreterSource;
}

/**
 * Outcome of a completed provisioning run.
 */
export interface ProvisionResult {
  readonly platform: PlatformTag;
  readonly interpreter: ResolvedInterpreter;
  readonly envDir: string;
  /** Interpreter inside the virtual environment */
  readonly envPython: string;
  /** Packages handed to pip, in install order */
  readonly packages: readonly string[];
  /** Shell command that activates the environment */
  readonly activationHint: string;
}
