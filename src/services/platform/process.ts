/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging/index.js";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
  /**
   * Stream stdout/stderr straight to this process's terminal instead of
   * capturing them. Captured fields are then empty.
   */
  readonly inheritOutput?: boolean;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status - check result fields instead.
   *
   * @example
   * const result = await proc.wait();
   * if (result.exitCode !== 0) {
   *   console.error(result.stderr);
   * }
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * Shape of an execa result (or execa error) that this module reads.
 */
interface ExecaOutcome {
  readonly stdout?: unknown;
  readonly stderr?: unknown;
  readonly exitCode?: number | undefined;
  readonly signal?: string | undefined;
  readonly failed?: boolean;
}

/**
 * SpawnedProcess implementation over an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: ProcessResult | null = null;

  constructor(
    readonly pid: number | undefined,
    private readonly completion: Promise<ProcessResult>,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  async wait(): Promise<ProcessResult> {
    if (this.cachedResult !== null) {
      return this.cachedResult;
    }

    const result = await this.completion;
    this.cachedResult = result;
    this.logResult(result);
    return result;
  }

  private logResult(result: ProcessResult): void {
    this.logOutputLines(result.stdout, "stdout");
    this.logOutputLines(result.stderr, "stderr");

    if (result.signal) {
      this.logger.warn("Killed", {
        command: this.command,
        pid: this.pid ?? 0,
        signal: result.signal,
      });
      return;
    }

    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
    });
  }

  /**
   * Log captured output lines at SILLY level.
   */
  private logOutputLines(output: string, stream: "stdout" | "stderr"): void {
    if (!output) return;

    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`${prefix} ${stream}: ${line}`);
    }
  }
}

/**
 * Convert an execa result into a ProcessResult.
 *
 * For spawn errors (ENOENT, EACCES) execa sets failed=true and puts the error
 * text in originalMessage instead of throwing (with reject: false).
 */
export function toProcessResult(outcome: ExecaOutcome): ProcessResult {
  let stderr = typeof outcome.stderr === "string" ? outcome.stderr : "";
  if (
    outcome.failed &&
    !stderr &&
    "originalMessage" in outcome &&
    typeof outcome.originalMessage === "string"
  ) {
    stderr = outcome.originalMessage;
  }

  const result: ProcessResult = {
    stdout: typeof outcome.stdout === "string" ? outcome.stdout : "",
    stderr,
    exitCode: outcome.exitCode ?? null,
  };
  if (outcome.signal) {
    return { ...result, signal: outcome.signal };
  }
  return result;
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const output = options?.inheritOutput ? "inherit" : "pipe";
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      stdin: "ignore",
      stdout: output,
      stderr: output,
      ...(options?.cwd !== undefined ? { cwd: options.cwd } : {}),
      // When custom env is provided, disable extendEnv so that deleted keys
      // from the custom env are actually removed (not inherited from process.env)
      ...(options?.env !== undefined ? { env: options.env, extendEnv: false } : {}),
    });

    const completion = subprocess.then(
      (result) => toProcessResult(result),
      (error: unknown) => this.spawnFailure(command, error)
    );

    const spawned = new ExecaSpawnedProcess(subprocess.pid, completion, this.logger, command);
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }
    return spawned;
  }

  private spawnFailure(command: string, error: unknown): ProcessResult {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error("Spawn failed", { command, error: message });
    return { stdout: "", stderr: message, exitCode: null };
  }
}
