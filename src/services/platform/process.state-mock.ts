/**
 * State mock for ProcessRunner following the State Mock Pattern.
 * Records every spawn and answers with configurable results.
 */
import type { ProcessRunner, SpawnedProcess, ProcessResult, ProcessOptions } from "./process.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Spawn record for partial matching in assertions.
 * All properties are optional to support partial matching.
 */
export interface SpawnRecord {
  readonly command?: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  readonly inheritOutput?: boolean;
}

/**
 * State interface for MockSpawnedProcess.
 */
export interface SpawnedProcessMockState extends MockState {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string | undefined;
  readonly inheritOutput: boolean;
}

/**
 * State interface for MockProcessRunner.
 */
export interface ProcessRunnerMockState extends MockState {
  /** Number of processes spawned so far. */
  readonly count: number;

  /**
   * Get spawned process by index.
   * @throws Error if index out of bounds
   */
  spawned(index: number): MockSpawnedProcess;

  /**
   * Get the first spawned process with the given command.
   * @throws Error if no match found
   */
  spawned(filter: { command: string }): MockSpawnedProcess;
}

export type MockSpawnedProcess = SpawnedProcess & MockWithState<SpawnedProcessMockState>;

export type MockProcessRunner = ProcessRunner & MockWithState<ProcessRunnerMockState>;

/**
 * Configuration returned by onSpawn callback.
 */
export interface SpawnConfig {
  /** Process ID. Explicitly set to undefined to simulate a spawn failure (ENOENT). */
  readonly pid?: number | undefined;
  /** Exit code for wait(). Default: 0. null simulates a signal kill or spawn failure. */
  readonly exitCode?: number | null;
  readonly stdout?: string;
  readonly stderr?: string;
  readonly signal?: string;
}

type OnSpawnCallback = (
  command: string,
  args: readonly string[],
  options: ProcessOptions | undefined
) => SpawnConfig | undefined;

export interface MockProcessRunnerOptions {
  /**
   * Default result for all spawned processes.
   * Can be overridden per-spawn via onSpawn.
   */
  readonly defaultResult?: {
    readonly exitCode?: number;
    readonly stdout?: string;
    readonly stderr?: string;
  };

  /**
   * Called when run() is invoked. Return overrides for this spawn.
   * When this returns undefined, defaultResult is used.
   */
  readonly onSpawn?: OnSpawnCallback;
}

// =============================================================================
// Implementation Classes (Private)
// =============================================================================

class SpawnedProcessMockStateImpl implements SpawnedProcessMockState {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly cwd: string | undefined,
    readonly inheritOutput: boolean
  ) {}

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const parts = [`command=${this.command}`, `args=[${this.args.join(", ")}]`];
    if (this.cwd !== undefined) parts.push(`cwd=${this.cwd}`);
    if (this.inheritOutput) parts.push("inheritOutput");
    return `SpawnedProcess(${parts.join(", ")})`;
  }
}

class MockSpawnedProcessImpl implements MockSpawnedProcess {
  constructor(
    readonly pid: number | undefined,
    private readonly result: ProcessResult,
    private readonly state: SpawnedProcessMockStateImpl
  ) {}

  get $(): SpawnedProcessMockState {
    return this.state;
  }

  async wait(): Promise<ProcessResult> {
    return this.result;
  }
}

class ProcessRunnerMockStateImpl implements ProcessRunnerMockState {
  private readonly processes: MockSpawnedProcess[] = [];

  get count(): number {
    return this.processes.length;
  }

  addProcess(process: MockSpawnedProcess): void {
    this.processes.push(process);
  }

  spawned(indexOrFilter: number | { command: string }): MockSpawnedProcess {
    if (typeof indexOrFilter === "number") {
      const process = this.processes[indexOrFilter];
      if (process === undefined) {
        throw new Error(
          `No spawned process at index ${indexOrFilter}. Only ${this.processes.length} processes were spawned.`
        );
      }
      return process;
    }

    const { command } = indexOrFilter;
    const found = this.processes.find((p) => p.$.command === command);
    if (found === undefined) {
      const spawnedCommands = this.processes.map((p) => p.$.command).join(", ");
      throw new Error(
        `No spawned process with command '${command}'. Spawned commands: ${spawnedCommands || "(none)"}`
      );
    }
    return found;
  }

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const procs = this.processes.map((p) => p.$.toString()).join(", ");
    return `ProcessRunner(spawned=[${procs}])`;
  }
}

class MockProcessRunnerImpl implements MockProcessRunner {
  private readonly state = new ProcessRunnerMockStateImpl();
  private readonly defaultResult: ProcessResult;
  private readonly onSpawn: OnSpawnCallback | undefined;

  constructor(options?: MockProcessRunnerOptions) {
    this.defaultResult = {
      exitCode: options?.defaultResult?.exitCode ?? 0,
      stdout: options?.defaultResult?.stdout ?? "",
      stderr: options?.defaultResult?.stderr ?? "",
    };
    this.onSpawn = options?.onSpawn;
  }

  get $(): ProcessRunnerMockStateImpl {
    return this.state;
  }

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const config = this.onSpawn?.(command, args, options);

    // 'in' distinguishes "not set" from "explicitly undefined" (spawn failure)
    const pid = config !== undefined && "pid" in config ? config.pid : 12345;

    const base: ProcessResult = {
      exitCode: config?.exitCode !== undefined ? config.exitCode : this.defaultResult.exitCode,
      stdout: config?.stdout ?? this.defaultResult.stdout,
      stderr: config?.stderr ?? this.defaultResult.stderr,
    };
    const result: ProcessResult =
      config?.signal !== undefined ? { ...base, signal: config.signal } : base;

    const process = new MockSpawnedProcessImpl(
      pid,
      result,
      new SpawnedProcessMockStateImpl(
        command,
        [...args],
        options?.cwd,
        options?.inheritOutput ?? false
      )
    );
    this.state.addProcess(process);
    return process;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a mock ProcessRunner with state tracking and custom matchers.
 *
 * @example
 * // Per-spawn customization
 * const runner = createMockProcessRunner({
 *   onSpawn: (command) => (command === "which" ? { exitCode: 1 } : undefined),
 * });
 * await locator.locate({ platform: "linux" });
 * expect(runner).toHaveSpawned([{ command: "which", args: ["python3"] }, ...]);
 */
export function createMockProcessRunner(options?: MockProcessRunnerOptions): MockProcessRunner {
  return new MockProcessRunnerImpl(options);
}

// =============================================================================
// Custom Matchers
// =============================================================================

function sameArgs(actual: readonly string[], expected: readonly string[]): boolean {
  return actual.length === expected.length && expected.every((arg, i) => actual[i] === arg);
}

function matchesSpawnRecord(actual: SpawnedProcessMockState, expected: SpawnRecord): boolean {
  if (expected.command !== undefined && actual.command !== expected.command) return false;
  if (expected.args !== undefined && !sameArgs(actual.args, expected.args)) return false;
  if (expected.cwd !== undefined && actual.cwd !== expected.cwd) return false;
  if (expected.inheritOutput !== undefined && actual.inheritOutput !== expected.inheritOutput) {
    return false;
  }
  return true;
}

interface ProcessRunnerMatchers {
  /**
   * Assert the exact sequence of spawns.
   * Supports partial matching - only specified fields are checked.
   */
  toHaveSpawned(expected: SpawnRecord[]): void;

  /**
   * Assert that no process was spawned.
   */
  toHaveNoSpawns(): void;
}

declare module "vitest" {
  interface Assertion<T> extends ProcessRunnerMatchers {}
}

function spawnedStates(received: MockProcessRunner): SpawnedProcessMockState[] {
  const states: SpawnedProcessMockState[] = [];
  for (let i = 0; i < received.$.count; i++) {
    states.push(received.$.spawned(i).$);
  }
  return states;
}

export const processRunnerMatchers: MatcherImplementationsFor<
  MockProcessRunner,
  ProcessRunnerMatchers
> = {
  toHaveSpawned(received, expected) {
    const spawned = spawnedStates(received);
    const mismatches: string[] = [];

    for (let i = 0; i < Math.max(expected.length, spawned.length); i++) {
      const exp = expected[i];
      const act = spawned[i];
      if (exp === undefined && act !== undefined) {
        mismatches.push(`Unexpected spawn at index ${i}: ${act.toString()}`);
      } else if (exp !== undefined && act === undefined) {
        mismatches.push(`Expected spawn at index ${i}: ${JSON.stringify(exp)}\nActual: (none)`);
      } else if (exp !== undefined && act !== undefined && !matchesSpawnRecord(act, exp)) {
        mismatches.push(`Expected spawn at index ${i}: ${JSON.stringify(exp)}\nActual: ${act.toString()}`);
      }
    }

    const pass = mismatches.length === 0;
    return {
      pass,
      message: () =>
        pass
          ? `Expected not to have spawned: ${JSON.stringify(expected)}\nActual: ${received.$.toString()}`
          : `Spawn mismatch:\n${mismatches.join("\n")}\nActual state: ${received.$.toString()}`,
    };
  },

  toHaveNoSpawns(received) {
    const pass = received.$.count === 0;
    return {
      pass,
      message: () =>
        pass
          ? "Expected at least one spawn, but none happened"
          : `Expected no spawns.\nActual: ${received.$.toString()}`,
    };
  },
};

// =============================================================================
// Auto-Registration
// =============================================================================

import { expect } from "vitest";

expect.extend(processRunnerMatchers);
