/**
 * Runs the external commands of the provisioning pipeline.
 *
 * Every command is announced on the terminal as `$ <command line>`. In
 * simulation mode that announcement is all that happens.
 */

import { CommandError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Terminal } from "../platform/terminal.js";

/**
 * Render a command the way it is shown to the user and quoted in errors.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

export interface CommandExecutorDeps {
  readonly processRunner: ProcessRunner;
  readonly terminal: Terminal;
  readonly logger: Logger;
  readonly dryRun: boolean;
}

export class CommandExecutor {
  private readonly processRunner: ProcessRunner;
  private readonly terminal: Terminal;
  private readonly logger: Logger;
  readonly dryRun: boolean;

  constructor(deps: CommandExecutorDeps) {
    this.processRunner = deps.processRunner;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
    this.dryRun = deps.dryRun;
  }

  /**
   * Announce and (unless simulating) run a command with inherited output.
   *
   * @throws CommandError on non-zero exit, spawn failure or signal
   */
  async execute(command: string, args: readonly string[]): Promise<void> {
    const commandLine = formatCommandLine(command, args);
    this.terminal.write("");
    this.terminal.write(`$ ${commandLine}`);

    if (this.dryRun) {
      this.logger.debug("Skipped command (dry run)", { command });
      return;
    }

    const result = await this.processRunner.run(command, args, { inheritOutput: true }).wait();
    if (result.exitCode === 0) {
      return;
    }

    this.logger.warn("Command failed", {
      command,
      exitCode: result.exitCode,
      signal: result.signal ?? null,
      stderr: result.stderr || null,
    });
    throw new CommandError(result.exitCode, commandLine, result.signal);
  }
}
