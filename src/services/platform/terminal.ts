/**
 * Terminal - the user-facing output channel.
 *
 * The provisioning plan (commands, stage banners, activation hint) is written
 * here. Diagnostics go through the Logger instead.
 */

/**
 * Line-oriented output to the user.
 */
export interface Terminal {
  /** Write a line to standard output. */
  write(line: string): void;
  /** Write a line to standard error. */
  error(line: string): void;
}

/**
 * Terminal over process.stdout / process.stderr.
 */
export class ProcessTerminal implements Terminal {
  constructor(
    private readonly stdout: NodeJS.WritableStream = process.stdout,
    private readonly stderr: NodeJS.WritableStream = process.stderr
  ) {}

  write(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  error(line: string): void {
    this.stderr.write(`${line}\n`);
  }
}
