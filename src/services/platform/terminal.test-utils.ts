/**
 * Test utilities for Terminal.
 */
import type { Terminal } from "./terminal.js";

/**
 * Terminal that records lines instead of printing them.
 */
export interface RecordingTerminal extends Terminal {
  /** Lines written to standard output, in order. */
  readonly lines: readonly string[];
  /** Lines written to standard error, in order. */
  readonly errors: readonly string[];
  /** Standard output joined with newlines, as a user would see it. */
  output(): string;
}

export function createRecordingTerminal(): RecordingTerminal {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    write: (line) => {
      lines.push(line);
    },
    error: (line) => {
      errors.push(line);
    },
    output: () => lines.join("\n"),
  };
}
