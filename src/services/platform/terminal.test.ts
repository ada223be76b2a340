/**
 * Tests for ProcessTerminal.
 */

import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import { ProcessTerminal } from "./terminal.js";

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString("utf-8");
}

describe("ProcessTerminal", () => {
  it("writes lines to stdout with a trailing newline", () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const out = collect(stdout);
    const err = collect(stderr);
    const terminal = new ProcessTerminal(stdout, stderr);

    terminal.write("$ python3 -m venv /work/.venv");
    terminal.write("");

    expect(out()).toBe("$ python3 -m venv /work/.venv\n\n");
    expect(err()).toBe("");
  });

  it("writes errors to stderr", () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const out = collect(stdout);
    const err = collect(stderr);
    const terminal = new ProcessTerminal(stdout, stderr);

    terminal.error("error: Command failed (1): pip install");

    expect(err()).toBe("error: Command failed (1): pip install\n");
    expect(out()).toBe("");
  });
});
