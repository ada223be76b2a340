/**
 * Unit tests for the execa-backed process runner.
 * execa is mocked; no real process is spawned.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { execa } from "execa";
import { ExecaProcessRunner, toProcessResult } from "./process.js";
import { createBehavioralLogger } from "../logging/logging.test-utils.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

/**
 * Minimal stand-in for an execa subprocess: a promise with a pid.
 */
function fakeSubprocess(pid: number | undefined, outcome: Promise<unknown>) {
  return Object.assign(outcome, { pid });
}

describe("toProcessResult", () => {
  it("copies stdout, stderr and exit code", () => {
    expect(toProcessResult({ stdout: "out", stderr: "err", exitCode: 3 })).toEqual({
      stdout: "out",
      stderr: "err",
      exitCode: 3,
    });
  });

  it("uses empty strings when output was not captured", () => {
    expect(toProcessResult({ stdout: undefined, stderr: undefined, exitCode: 0 })).toEqual({
      stdout: "",
      stderr: "",
      exitCode: 0,
    });
  });

  it("maps a missing exit code to null and keeps the signal", () => {
    expect(toProcessResult({ stdout: "", stderr: "", signal: "SIGTERM" })).toEqual({
      stdout: "",
      stderr: "",
      exitCode: null,
      signal: "SIGTERM",
    });
  });

  it("moves originalMessage into stderr for spawn failures", () => {
    const outcome = {
      stdout: "",
      stderr: "",
      failed: true,
      originalMessage: "spawn nope ENOENT",
    };
    expect(toProcessResult(outcome).stderr).toBe("spawn nope ENOENT");
  });
});

describe("ExecaProcessRunner", () => {
  const execaMock = vi.mocked(execa);

  beforeEach(() => {
    execaMock.mockReset();
  });

  it("spawns with captured output by default", async () => {
    execaMock.mockReturnValue(
      fakeSubprocess(4242, Promise.resolve({ stdout: "/usr/bin/python3\n", stderr: "", exitCode: 0 })) as never
    );
    const logger = createBehavioralLogger();
    const runner = new ExecaProcessRunner(logger);

    const proc = runner.run("which", ["python3"]);
    const result = await proc.wait();

    expect(proc.pid).toBe(4242);
    expect(result).toEqual({ stdout: "/usr/bin/python3\n", stderr: "", exitCode: 0 });
    expect(execaMock).toHaveBeenCalledWith(
      "which",
      ["python3"],
      expect.objectContaining({ reject: false, stdout: "pipe", stderr: "pipe", stdin: "ignore" })
    );
    expect(logger.getMessagesByLevel("debug")).toEqual([
      { level: "debug", message: "Spawned", context: { command: "which", args: "python3", pid: 4242 } },
      { level: "debug", message: "Exited", context: { command: "which", pid: 4242, exitCode: 0 } },
    ]);
  });

  it("inherits output and passes cwd when requested", async () => {
    execaMock.mockReturnValue(
      fakeSubprocess(1, Promise.resolve({ stdout: undefined, stderr: undefined, exitCode: 0 })) as never
    );
    const runner = new ExecaProcessRunner(createBehavioralLogger());

    await runner.run("pip", ["install"], { inheritOutput: true, cwd: "/work" }).wait();

    expect(execaMock).toHaveBeenCalledWith(
      "pip",
      ["install"],
      expect.objectContaining({ stdout: "inherit", stderr: "inherit", cwd: "/work" })
    );
  });

  it("replaces the environment when env is given", async () => {
    execaMock.mockReturnValue(fakeSubprocess(1, Promise.resolve({ exitCode: 0 })) as never);
    const runner = new ExecaProcessRunner(createBehavioralLogger());

    await runner.run("env", [], { env: { PATH: "/bin" } }).wait();

    expect(execaMock).toHaveBeenCalledWith(
      "env",
      [],
      expect.objectContaining({ env: { PATH: "/bin" }, extendEnv: false })
    );
  });

  it("turns a rejected subprocess into a null exit code", async () => {
    execaMock.mockReturnValue(
      fakeSubprocess(undefined, Promise.reject(new Error("spawn missing ENOENT"))) as never
    );
    const logger = createBehavioralLogger();
    const runner = new ExecaProcessRunner(logger);

    const result = await runner.run("missing", []).wait();

    expect(result).toEqual({ stdout: "", stderr: "spawn missing ENOENT", exitCode: null });
    expect(logger.getMessagesByLevel("error")).toEqual([
      {
        level: "error",
        message: "Spawn failed",
        context: { command: "missing", error: "spawn missing ENOENT" },
      },
    ]);
  });

  it("caches the result across wait() calls", async () => {
    execaMock.mockReturnValue(fakeSubprocess(7, Promise.resolve({ exitCode: 1 })) as never);
    const logger = createBehavioralLogger();
    const proc = new ExecaProcessRunner(logger).run("false", []);

    const first = await proc.wait();
    const second = await proc.wait();

    expect(second).toBe(first);
    expect(logger.getMessages().filter((m) => m.message === "Exited")).toHaveLength(1);
  });

  it("logs a warning when the process was killed by a signal", async () => {
    execaMock.mockReturnValue(
      fakeSubprocess(9, Promise.resolve({ stdout: "", stderr: "", signal: "SIGKILL" })) as never
    );
    const logger = createBehavioralLogger();

    const result = await new ExecaProcessRunner(logger).run("sleep", ["100"]).wait();

    expect(result.exitCode).toBeNull();
    expect(logger.getMessagesByLevel("warn")).toEqual([
      { level: "warn", message: "Killed", context: { command: "sleep", pid: 9, signal: "SIGKILL" } },
    ]);
  });
});
