import { describe, it, expect } from "vitest";
import { CommandExecutor, formatCommandLine } from "./command-executor.js";
import { createMockProcessRunner } from "../platform/process.state-mock.js";
import { createRecordingTerminal } from "../platform/terminal.test-utils.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";
import { CommandError } from "../errors.js";
import type { MockProcessRunnerOptions } from "../platform/process.state-mock.js";

function setup(dryRun: boolean, runnerOptions?: MockProcessRunnerOptions) {
  const processRunner = createMockProcessRunner(runnerOptions);
  const terminal = createRecordingTerminal();
  const executor = new CommandExecutor({
    processRunner,
    terminal,
    logger: createSilentLogger(),
    dryRun,
  });
  return { processRunner, terminal, executor };
}

describe("formatCommandLine", () => {
  it("joins command and args with single spaces", () => {
    expect(formatCommandLine("/env/bin/python", ["-m", "pip", "install", "rich"])).toBe(
      "/env/bin/python -m pip install rich"
    );
  });

  it("renders a command without args", () => {
    expect(formatCommandLine("python3", [])).toBe("python3");
  });
});

describe("CommandExecutor", () => {
  it("announces and runs the command with inherited output", async () => {
    const { processRunner, terminal, executor } = setup(false);

    await executor.execute("/usr/bin/python3", ["-m", "venv", "/work/.venv"]);

    expect(terminal.lines).toEqual(["", "$ /usr/bin/python3 -m venv /work/.venv"]);
    expect(processRunner).toHaveSpawned([
      { command: "/usr/bin/python3", args: ["-m", "venv", "/work/.venv"], inheritOutput: true },
    ]);
    expect(processRunner.$.spawned(0).$.cwd).toBeUndefined();
  });

  it("only announces the command in dry-run mode", async () => {
    const { processRunner, terminal, executor } = setup(true);

    await executor.execute("bash", ["/tmp/installer.sh", "-b", "-p", "/rt"]);

    expect(terminal.lines).toEqual(["", "$ bash /tmp/installer.sh -b -p /rt"]);
    expect(processRunner).toHaveNoSpawns();
  });

  it("throws CommandError with exit code and command line on failure", async () => {
    const { executor } = setup(false, { defaultResult: { exitCode: 2, stderr: "boom" } });

    const error = await executor.execute("pip", ["install", "nope"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      exitCode: 2,
      commandLine: "pip install nope",
      message: "Command failed (2): pip install nope",
    });
  });

  it("reports a spawn failure as no exit code", async () => {
    const { executor } = setup(false, {
      onSpawn: () => ({ pid: undefined, exitCode: null, stderr: "spawn ENOENT" }),
    });

    await expect(executor.execute("missing", ["--flag"])).rejects.toThrow(
      "Command failed (no exit code): missing --flag"
    );
  });

  it("reports the signal when the process was killed", async () => {
    const { executor } = setup(false, {
      onSpawn: () => ({ exitCode: null, signal: "SIGKILL" }),
    });

    await expect(executor.execute("bash", ["x.sh"])).rejects.toThrow(
      "Command failed (SIGKILL): bash x.sh"
    );
  });
});
