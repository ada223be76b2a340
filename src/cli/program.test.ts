import { describe, it, expect } from "vitest";
import { runCli, VERSION } from "./program.js";
import { createProvisionHarness } from "../services/provision/provision.test-utils.js";
import { DEFAULT_PACKAGE_CATALOG } from "../services/config/index.js";

const PIP_INSTALL = "$ /work/.venv/bin/python -m pip install --upgrade";

describe("runCli", () => {
  it("prints the full plan for a dry run on a linux host without python", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--dry-run"], h);

    expect(exitCode).toBe(0);
    expect(h.terminal.lines).toContain(
      "$ bash /tmp/python-bootstrap-XXXXXX/Miniforge3-Linux-x86_64.sh -b -p /work/python-runtime"
    );
    expect(h.terminal.lines).toContain("$ /work/python-runtime/bin/python -m venv /work/.venv");
    expect(h.terminal.lines).toContain(`${PIP_INSTALL} pip setuptools wheel`);
    expect(h.terminal.lines).toContain(`${PIP_INSTALL} ${DEFAULT_PACKAGE_CATALOG.base.join(" ")}`);
    expect(h.terminal.output()).not.toContain("pywin32");
    expect(h.terminal.errors).toEqual([]);
    expect(h.httpClient).toHaveNoRequests();
  });

  it("fails for a missing explicit interpreter", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--python-bin", "/nonexistent"], h);

    expect(exitCode).toBe(1);
    expect(h.terminal.errors).toEqual([
      "error: Specified python interpreter not found: /nonexistent",
    ]);
    expect(h.loggingService.getLogger("cli")?.error).toHaveBeenCalledWith(
      "Provisioning failed",
      { error: "Specified python interpreter not found: /nonexistent" },
      expect.any(Error)
    );
  });

  it("appends extras once, after the base packages", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(
      ["--dry-run", "--python-bin", "/usr/bin/python3", "--extra", "foo", "--extra", "requests"],
      h
    );

    expect(exitCode).toBe(0);
    expect(h.terminal.lines).toContain(
      `${PIP_INSTALL} ${[...DEFAULT_PACKAGE_CATALOG.base, "foo"].join(" ")}`
    );
  });

  it("resolves directory options against the working directory", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(
      ["--dry-run", "--python-bin", "/usr/bin/python3", "--env-dir", "~/envs/bot"],
      h
    );

    expect(exitCode).toBe(0);
    expect(h.terminal.lines).toContain("$ /usr/bin/python3 -m venv /home/test/envs/bot");
    expect(h.terminal.lines.at(-1)).toBe("  source /home/test/envs/bot/bin/activate");
  });

  it("names the symlink target of the env dir in every command", async () => {
    const h = createProvisionHarness();
    h.fileSystem.$.setSymlink("/work/envs", "/data/envs");

    const exitCode = await runCli(
      ["--dry-run", "--python-bin", "/usr/bin/python3", "--env-dir", "envs/bot"],
      h
    );

    expect(exitCode).toBe(0);
    expect(h.terminal.lines).toContain("$ /usr/bin/python3 -m venv /data/envs/bot");
    expect(h.terminal.lines).toContain(
      "$ /data/envs/bot/bin/python -m pip install --upgrade pip setuptools wheel"
    );
    expect(h.terminal.lines.at(-1)).toBe("  source /data/envs/bot/bin/activate");
  });

  it("rejects an empty env dir", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--env-dir", " "], h);

    expect(exitCode).toBe(1);
    expect(h.terminal.errors).toEqual(["error: Invalid options: envDir: must not be empty"]);
    expect(h.processRunner).toHaveNoSpawns();
  });

  it("prints usage for --help and exits successfully", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--help"], h);

    expect(exitCode).toBe(0);
    expect(h.terminal.lines[0]?.split("\n")[0]).toBe("Usage: pybootstrap [options]");
    expect(h.processRunner).toHaveNoSpawns();
  });

  it("prints the version", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--version"], h);

    expect(exitCode).toBe(0);
    expect(h.terminal.lines).toEqual([VERSION]);
  });

  it("reports unknown options with commander's message", async () => {
    const h = createProvisionHarness();

    const exitCode = await runCli(["--bogus"], h);

    expect(exitCode).toBe(1);
    expect(h.terminal.errors).toEqual(["error: unknown option '--bogus'"]);
    expect(h.processRunner).toHaveNoSpawns();
  });
});
