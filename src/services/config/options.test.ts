/**
 * Tests for command-line option validation.
 */

import { describe, it, expect } from "vitest";
import { buildProvisionConfig, canonicalizeDirectories, resolveUserPath } from "./options.js";
import { createFileSystemMock } from "../platform/filesystem.state-mock.js";
import { DEFAULT_PACKAGE_CATALOG, MINIFORGE_BASE_URL } from "./types.js";
import { ConfigError } from "../errors.js";

const host = { homeDir: "/home/dev", cwd: "/work" };

describe("resolveUserPath", () => {
  it("resolves relative paths against the working directory", () => {
    expect(resolveUserPath(".venv", host)).toBe("/work/.venv");
  });

  it("keeps absolute paths", () => {
    expect(resolveUserPath("/opt/env", host)).toBe("/opt/env");
  });

  it("expands a bare tilde to the home directory", () => {
    expect(resolveUserPath("~", host)).toBe("/home/dev");
  });

  it("expands a leading tilde segment", () => {
    expect(resolveUserPath("~/envs/automation", host)).toBe("/home/dev/envs/automation");
  });

  it("leaves other tilde forms alone", () => {
    expect(resolveUserPath("~other/env", host)).toBe("/work/~other/env");
  });

  it("normalizes parent segments", () => {
    expect(resolveUserPath("../shared/.venv", host)).toBe("/shared/.venv");
  });
});

describe("buildProvisionConfig", () => {
  it("applies defaults for missing options", () => {
    const config = buildProvisionConfig({}, host);

    expect(config).toEqual({
      envDir: "/work/.venv",
      runtimeDir: "/work/python-runtime",
      dryRun: false,
      extras: [],
      catalog: DEFAULT_PACKAGE_CATALOG,
      miniforgeBaseUrl: MINIFORGE_BASE_URL,
    });
  });

  it("resolves directories and keeps the interpreter override verbatim", () => {
    const config = buildProvisionConfig(
      {
        envDir: "~/envs/bot",
        runtimeDir: "runtime",
        pythonBin: "~/bin/python3",
        dryRun: true,
        extra: ["httpx", "tqdm"],
      },
      host
    );

    expect(config.envDir).toBe("/home/dev/envs/bot");
    expect(config.runtimeDir).toBe("/work/runtime");
    expect(config.pythonBin).toBe("~/bin/python3");
    expect(config.dryRun).toBe(true);
    expect(config.extras).toEqual(["httpx", "tqdm"]);
  });

  it("omits pythonBin when not given", () => {
    const config = buildProvisionConfig({ dryRun: true }, host);

    expect("pythonBin" in config).toBe(false);
  });

  it("passes extras through as given", () => {
    const config = buildProvisionConfig({ extra: ["httpx", " tqdm ", ""] }, host);

    expect(config.extras).toEqual(["httpx", " tqdm ", ""]);
  });

  it("accepts catalog and base URL overrides", () => {
    const catalog = { base: ["requests"], windowsOnly: [], unixOnly: ["uvloop"] };

    const config = buildProvisionConfig({}, host, {
      catalog,
      miniforgeBaseUrl: "https://mirror.test/miniforge",
    });

    expect(config.catalog).toBe(catalog);
    expect(config.miniforgeBaseUrl).toBe("https://mirror.test/miniforge");
  });

  it("rejects an empty env dir", () => {
    expect(() => buildProvisionConfig({ envDir: "  " }, host)).toThrow(
      new ConfigError("Invalid options: envDir: must not be empty")
    );
  });

  it("rejects values of the wrong type", () => {
    let caught: unknown;
    try {
      buildProvisionConfig({ dryRun: "yes" }, host);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "INVALID_OPTIONS" });
  });
});

describe("canonicalizeDirectories", () => {
  it("resolves symlinked directories and keeps everything else", async () => {
    const fileSystem = createFileSystemMock();
    fileSystem.$.setSymlink("/home/dev/envs", "/data/envs");
    const config = buildProvisionConfig({ envDir: "~/envs/bot", pythonBin: "~/bin/python3" }, host);

    const canonical = await canonicalizeDirectories(config, fileSystem);

    expect(canonical).toEqual({
      ...config,
      envDir: "/data/envs/bot",
      runtimeDir: "/work/python-runtime",
    });
  });
});
