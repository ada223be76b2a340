/**
 * Tests for PlatformInfo providers.
 */

import * as os from "node:os";
import { describe, it, expect } from "vitest";
import { createMockPlatformInfo } from "./platform-info.test-utils.js";
import { createHostPlatformInfo } from "./platform-info.js";

describe("createHostPlatformInfo", () => {
  it("reads values from the running host", () => {
    const info = createHostPlatformInfo();

    expect(info.osName).toBe(os.type());
    expect(info.machine).toBe(os.machine());
    expect(info.homeDir).toBe(os.homedir());
    expect(info.tmpDir).toBe(os.tmpdir());
    expect(info.cwd).toBe(process.cwd());
  });
});

describe("createMockPlatformInfo", () => {
  it("returns sensible defaults", () => {
    const info = createMockPlatformInfo();

    expect(info).toEqual({
      osName: "Linux",
      machine: "x86_64",
      homeDir: "/home/test",
      tmpDir: "/tmp",
      cwd: "/work",
    });
  });

  it("accepts overrides while keeping other defaults", () => {
    const info = createMockPlatformInfo({ osName: "Windows_NT", machine: "AMD64" });

    expect(info.osName).toBe("Windows_NT");
    expect(info.machine).toBe("AMD64");
    expect(info.homeDir).toBe("/home/test");
  });
});
