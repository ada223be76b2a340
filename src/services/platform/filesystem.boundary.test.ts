// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against the real filesystem inside a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  mkdtemp,
  rm as nodeRm,
  stat,
  readFile,
  writeFile as nodeWriteFile,
  mkdir as nodeMkdir,
  realpath,
  symlink,
} from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: string;

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await mkdtemp(join(tmpdir(), "fs-layer-test-"));
  });

  afterEach(async () => {
    await nodeRm(tempDir, { recursive: true, force: true });
  });

  describe("exists", () => {
    it("returns true for an existing directory", async () => {
      expect(await fs.exists(tempDir)).toBe(true);
    });

    it("returns true for an existing file", async () => {
      const filePath = join(tempDir, "python");
      await nodeWriteFile(filePath, "");

      expect(await fs.exists(filePath)).toBe(true);
    });

    it("returns false for a missing path", async () => {
      expect(await fs.exists(join(tempDir, "missing"))).toBe(false);
    });

    it("returns false when a parent is a file", async () => {
      const filePath = join(tempDir, "file");
      await nodeWriteFile(filePath, "");

      expect(await fs.exists(join(filePath, "child"))).toBe(false);
    });
  });

  describe("mkdir", () => {
    it("creates nested directories", async () => {
      const dirPath = join(tempDir, "a", "b", "c");

      await fs.mkdir(dirPath);

      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("is a no-op for an existing directory", async () => {
      await expect(fs.mkdir(tempDir)).resolves.toBeUndefined();
    });

    it("throws EEXIST when a file is in the way", async () => {
      const filePath = join(tempDir, "taken");
      await nodeWriteFile(filePath, "");

      const error = await fs.mkdir(filePath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect(error).toMatchObject({ fsCode: "EEXIST", path: filePath });
    });
  });

  describe("mkdtemp", () => {
    it("creates a unique directory with the prefix", async () => {
      const first = await fs.mkdtemp(tempDir, "python-bootstrap-");
      const second = await fs.mkdtemp(tempDir, "python-bootstrap-");

      expect(first).not.toBe(second);
      expect(first.startsWith(join(tempDir, "python-bootstrap-"))).toBe(true);
      expect((await stat(first)).isDirectory()).toBe(true);
    });

    it("throws ENOENT when the parent is missing", async () => {
      const parent = join(tempDir, "missing");

      await expect(fs.mkdtemp(parent, "x-")).rejects.toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("rm", () => {
    it("removes a directory tree recursively", async () => {
      const dirPath = join(tempDir, "tree");
      await nodeMkdir(join(dirPath, "nested"), { recursive: true });
      await nodeWriteFile(join(dirPath, "nested", "file"), "x");

      await fs.rm(dirPath, { recursive: true, force: true });

      expect(await fs.exists(dirPath)).toBe(false);
    });

    it("throws ENOTEMPTY for a non-empty directory without recursive", async () => {
      const dirPath = join(tempDir, "full");
      await nodeMkdir(dirPath);
      await nodeWriteFile(join(dirPath, "file"), "x");

      await expect(fs.rm(dirPath)).rejects.toMatchObject({ fsCode: "ENOTEMPTY" });
    });

    it("ignores a missing path with force", async () => {
      await expect(fs.rm(join(tempDir, "missing"), { force: true })).resolves.toBeUndefined();
    });

    it("throws ENOENT for a missing path without force", async () => {
      await expect(fs.rm(join(tempDir, "missing"))).rejects.toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("writeFileBuffer", () => {
    it("writes binary content", async () => {
      const filePath = join(tempDir, "installer.sh");
      const content = Buffer.from([0x23, 0x21, 0x00, 0xff]);

      await fs.writeFileBuffer(filePath, content);

      expect((await readFile(filePath)).equals(content)).toBe(true);
    });

    it("throws ENOENT when the parent directory is missing", async () => {
      const filePath = join(tempDir, "missing", "installer.sh");

      await expect(fs.writeFileBuffer(filePath, Buffer.from("x"))).rejects.toMatchObject({
        fsCode: "ENOENT",
        path: filePath,
      });
    });
  });

  describe.skipIf(process.platform === "win32")("canonicalize", () => {
    it("resolves a symlinked directory", async () => {
      const target = join(tempDir, "data");
      await nodeMkdir(target);
      await symlink(target, join(tempDir, "link"));

      expect(await fs.canonicalize(join(tempDir, "link"))).toBe(await realpath(target));
    });

    it("appends missing segments to the resolved prefix", async () => {
      const target = join(tempDir, "data");
      await nodeMkdir(target);
      await symlink(target, join(tempDir, "link"));

      const canonical = await fs.canonicalize(join(tempDir, "link", "envs", ".venv"));

      expect(canonical).toBe(join(await realpath(target), "envs", ".venv"));
    });

    it("normalizes a path that does not exist at all", async () => {
      const missing = join(tempDir, "missing", "..", "other");

      expect(await fs.canonicalize(missing)).toBe(join(await realpath(tempDir), "other"));
    });
  });

  describe.skipIf(process.platform === "win32")("makeExecutable", () => {
    it("sets the executable bits", async () => {
      const filePath = join(tempDir, "installer.sh");
      await nodeWriteFile(filePath, "#!/bin/sh\n");

      await fs.makeExecutable(filePath);

      expect((await stat(filePath)).mode & 0o777).toBe(0o755);
    });

    it("is a no-op when the platform is win32", async () => {
      const winFs = new DefaultFileSystemLayer(createSilentLogger(), "win32");
      const filePath = join(tempDir, "installer.exe");
      await nodeWriteFile(filePath, "");
      const before = (await stat(filePath)).mode;

      await winFs.makeExecutable(filePath);

      expect((await stat(filePath)).mode).toBe(before);
    });
  });
});
