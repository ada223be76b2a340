/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory storage
 * - Error handling (ENOENT, EEXIST, ENOTEMPTY)
 * - Custom matchers for behavioral assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/work/.venv": directory(),
 *     "/work/.venv/bin/python": file("", { executable: true }),
 *   },
 * });
 *
 * expect(await mock.exists("/work/.venv")).toBe(true);
 * expect(mock).toHaveDirectory("/work/.venv");
 */

import * as path from "node:path";
import type { FileSystemErrorCode, FileSystemLayer } from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Entry Types
// =============================================================================

export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

// =============================================================================
// State Interface
// =============================================================================

export interface FileSystemMockState extends MockState {
  /**
   * Read-only access to all filesystem entries.
   * Keys are normalized path strings.
   */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * If set to true, mkdtemp will throw an error.
   */
  mkdtempShouldFail: boolean;

  /**
   * Set an entry in the filesystem.
   * Normalizes the path and auto-creates parent directories.
   * This is a test helper - it does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;

  /**
   * Register a symbolic link. Only canonicalize() follows links.
   */
  setSymlink(linkPath: string, targetPath: string): void;
}

export type MockFileSystemLayer = FileSystemLayer & MockWithState<FileSystemMockState>;

// =============================================================================
// Entry Helper Functions
// =============================================================================

/**
 * Create a file entry.
 *
 * @example
 * file("#!/bin/sh")
 * file(Buffer.from([0x7f, 0x45]), { executable: true })
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: { executable?: boolean; error?: FileSystemErrorCode }
): FileEntry {
  const entry: FileEntry = { type: "file", content };
  if (options?.executable !== undefined) {
    return options.error !== undefined
      ? { ...entry, executable: options.executable, error: options.error }
      : { ...entry, executable: options.executable };
  }
  return options?.error !== undefined ? { ...entry, error: options.error } : entry;
}

/**
 * Create a directory entry.
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return options?.error !== undefined
    ? { type: "directory", error: options.error }
    : { type: "directory" };
}

// =============================================================================
// State Implementation
// =============================================================================

function normalizePath(raw: string): string {
  const normalized = path.posix.normalize(raw.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

function getParentPath(normalizedPath: string): string | null {
  if (normalizedPath === "/" || !normalizedPath.includes("/")) {
    return null;
  }
  return path.posix.dirname(normalizedPath);
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries: Map<string, Entry>;
  private readonly symlinks = new Map<string, string>();
  private mkdtempCounter = 0;
  mkdtempShouldFail = false;

  constructor(initialEntries: Map<string, Entry>) {
    this._entries = new Map();
    for (const [key, entry] of initialEntries) {
      this.setEntry(key, entry);
    }
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  nextTempSuffix(): string {
    this.mkdtempCounter++;
    return this.mkdtempCounter.toString(16).padStart(6, "0");
  }

  setEntry(rawPath: string, entry: Entry): void {
    const normalizedPath = normalizePath(rawPath);

    // Auto-create parent directories (test helper convenience)
    let parent = getParentPath(normalizedPath);
    while (parent !== null) {
      if (!this._entries.has(parent)) {
        this._entries.set(parent, directory());
      }
      parent = getParentPath(parent);
    }

    this._entries.set(normalizedPath, entry);
  }

  setSymlink(linkPath: string, targetPath: string): void {
    this.symlinks.set(normalizePath(linkPath), normalizePath(targetPath));
  }

  /**
   * Replace the longest linked prefix until no link applies.
   */
  resolveLinks(normalizedPath: string): string {
    let resolved = normalizedPath;
    for (let hops = 0; hops < 40; hops++) {
      let next: string | undefined;
      for (const [link, target] of this.symlinks) {
        if (resolved === link || resolved.startsWith(link + "/")) {
          next = target + resolved.slice(link.length);
          break;
        }
      }
      if (next === undefined) return resolved;
      resolved = next;
    }
    throw new FileSystemError("UNKNOWN", normalizedPath, "Too many levels of symbolic links");
  }

  delete(normalizedPath: string): void {
    this._entries.delete(normalizedPath);
  }

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    const lines = sorted.map(([entryPath, entry]) => {
      const flags: string[] = [];
      if (entry.error) flags.push(`error:${entry.error}`);
      if (entry.type === "directory") {
        return `${entryPath}: directory${flags.length > 0 ? ` [${flags.join(",")}]` : ""}`;
      }
      if (entry.executable) flags.unshift("exec");
      const content =
        typeof entry.content === "string"
          ? JSON.stringify(entry.content.length > 50 ? entry.content.slice(0, 50) + "..." : entry.content)
          : `<Buffer ${entry.content.length} bytes>`;
      return `${entryPath}: file(${content})${flags.length > 0 ? ` [${flags.join(",")}]` : ""}`;
    });
    for (const [link, target] of this.symlinks) {
      lines.push(`${link}: symlink -> ${target}`);
    }
    return lines.join("\n");
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface MockFileSystemOptions {
  /**
   * Initial entries in the filesystem. Parent directories are created implicitly.
   */
  readonly entries?: Record<string, Entry>;
}

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Error simulation
 * const mock = createFileSystemMock({
 *   entries: { "/protected": directory({ error: "EACCES" }) },
 * });
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const state = new FileSystemMockStateImpl(new Map(Object.entries(options?.entries ?? {})));

  const throwIfError = (entry: Entry | undefined, entryPath: string): void => {
    if (entry?.error) {
      throw new FileSystemError(entry.error, entryPath, `Mock error: ${entry.error}`);
    }
  };

  const requireParentDirectory = (entryPath: string): void => {
    const parent = getParentPath(entryPath);
    if (parent === null) return;
    const parentEntry = state.entries.get(parent);
    if (parentEntry?.type !== "directory") {
      throw new FileSystemError("ENOENT", entryPath, `Parent directory not found: ${parent}`);
    }
  };

  const layer: FileSystemLayer = {
    async exists(rawPath: string): Promise<boolean> {
      const entryPath = normalizePath(rawPath);
      const entry = state.entries.get(entryPath);
      throwIfError(entry, entryPath);
      return entry !== undefined;
    },

    async mkdir(rawPath: string, mkdirOptions?): Promise<void> {
      const entryPath = normalizePath(rawPath);
      const existing = state.entries.get(entryPath);
      throwIfError(existing, entryPath);

      if (existing?.type === "directory") {
        return;
      }
      if (existing?.type === "file") {
        throw new FileSystemError("EEXIST", entryPath, `File exists at path: ${entryPath}`);
      }

      if (mkdirOptions?.recursive ?? true) {
        let current = getParentPath(entryPath);
        while (current !== null) {
          const entry = state.entries.get(current);
          if (entry?.type === "file") {
            throw new FileSystemError("EEXIST", current, `Not a directory: ${current}`);
          }
          current = getParentPath(current);
        }
      } else {
        requireParentDirectory(entryPath);
      }
      state.setEntry(entryPath, directory());
    },

    async mkdtemp(parent: string, prefix: string): Promise<string> {
      if (state.mkdtempShouldFail) {
        throw new FileSystemError("EACCES", parent, "Mock mkdtemp failure: permission denied");
      }
      const tempPath = normalizePath(`${parent}/${prefix}${state.nextTempSuffix()}`);
      state.setEntry(tempPath, directory());
      return tempPath;
    },

    async rm(rawPath: string, rmOptions?): Promise<void> {
      const entryPath = normalizePath(rawPath);
      const entry = state.entries.get(entryPath);

      if (!entry) {
        if (rmOptions?.force) return;
        throw new FileSystemError("ENOENT", entryPath, `Path not found: ${entryPath}`);
      }
      throwIfError(entry, entryPath);

      if (entry.type === "directory") {
        const prefix = entryPath === "/" ? "/" : entryPath + "/";
        const children = [...state.entries.keys()].filter((k) => k.startsWith(prefix));
        if (children.length > 0 && !rmOptions?.recursive) {
          throw new FileSystemError("ENOTEMPTY", entryPath, `Directory not empty: ${entryPath}`);
        }
        for (const child of children) {
          state.delete(child);
        }
      }
      state.delete(entryPath);
    },

    async writeFileBuffer(rawPath: string, content: Buffer): Promise<void> {
      const entryPath = normalizePath(rawPath);
      const existing = state.entries.get(entryPath);
      if (existing?.type === "directory") {
        throw new FileSystemError("EISDIR", entryPath, `Is a directory: ${entryPath}`);
      }
      requireParentDirectory(entryPath);
      state.setEntry(entryPath, file(content));
    },

    async canonicalize(rawPath: string): Promise<string> {
      return state.resolveLinks(normalizePath(rawPath));
    },

    async makeExecutable(rawPath: string): Promise<void> {
      const entryPath = normalizePath(rawPath);
      const entry = state.entries.get(entryPath);
      if (!entry) {
        throw new FileSystemError("ENOENT", entryPath, `File not found: ${entryPath}`);
      }
      throwIfError(entry, entryPath);
      if (entry.type === "file") {
        state.setEntry(entryPath, { ...entry, executable: true });
      }
    },
  };

  return Object.assign(layer, { $: state });
}

// =============================================================================
// Custom Matchers
// =============================================================================

interface FileSystemMatchers {
  /**
   * Assert that a file exists with optional content check.
   */
  toHaveFile(path: string, content?: string | Buffer): void;

  /**
   * Assert that a directory exists.
   */
  toHaveDirectory(path: string): void;

  /**
   * Assert that a file is executable.
   */
  toBeExecutable(path: string): void;
}

declare module "vitest" {
  interface Assertion<T> extends FileSystemMatchers {}
}

function sameContent(actual: string | Buffer, expected: string | Buffer): boolean {
  const actualBuffer = typeof actual === "string" ? Buffer.from(actual, "utf-8") : actual;
  const expectedBuffer = typeof expected === "string" ? Buffer.from(expected, "utf-8") : expected;
  return actualBuffer.equals(expectedBuffer);
}

export const fileSystemMatchers: MatcherImplementationsFor<
  MockFileSystemLayer,
  FileSystemMatchers
> = {
  toHaveFile(received, rawPath, content?) {
    const entryPath = normalizePath(rawPath);
    const entry = received.$.entries.get(entryPath);

    if (entry?.type !== "file") {
      return {
        pass: false,
        message: () =>
          `Expected file at ${entryPath} but found ${entry?.type ?? "nothing"}\n${received.$.toString()}`,
      };
    }
    if (content !== undefined && !sameContent(entry.content, content)) {
      return {
        pass: false,
        message: () => `Expected file ${entryPath} to have different content\n${received.$.toString()}`,
      };
    }
    return {
      pass: true,
      message: () => `Expected ${entryPath} not to be a file`,
    };
  },

  toHaveDirectory(received, rawPath) {
    const entryPath = normalizePath(rawPath);
    const entry = received.$.entries.get(entryPath);
    const pass = entry?.type === "directory";
    return {
      pass,
      message: () =>
        pass
          ? `Expected ${entryPath} not to be a directory`
          : `Expected directory at ${entryPath} but found ${entry?.type ?? "nothing"}\n${received.$.toString()}`,
    };
  },

  toBeExecutable(received, rawPath) {
    const entryPath = normalizePath(rawPath);
    const entry = received.$.entries.get(entryPath);
    const pass = entry?.type === "file" && entry.executable === true;
    return {
      pass,
      message: () =>
        pass
          ? `Expected file ${entryPath} not to be executable`
          : `Expected file ${entryPath} to be executable\n${received.$.toString()}`,
    };
  },
};

// =============================================================================
// Auto-Registration
// =============================================================================

import { expect } from "vitest";

expect.extend(fileSystemMatchers);
