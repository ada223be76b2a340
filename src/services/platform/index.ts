/**
 * Platform layer exports.
 *
 * Platform layers abstract OS/runtime-specific operations (processes, filesystem,
 * network, terminal, host information).
 */

export { ExecaProcessRunner } from "./process.js";
export type { ProcessRunner, ProcessOptions, ProcessResult, SpawnedProcess } from "./process.js";

export { DefaultFileSystemLayer } from "./filesystem.js";
export type { FileSystemLayer, FileSystemErrorCode, MkdirOptions, RmOptions } from "./filesystem.js";

export { DefaultNetworkLayer } from "./network.js";
export type { HttpClient, HttpRequestOptions, NetworkLayerConfig } from "./network.js";

export { ProcessTerminal } from "./terminal.js";
export type { Terminal } from "./terminal.js";

export { createHostPlatformInfo } from "./platform-info.js";
export type { PlatformInfo } from "./platform-info.js";
