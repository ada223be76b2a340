/**
 * Downloads and silently installs the portable Miniforge runtime.
 */

import * as path from "node:path";
import { RuntimeInstallError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { Terminal } from "../platform/terminal.js";
import type { CommandExecutor } from "./command-executor.js";
import { buildInstallerCommand, buildMiniforgeFilename, buildMiniforgeUrl } from "./miniforge.js";
import type { PlatformTag } from "./types.js";

/** Prefix of the scratch directory holding the downloaded installer */
export const TEMP_DIR_PREFIX = "python-bootstrap-";

/** Installers are large; allow five minutes for the response to start */
const DOWNLOAD_TIMEOUT_MS = 300000;

export interface RuntimeInstallerDeps {
  readonly fileSystem: FileSystemLayer;
  readonly httpClient: HttpClient;
  readonly executor: CommandExecutor;
  readonly terminal: Terminal;
  readonly logger: Logger;
  readonly platformInfo: Pick<PlatformInfo, "machine" | "tmpDir">;
  readonly baseUrl: string;
}

export class RuntimeInstaller {
  private readonly fileSystem: FileSystemLayer;
  private readonly httpClient: HttpClient;
  private readonly executor: CommandExecutor;
  private readonly terminal: Terminal;
  private readonly logger: Logger;
  private readonly platformInfo: Pick<PlatformInfo, "machine" | "tmpDir">;
  private readonly baseUrl: string;

  constructor(deps: RuntimeInstallerDeps) {
    this.fileSystem = deps.fileSystem;
    this.httpClient = deps.httpClient;
    this.executor = deps.executor;
    this.terminal = deps.terminal;
    this.logger = deps.logger;
    this.platformInfo = deps.platformInfo;
    this.baseUrl = deps.baseUrl;
  }

  /**
   * Install Miniforge into runtimeDir.
   *
   * @throws RuntimeInstallError UNSUPPORTED_ARCHITECTURE before any download
   * @throws RuntimeInstallError DOWNLOAD_FAILED when the installer cannot be fetched
   * @throws CommandError when the installer exits unsuccessfully
   */
  async install(runtimeDir: string, platform: PlatformTag): Promise<void> {
    const filename = buildMiniforgeFilename(platform, this.platformInfo.machine);
    const url = buildMiniforgeUrl(filename, this.baseUrl);

    if (this.executor.dryRun) {
      const installerPath = path.join(this.platformInfo.tmpDir, `${TEMP_DIR_PREFIX}XXXXXX`, filename);
      this.terminal.write(`Downloading ${url} -> ${installerPath}`);
      await this.runInstaller(platform, installerPath, runtimeDir);
      return;
    }

    const tempDir = await this.fileSystem.mkdtemp(this.platformInfo.tmpDir, TEMP_DIR_PREFIX);
    try {
      const installerPath = path.join(tempDir, filename);
      this.terminal.write(`Downloading ${url} -> ${installerPath}`);
      await this.download(url, installerPath);
      if (platform !== "windows") {
        await this.fileSystem.makeExecutable(installerPath);
      }
      await this.runInstaller(platform, installerPath, runtimeDir);
      this.logger.info("Runtime installed", { runtimeDir });
    } finally {
      await this.removeTempDir(tempDir);
    }
  }

  private async runInstaller(
    platform: PlatformTag,
    installerPath: string,
    runtimeDir: string
  ): Promise<void> {
    const { command, args } = buildInstallerCommand(platform, installerPath, runtimeDir);
    await this.executor.execute(command, args);
  }

  /**
   * Fetch url into destPath, logging progress in 10% steps when the size is known.
   */
  private async download(url: string, destPath: string): Promise<void> {
    let response: Response;
    try {
      response = await this.httpClient.fetch(url, { timeout: DOWNLOAD_TIMEOUT_MS });
    } catch (error) {
      throw new RuntimeInstallError(
        `Network error downloading ${url}: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED"
      );
    }

    if (!response.ok) {
      throw new RuntimeInstallError(`HTTP ${response.status} downloading ${url}`, "DOWNLOAD_FAILED");
    }
    if (!response.body) {
      throw new RuntimeInstallError(`Empty response downloading ${url}`, "DOWNLOAD_FAILED");
    }

    const lengthHeader = response.headers.get("content-length");
    const totalBytes = lengthHeader ? parseInt(lengthHeader, 10) : NaN;
    const chunks: Uint8Array[] = [];
    let bytesDownloaded = 0;
    let lastReportedStep = 0;
    const reader = response.body.getReader();

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        chunks.push(value);
        bytesDownloaded += value.byteLength;

        if (totalBytes > 0) {
          const step = Math.floor((bytesDownloaded / totalBytes) * 10);
          if (step > lastReportedStep) {
            lastReportedStep = step;
            this.logger.debug("Download progress", {
              url,
              percent: Math.min(step * 10, 100),
              bytes: bytesDownloaded,
            });
          }
        }
      }
    } catch (error) {
      throw new RuntimeInstallError(
        `Failed to read download from ${url}: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED"
      );
    }

    this.logger.debug("Download complete", { url, bytes: bytesDownloaded });
    await this.fileSystem.writeFileBuffer(destPath, Buffer.concat(chunks));
  }

  private async removeTempDir(tempDir: string): Promise<void> {
    try {
      await this.fileSystem.rm(tempDir, { recursive: true, force: true });
    } catch (error) {
      // A leftover scratch directory must not mask the install outcome
      this.logger.warn("Failed to remove temp dir", {
        path: tempDir,
        error: getErrorMessage(error),
      });
    }
  }
}
