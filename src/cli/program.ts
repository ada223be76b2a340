/**
 * Command-line entry: option parsing and the exit status of a run.
 */

import { Command, CommanderError } from "commander";
import {
  buildProvisionConfig,
  canonicalizeDirectories,
  DEFAULT_ENV_DIR,
  DEFAULT_RUNTIME_DIR,
} from "../services/config/index.js";
import { getErrorMessage } from "../services/errors.js";
import type { Terminal } from "../services/platform/terminal.js";
import { createProvisioner, type ProvisionPlatform } from "../services/provision/index.js";

export const VERSION = "0.1.0";

const EXIT_SUCCESS = 0;
const EXIT_FAILURE = 1;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Commander hands over complete blocks; the terminal adds its own newline. */
function stripTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}

/**
 * Build the commander program. Parsing never exits the process: help,
 * version and usage errors surface as CommanderError.
 */
export function createProgram(terminal: Terminal): Command {
  return new Command()
    .name("pybootstrap")
    .description("Provision a Python virtual environment with a standard automation toolkit")
    .version(VERSION, "-V, --version")
    .option("--env-dir <path>", "virtual environment directory", DEFAULT_ENV_DIR)
    .option("--runtime-dir <path>", "portable runtime directory", DEFAULT_RUNTIME_DIR)
    .option("--python-bin <path>", "python interpreter to create the environment with")
    .option("--dry-run", "print the commands without running them", false)
    .option("--extra <name>", "additional package to install (repeatable)", collect, [])
    .exitOverride()
    .configureOutput({
      writeOut: (text) => terminal.write(stripTrailingNewline(text)),
      writeErr: (text) => terminal.error(stripTrailingNewline(text)),
    });
}

/**
 * Parse argv (without the node and script entries), run the pipeline and
 * return the process exit code.
 */
export async function runCli(argv: readonly string[], deps: ProvisionPlatform): Promise<number> {
  const logger = deps.loggingService.createLogger("cli");
  const program = createProgram(deps.terminal);

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed help, version or the usage error
      return error.exitCode;
    }
    throw error;
  }

  try {
    const config = await canonicalizeDirectories(
      buildProvisionConfig(program.opts(), deps.platformInfo),
      deps.fileSystem
    );
    await createProvisioner(config, deps).run(config);
    return EXIT_SUCCESS;
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error("Provisioning failed", { error: message }, error instanceof Error ? error : undefined);
    deps.terminal.error(`error: ${message}`);
    return EXIT_FAILURE;
  }
}
