#!/usr/bin/env node
/**
 * pybootstrap executable.
 */

import { createCliDependencies } from "../cli/dependencies.js";
import { runCli } from "../cli/program.js";

process.exitCode = await runCli(process.argv.slice(2), createCliDependencies());
