#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError } from "commander";

import { renderCliError, resolveExitCode } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

const INFORMATIONAL_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

/**
 * Runs the CLI against `argv` and records the outcome in `process.exitCode`
 * instead of exiting, so a drain or a test harness can finish cleanly.
 */
export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  // Subcommands copy these settings only when created, so apply them to each.
  // Errors are rendered once below; commander's own stderr copy is suppressed.
  for (const command of [program, ...program.commands]) {
    command.configureOutput({ outputError: () => undefined });
    command.exitOverride();
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && INFORMATIONAL_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    const debug = program.opts<{ debug?: boolean }>().debug === true;
    console.error(renderCliError(error, { debug }));
    process.exitCode = resolveExitCode(error);
  }
}

function isDirectExecution(entry: string | undefined): boolean {
  if (!entry) return false;
  try {
    // npm links the bin, so compare against the resolved target
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution(process.argv[1])) {
  void main(process.argv);
}
