import { Command, InvalidArgumentError } from "commander";

import { parseLogLevel, type LogLevel } from "../core/logger.js";

import { planCommand } from "./plan.js";
import { validateConfigCommand } from "./validate-config.js";
import { watchCommand } from "./watch.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("seqrun-dispatch")
    .description("Watch sequencing run directories and dispatch analysis pipelines")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("watch")
    .description("Scan for ready runs, dispatch pipelines, sleep, repeat")
    .requiredOption("--config <path>", "Path to the YAML or JSON config file")
    .option("--once", "Run a single scan cycle and exit", false)
    .option("--log-level <level>", "Minimum event level: debug, info, warn or error", parseLevel)
    .option("--log-file <path>", "Also append JSONL events to this file")
    .action(async (opts: { config: string; once: boolean; logLevel?: LogLevel; logFile?: string }) => {
      await watchCommand(opts);
    });

  program
    .command("plan")
    .description("Show what the next scan cycle would dispatch, without running anything")
    .requiredOption("--config <path>", "Path to the YAML or JSON config file")
    .option("--json", "Print the plan as JSON", false)
    .action(async (opts: { config: string; json: boolean }) => {
      await planCommand(opts);
    });

  program
    .command("validate-config")
    .description("Load and validate the config file")
    .requiredOption("--config <path>", "Path to the YAML or JSON config file")
    .action((opts: { config: string }) => {
      validateConfigCommand(opts);
    });

  return program;
}

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError("Expected one of debug, info, warn, error.");
  }
  return level;
}
