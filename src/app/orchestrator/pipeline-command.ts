/**
 * Builds the external pipeline command line for one (run, pipeline) pair.
 * Purpose: keep argument construction pure so it can be planned without executing.
 * Assumptions: paths come from `planAnalysisPaths`; parameters are validated config values.
 * Usage: const { command, args } = buildPipelineCommand({ pipeline, identity, run, paths, executor });
 */

import type { ExecutorConfig, ParameterValue, PipelineDefinition } from "../../core/config.js";
import type { Run } from "../../core/discovery.js";
import { PipelineConfigError } from "../../core/errors.js";
import type { AnalysisPaths } from "../../core/paths.js";
import type { PipelineIdentity } from "../../core/pipeline-identity.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineCommandInput = {
  pipeline: PipelineDefinition;
  identity: PipelineIdentity;
  run: Run;
  paths: AnalysisPaths;
  executor: ExecutorConfig;
};

export type PipelineCommand = {
  command: string;
  args: string[];
};

const OUTDIR_PARAMETER = "outdir";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Throws PipelineConfigError when a null parameter has no run value to fill it.
 * The `outdir` parameter always points at the planned output directory.
 */
export function buildPipelineCommand(input: PipelineCommandInput): PipelineCommand {
  const { identity, paths, executor } = input;

  const args = [
    "-log",
    paths.logPath,
    "run",
    identity.qualifiedName,
    "-r",
    identity.version,
    "-profile",
    executor.profile,
    "--cache",
    executor.cache_dir,
    "-work-dir",
    paths.workDir,
    "-with-report",
    paths.reportPath,
    "-with-trace",
    paths.tracePath,
    "-with-timeline",
    paths.timelinePath,
  ];

  let outdirSet = false;
  for (const [flag, value] of Object.entries(input.pipeline.pipeline_parameters)) {
    if (flag === OUTDIR_PARAMETER) {
      args.push(`--${flag}`, paths.outputDir);
      outdirSet = true;
      continue;
    }
    args.push(`--${flag}`, resolveParameterValue(flag, value, input.run));
  }
  if (!outdirSet) {
    args.push(`--${OUTDIR_PARAMETER}`, paths.outputDir);
  }

  return { command: executor.program, args };
}

export function resolveParameterValue(flag: string, value: ParameterValue, run: Run): string {
  if (value !== null) return String(value);

  const fromRun = run.analysisParameters[flag] ?? runAttributes(run)[flag];
  if (fromRun === undefined || fromRun === null) {
    throw new PipelineConfigError(
      `Parameter "${flag}" is null and run ${run.sequencingRunId} has no value for it.`,
    );
  }
  return fromRun;
}

export function formatCommandLine(command: PipelineCommand): string {
  return [command.command, ...command.args].map(quoteArg).join(" ");
}

// =============================================================================
// INTERNALS
// =============================================================================

function runAttributes(run: Run): Record<string, string | undefined> {
  return {
    sequencing_run_id: run.sequencingRunId,
    fastq_directory: run.fastqDirectory,
    instrument_type: run.instrumentType,
  };
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
