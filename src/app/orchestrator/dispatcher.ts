/**
 * Dispatcher runs one pipeline against one run, from idempotency guard to marker.
 * Purpose: turn every dispatch into a reported outcome so a scan cycle never aborts.
 * Assumptions: a single instance owns the output root; invocations are sequential.
 * Usage: const outcome = await dispatchPipeline(pipeline, run, { config, ports, hooks });
 */

import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { AppConfig, PipelineDefinition } from "../../core/config.js";
import { dependenciesComplete } from "../../core/dependencies.js";
import type { Run } from "../../core/discovery.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logEvent } from "../../core/logger.js";
import { writeCompletionMarker } from "../../core/markers.js";
import { planAnalysisPaths, type AnalysisPaths } from "../../core/paths.js";
import { resolvePipelineIdentity, type PipelineIdentity } from "../../core/pipeline-identity.js";
import { tailLines } from "../../core/utils.js";

import { msFromMinutes } from "./helpers/time.js";
import { buildPipelineCommand, formatCommandLine, type PipelineCommand } from "./pipeline-command.js";
import type { PipelineHookRegistry } from "./pipeline-hooks.js";
import type { OrchestratorPorts, ProcessRunResult } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type DispatchDeps = {
  config: AppConfig;
  ports: OrchestratorPorts;
  hooks: PipelineHookRegistry;
};

export type AnalysisInvocation = {
  runId: string;
  pipelineName: string;
  pipelineVersion: string;
  command: PipelineCommand;
  paths: AnalysisPaths;
  startedAt: Date;
  completedAt?: Date;
  exitCode: number | null;
};

export type SkipReason = "output_exists" | "dependencies_incomplete";

export type FailureReason =
  | "output_dir_create_failed"
  | "work_dir_create_failed"
  | "nonzero_exit"
  | "timed_out"
  | "marker_write_failed";

export type DispatchOutcome =
  | { status: "skipped"; reason: SkipReason; outputDir: string }
  | { status: "config_error"; error: string }
  | { status: "prepare_failed"; error: string }
  | { status: "succeeded"; invocation: AnalysisInvocation }
  | { status: "failed"; reason: FailureReason; invocation: AnalysisInvocation; error: string }
  | { status: "error"; error: string };

type Planned = {
  identity: PipelineIdentity;
  paths: AnalysisPaths;
  command: PipelineCommand;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Never throws; every failure mode is reported through the returned outcome. */
export async function dispatchPipeline(
  pipeline: PipelineDefinition,
  run: Run,
  deps: DispatchDeps,
): Promise<DispatchOutcome> {
  try {
    return await dispatchUnchecked(pipeline, run, deps);
  } catch (err) {
    const error = formatErrorMessage(err);
    logEvent(deps.ports.logger, "error", "dispatch_error", {
      runId: run.sequencingRunId,
      pipelineName: pipeline.pipeline_name,
      error,
    });
    return { status: "error", error };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function dispatchUnchecked(
  pipeline: PipelineDefinition,
  run: Run,
  deps: DispatchDeps,
): Promise<DispatchOutcome> {
  const { config, hooks } = deps;
  const { logger, clock, processRunner } = deps.ports;
  const base = { runId: run.sequencingRunId, pipelineName: pipeline.pipeline_name };

  if (config.strict_pipeline_hooks && !hooks.has(pipeline.pipeline_name)) {
    const error = `Pipeline ${pipeline.pipeline_name} has no registered pre/post-analysis handler.`;
    logEvent(logger, "error", "pipeline_not_supported", { ...base, error });
    return { status: "config_error", error };
  }

  const planned = planDispatch(pipeline, run, config, clock.now());
  if (!planned.ok) {
    logEvent(logger, "error", "pipeline_config_error", { ...base, error: planned.error });
    return { status: "config_error", error: planned.error };
  }
  const { identity, paths, command } = planned.value;

  if (await fse.pathExists(paths.outputDir)) {
    logEvent(logger, "info", "analysis_skipped", {
      ...base,
      reason: "output_exists",
      analysis_output_dir: paths.outputDir,
    });
    return { status: "skipped", reason: "output_exists", outputDir: paths.outputDir };
  }

  if (!(await dependenciesComplete(pipeline, run, config.analysis_output_dir, logger))) {
    logEvent(logger, "info", "analysis_skipped", {
      ...base,
      reason: "dependencies_incomplete",
      analysis_output_dir: paths.outputDir,
    });
    return { status: "skipped", reason: "dependencies_incomplete", outputDir: paths.outputDir };
  }

  const prepare = hooks.get(pipeline.pipeline_name)?.prepare;
  if (prepare) {
    try {
      await prepare({ run, pipeline, identity, outputDir: paths.outputDir, logger });
    } catch (err) {
      const error = formatErrorMessage(err);
      logEvent(logger, "error", "pre_analysis_failed", { ...base, error });
      return { status: "prepare_failed", error };
    }
  }

  const invocation: AnalysisInvocation = {
    runId: run.sequencingRunId,
    pipelineName: identity.qualifiedName,
    pipelineVersion: identity.version,
    command,
    paths,
    startedAt: clock.now(),
    exitCode: null,
  };

  // The output directory claims the unit: once it exists, later cycles skip it
  // whether or not this attempt succeeds.
  try {
    await fse.ensureDir(paths.runOutputDir);
    await fs.mkdir(paths.outputDir);
  } catch (err) {
    return fail(deps, invocation, "output_dir_create_failed", formatErrorMessage(err));
  }

  try {
    await fse.ensureDir(path.dirname(paths.workDir));
    await fs.mkdir(paths.workDir);
  } catch (err) {
    return fail(deps, invocation, "work_dir_create_failed", formatErrorMessage(err));
  }

  logEvent(logger, "info", "analysis_started", {
    ...base,
    pipeline_version: identity.version,
    analysis_command: formatCommandLine(command),
    analysis_work_dir: paths.workDir,
    analysis_output_dir: paths.outputDir,
  });

  const result = await runProcess(deps, command, paths.workDir);
  invocation.exitCode = result.exitCode;

  if (result.timedOut) {
    return fail(deps, invocation, "timed_out", "Pipeline timed out.", result.output);
  }
  if (result.exitCode !== 0) {
    return fail(
      deps,
      invocation,
      "nonzero_exit",
      `Pipeline exited with code ${result.exitCode}.`,
      result.output,
    );
  }

  const completedAt = clock.now();
  invocation.completedAt = completedAt;

  try {
    await writeCompletionMarker(paths.completionMarkerPath, {
      startedAt: invocation.startedAt,
      completedAt,
    });
  } catch (err) {
    return fail(deps, invocation, "marker_write_failed", formatErrorMessage(err));
  }

  logEvent(logger, "info", "analysis_complete", {
    ...base,
    pipeline_version: identity.version,
    analysis_output_dir: paths.outputDir,
    analysis_complete_path: paths.completionMarkerPath,
    timestamp_analysis_start: invocation.startedAt.toISOString(),
    timestamp_analysis_complete: completedAt.toISOString(),
  });

  return { status: "succeeded", invocation };
}

type PlanResult = { ok: true; value: Planned } | { ok: false; error: string };

function planDispatch(
  pipeline: PipelineDefinition,
  run: Run,
  config: AppConfig,
  now: Date,
): PlanResult {
  try {
    const identity = resolvePipelineIdentity(pipeline.pipeline_name, pipeline.pipeline_version);
    const paths = planAnalysisPaths({
      runId: run.sequencingRunId,
      pipelineShortName: identity.shortName,
      pipelineMinorVersion: identity.minorVersion,
      outputRoot: config.analysis_output_dir,
      workRoot: config.analysis_work_dir,
      now,
    });
    const command = buildPipelineCommand({
      pipeline,
      identity,
      run,
      paths,
      executor: config.executor,
    });
    return { ok: true, value: { identity, paths, command } };
  } catch (err) {
    return { ok: false, error: formatErrorMessage(err) };
  }
}

async function runProcess(
  deps: DispatchDeps,
  command: PipelineCommand,
  cwd: string,
): Promise<ProcessRunResult> {
  try {
    return await deps.ports.processRunner.run({
      command: command.command,
      args: command.args,
      cwd,
      timeoutMs: msFromMinutes(deps.config.executor.timeout_minutes),
    });
  } catch (err) {
    return { exitCode: -1, output: formatErrorMessage(err), timedOut: false };
  }
}

function fail(
  deps: DispatchDeps,
  invocation: AnalysisInvocation,
  reason: FailureReason,
  error: string,
  output = "",
): DispatchOutcome {
  logEvent(deps.ports.logger, "error", "analysis_failed", {
    runId: invocation.runId,
    pipelineName: invocation.pipelineName,
    pipeline_version: invocation.pipelineVersion,
    reason,
    error,
    exit_code: invocation.exitCode,
    analysis_work_dir: invocation.paths.workDir,
    output_tail: tailLines(output, deps.config.executor.output_tail_lines),
  });
  return { status: "failed", reason, invocation, error };
}
