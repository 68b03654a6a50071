/**
 * Post-processor reclaims the work directory of a successful dispatch and finalizes it.
 * Purpose: best-effort cleanup followed by the pipeline's registered finalize hook.
 * Assumptions: only called after a succeeded dispatch outcome.
 * Usage: await postProcess(pipeline, run, { config, logger, hooks });
 */

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { AppConfig, PipelineDefinition } from "../../core/config.js";
import type { Run } from "../../core/discovery.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { WorkDirError } from "../../core/errors.js";
import { logEvent, type EventLogger } from "../../core/logger.js";
import { pipelineOutputDir, workDirName, workDirNamePattern } from "../../core/paths.js";
import { resolvePipelineIdentity, type PipelineIdentity } from "../../core/pipeline-identity.js";

import type { PipelineHookRegistry } from "./pipeline-hooks.js";

// =============================================================================
// TYPES
// =============================================================================

export type PostProcessDeps = {
  config: AppConfig;
  logger: EventLogger;
  hooks: PipelineHookRegistry;
};

export type WorkDirCleanup = "deleted" | "not_found" | "kept" | "delete_failed";

export type PostProcessResult = {
  workDir: string | null;
  workDirCleanup: WorkDirCleanup;
  finalize: "completed" | "not_registered" | "failed";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function postProcess(
  pipeline: PipelineDefinition,
  run: Run,
  deps: PostProcessDeps,
): Promise<PostProcessResult> {
  const { config, logger } = deps;
  const identity = resolvePipelineIdentity(pipeline.pipeline_name, pipeline.pipeline_version);
  const base = { runId: run.sequencingRunId, pipelineName: pipeline.pipeline_name };

  const workDir = await findLatestWorkDir(
    config.analysis_work_dir,
    run.sequencingRunId,
    identity.shortName,
  );

  let workDirCleanup: WorkDirCleanup;
  if (!pipeline.delete_work_dir) {
    logEvent(logger, "info", "skipped_deletion_of_analysis_work_dir", {
      ...base,
      analysis_work_dir: workDir,
    });
    workDirCleanup = "kept";
  } else if (!workDir) {
    logEvent(logger, "warn", "analysis_work_dir_not_found", {
      ...base,
      analysis_work_dir_root: config.analysis_work_dir,
    });
    workDirCleanup = "not_found";
  } else {
    workDirCleanup = await removeWorkDir(workDir, config.analysis_work_dir, logger, base);
  }

  const finalize = await runFinalize(pipeline, run, deps, {
    identity,
    outputDir: pipelineOutputDir(
      config.analysis_output_dir,
      run.sequencingRunId,
      identity.shortName,
      identity.minorVersion,
    ),
  });

  return { workDir, workDirCleanup, finalize };
}

/** Latest by timestamp suffix; only names matching this run and pipeline are considered. */
export async function findLatestWorkDir(
  workRoot: string,
  runId: string,
  shortName: string,
): Promise<string | null> {
  if (!(await fse.pathExists(workRoot))) return null;

  const pattern = workDirNamePattern(runId, shortName);
  const candidates = await fg(`${fg.escapePath(workDirName(runId, shortName, ""))}*`, {
    cwd: workRoot,
    onlyDirectories: true,
    deep: 1,
  });

  const matches = candidates.filter((name) => pattern.test(name)).sort();
  const latest = matches.at(-1);
  return latest ? path.resolve(workRoot, latest) : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function removeWorkDir(
  workDir: string,
  workRoot: string,
  logger: EventLogger,
  base: { runId: string; pipelineName: string },
): Promise<WorkDirCleanup> {
  try {
    assertInsideBase(workDir, workRoot);
    await fse.remove(workDir);
  } catch (err) {
    logEvent(logger, "warn", "analysis_work_dir_delete_failed", {
      ...base,
      analysis_work_dir: workDir,
      error: formatErrorMessage(err),
    });
    return "delete_failed";
  }

  logEvent(logger, "info", "analysis_work_dir_deleted", { ...base, analysis_work_dir: workDir });
  return "deleted";
}

async function runFinalize(
  pipeline: PipelineDefinition,
  run: Run,
  deps: PostProcessDeps,
  target: { identity: PipelineIdentity; outputDir: string },
): Promise<PostProcessResult["finalize"]> {
  const base = { runId: run.sequencingRunId, pipelineName: pipeline.pipeline_name };
  const finalize = deps.hooks.get(pipeline.pipeline_name)?.finalize;

  if (!finalize) {
    logEvent(deps.logger, "info", "post_analysis_not_registered", base);
    return "not_registered";
  }

  try {
    await finalize({
      run,
      pipeline,
      identity: target.identity,
      outputDir: target.outputDir,
      logger: deps.logger,
    });
    return "completed";
  } catch (err) {
    logEvent(deps.logger, "error", "post_analysis_failed", {
      ...base,
      error: formatErrorMessage(err),
    });
    return "failed";
  }
}

function assertInsideBase(targetPath: string, baseDir: string): void {
  const normalizedBase = path.resolve(baseDir);
  const normalizedTarget = path.resolve(targetPath);
  const relative = path.relative(normalizedBase, normalizedTarget);

  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new WorkDirError(
      `Refusing to remove work directory outside ${normalizedBase}: ${normalizedTarget}`,
    );
  }
}
