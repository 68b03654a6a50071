/**
 * Dry-run planning of a scan cycle.
 * Purpose: report what the next cycle would dispatch without touching the filesystem.
 * Assumptions: checks mirror the dispatcher's guards; nothing is created or executed.
 * Usage: const units = await planScanCycle({ config, logger, hooks, now: new Date() });
 */

import fse from "fs-extra";

import type { AppConfig } from "../../core/config.js";
import { checkDependencies } from "../../core/dependencies.js";
import { discoverRuns } from "../../core/discovery.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { EventLogger } from "../../core/logger.js";
import { planAnalysisPaths } from "../../core/paths.js";
import { resolvePipelineIdentity } from "../../core/pipeline-identity.js";

import { buildPipelineCommand, formatCommandLine } from "./pipeline-command.js";
import type { PipelineHookRegistry } from "./pipeline-hooks.js";

export type PlannedUnitStatus =
  | "ready"
  | "already_started"
  | "dependencies_incomplete"
  | "config_error";

export type PlannedUnit = {
  runId: string;
  pipelineName: string;
  pipelineVersion: string;
  status: PlannedUnitStatus;
  outputDir: string | null;
  commandLine: string | null;
  missingDependencies: string[];
  error: string | null;
};

export type PlanScanCycleInput = {
  config: AppConfig;
  logger: EventLogger;
  hooks: PipelineHookRegistry;
  now: Date;
};

export async function planScanCycle(input: PlanScanCycleInput): Promise<PlannedUnit[]> {
  const { config, hooks, now } = input;
  const units: PlannedUnit[] = [];

  const runs = discoverRuns(config.fastq_by_run_dir, {
    logger: input.logger,
    requireReadyMarker: config.check_symlinks_complete,
    reverseOrder: config.analyze_runs_in_reverse_order,
  });

  for await (const run of runs) {
    for (const pipeline of config.pipelines) {
      const unit: PlannedUnit = {
        runId: run.sequencingRunId,
        pipelineName: pipeline.pipeline_name,
        pipelineVersion: pipeline.pipeline_version,
        status: "ready",
        outputDir: null,
        commandLine: null,
        missingDependencies: [],
        error: null,
      };
      units.push(unit);

      if (config.strict_pipeline_hooks && !hooks.has(pipeline.pipeline_name)) {
        unit.status = "config_error";
        unit.error = `Pipeline ${pipeline.pipeline_name} has no registered pre/post-analysis handler.`;
        continue;
      }

      let outputDir: string;
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
        outputDir = paths.outputDir;
        unit.outputDir = outputDir;
        unit.commandLine = formatCommandLine(
          buildPipelineCommand({ pipeline, identity, run, paths, executor: config.executor }),
        );
      } catch (err) {
        unit.status = "config_error";
        unit.error = formatErrorMessage(err);
        continue;
      }

      if (await fse.pathExists(outputDir)) {
        unit.status = "already_started";
        continue;
      }

      const dependencies = await checkDependencies(pipeline, run, config.analysis_output_dir);
      if (!dependencies.complete) {
        unit.status = "dependencies_incomplete";
        unit.missingDependencies = dependencies.dependencies
          .filter((dependency) => !dependency.complete)
          .map((dependency) => `${dependency.pipelineName}@${dependency.pipelineVersion}`);
      }
    }
  }

  return units;
}
