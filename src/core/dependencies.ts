import type { PipelineDefinition } from "./config.js";
import type { Run } from "./discovery.js";
import { logEvent, type EventLogger } from "./logger.js";
import { completionMarkerExists } from "./markers.js";
import { completionMarkerPath } from "./paths.js";
import { minorVersion, pipelineShortName } from "./pipeline-identity.js";

export type DependencyCheck = {
  pipelineName: string;
  pipelineVersion: string;
  completionMarkerPath: string;
  complete: boolean;
};

export type DependencyStatus = {
  complete: boolean;
  dependencies: DependencyCheck[];
};

export async function checkDependencies(
  pipeline: PipelineDefinition,
  run: Run,
  outputRoot: string,
): Promise<DependencyStatus> {
  const declared = pipeline.dependencies ?? [];

  const dependencies: DependencyCheck[] = [];
  for (const dependency of declared) {
    const markerPath = completionMarkerPath(
      outputRoot,
      run.sequencingRunId,
      pipelineShortName(dependency.name),
      minorVersion(dependency.version),
    );
    dependencies.push({
      pipelineName: dependency.name,
      pipelineVersion: dependency.version,
      completionMarkerPath: markerPath,
      complete: await completionMarkerExists(markerPath),
    });
  }

  return {
    complete: dependencies.every((dependency) => dependency.complete),
    dependencies,
  };
}

export async function dependenciesComplete(
  pipeline: PipelineDefinition,
  run: Run,
  outputRoot: string,
  logger?: EventLogger,
): Promise<boolean> {
  const status = await checkDependencies(pipeline, run, outputRoot);

  if (logger && status.dependencies.length > 0) {
    logEvent(logger, "info", "checked_analysis_dependencies", {
      runId: run.sequencingRunId,
      pipelineName: pipeline.pipeline_name,
      all_analysis_dependencies_complete: status.complete,
      analysis_dependencies: status.dependencies.map((dependency) => ({
        pipeline_name: dependency.pipelineName,
        pipeline_version: dependency.pipelineVersion,
        analysis_complete_path: dependency.completionMarkerPath,
        analysis_complete: dependency.complete,
      })),
    });
  }

  return status.complete;
}
