import path from "node:path";

import { compactTimestamp } from "./utils.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const COMPLETION_MARKER_FILENAME = "analysis_complete.json";
export const READY_MARKER_FILENAME = "symlinks_complete.json";

const WORK_DIR_PREFIX = "work-";

// =============================================================================
// TYPES
// =============================================================================

export type AnalysisPathsInput = {
  runId: string;
  pipelineShortName: string;
  pipelineMinorVersion: string;
  outputRoot: string;
  workRoot: string;
  now: Date;
};

export type AnalysisPaths = {
  workDir: string;
  runOutputDir: string;
  outputDir: string;
  completionMarkerPath: string;
  reportPath: string;
  tracePath: string;
  timelinePath: string;
  logPath: string;
};

// =============================================================================
// PATH HELPERS
// =============================================================================

export function runOutputDir(outputRoot: string, runId: string): string {
  return path.resolve(outputRoot, runId);
}

export function pipelineOutputDirName(shortName: string, minor: string): string {
  return `${shortName}-${minor}-output`;
}

export function pipelineOutputDir(
  outputRoot: string,
  runId: string,
  shortName: string,
  minor: string,
): string {
  return path.join(runOutputDir(outputRoot, runId), pipelineOutputDirName(shortName, minor));
}

export function completionMarkerPath(
  outputRoot: string,
  runId: string,
  shortName: string,
  minor: string,
): string {
  return path.join(pipelineOutputDir(outputRoot, runId, shortName, minor), COMPLETION_MARKER_FILENAME);
}

export function workDirName(runId: string, shortName: string, timestamp: string): string {
  return `${WORK_DIR_PREFIX}${runId}_${shortName}_${timestamp}`;
}

/** Matches only the work directories `workDirName` produces for this run and pipeline. */
export function workDirNamePattern(runId: string, shortName: string): RegExp {
  return new RegExp(`^${escapeRegExp(`${WORK_DIR_PREFIX}${runId}_${shortName}_`)}\\d{14}$`);
}

export function planAnalysisPaths(input: AnalysisPathsInput): AnalysisPaths {
  const { runId, pipelineShortName: shortName, pipelineMinorVersion: minor } = input;

  const outputDir = pipelineOutputDir(input.outputRoot, runId, shortName, minor);
  const artifact = (suffix: string): string =>
    path.join(outputDir, `${runId}_${shortName}_${suffix}`);

  return {
    workDir: path.resolve(
      input.workRoot,
      workDirName(runId, shortName, compactTimestamp(input.now)),
    ),
    runOutputDir: runOutputDir(input.outputRoot, runId),
    outputDir,
    completionMarkerPath: path.join(outputDir, COMPLETION_MARKER_FILENAME),
    reportPath: artifact("report.html"),
    tracePath: artifact("trace.tsv"),
    timelinePath: artifact("timeline.html"),
    logPath: artifact("nextflow.log"),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
