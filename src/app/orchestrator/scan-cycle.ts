/**
 * One scan cycle: discover runs, then dispatch and post-process every configured
 * pipeline for each run, in declaration order.
 * Purpose: isolate each (run, pipeline) unit so a failure never stops the cycle.
 * Assumptions: only a DiscoveryError escapes; the stop signal is checked between units.
 * Usage: const summary = await runScanCycle({ config, ports, hooks, signal });
 */

import type { AppConfig } from "../../core/config.js";
import { discoverRuns } from "../../core/discovery.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logEvent } from "../../core/logger.js";

import { dispatchPipeline, type DispatchOutcome, type FailureReason } from "./dispatcher.js";
import { secondsFromMs } from "./helpers/time.js";
import type { PipelineHookRegistry } from "./pipeline-hooks.js";
import type { OrchestratorPorts } from "./ports.js";
import { postProcess } from "./post-processor.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanCycleInput = {
  config: AppConfig;
  ports: OrchestratorPorts;
  hooks: PipelineHookRegistry;
  signal?: AbortSignal;
};

export type ScanCycleSummary = {
  runsDiscovered: number;
  dispatched: number;
  succeeded: number;
  failed: number;
  skipped: number;
  configErrors: number;
  drained: boolean;
  durationSeconds: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runScanCycle(input: ScanCycleInput): Promise<ScanCycleSummary> {
  const { config, ports, hooks, signal } = input;
  const { logger, clock } = ports;
  const startedMs = clock.now().getTime();

  const summary: ScanCycleSummary = {
    runsDiscovered: 0,
    dispatched: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    configErrors: 0,
    drained: false,
    durationSeconds: 0,
  };

  const runs = discoverRuns(config.fastq_by_run_dir, {
    logger,
    requireReadyMarker: config.check_symlinks_complete,
    reverseOrder: config.analyze_runs_in_reverse_order,
  });

  runLoop: for await (const run of runs) {
    summary.runsDiscovered += 1;

    for (const pipeline of config.pipelines) {
      if (signal?.aborted) {
        summary.drained = true;
        break runLoop;
      }

      const outcome = await dispatchPipeline(pipeline, run, { config, ports, hooks });
      tally(summary, outcome);

      if (outcome.status === "succeeded") {
        try {
          await postProcess(pipeline, run, { config, logger, hooks });
        } catch (err) {
          logEvent(logger, "error", "post_analysis_failed", {
            runId: run.sequencingRunId,
            pipelineName: pipeline.pipeline_name,
            error: formatErrorMessage(err),
          });
        }
      }
    }

    if (signal?.aborted) {
      summary.drained = true;
      break;
    }
  }

  summary.durationSeconds = secondsFromMs(clock.now().getTime() - startedMs);

  logEvent(logger, "info", "scan_complete", {
    runs_discovered: summary.runsDiscovered,
    dispatched: summary.dispatched,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
    config_errors: summary.configErrors,
    drained: summary.drained,
    scan_duration_seconds: summary.durationSeconds,
  });

  return summary;
}

// =============================================================================
// INTERNALS
// =============================================================================

const NOT_LAUNCHED: ReadonlySet<FailureReason> = new Set([
  "output_dir_create_failed",
  "work_dir_create_failed",
]);

function tally(summary: ScanCycleSummary, outcome: DispatchOutcome): void {
  switch (outcome.status) {
    case "skipped":
      summary.skipped += 1;
      return;
    case "config_error":
      summary.configErrors += 1;
      return;
    case "prepare_failed":
    case "error":
      summary.failed += 1;
      return;
    case "succeeded":
      summary.dispatched += 1;
      summary.succeeded += 1;
      return;
    case "failed":
      if (!NOT_LAUNCHED.has(outcome.reason)) summary.dispatched += 1;
      summary.failed += 1;
      return;
  }
}
