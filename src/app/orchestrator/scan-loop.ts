/**
 * Scan loop: reload config, run a scan cycle, sleep, repeat until drained.
 * Purpose: drive the Idle -> Scanning -> Dispatching -> Sleeping cycle.
 * Assumptions: the stop signal drains; in-flight invocations always finish.
 * Usage: await runScanLoop({ configPath, ports, hooks, signal });
 */

import { setTimeout as sleepFor } from "node:timers/promises";

import { resolveScanIntervalSeconds, type AppConfig } from "../../core/config.js";
import { reloadAppConfig } from "../../core/config-loader.js";
import { logEvent } from "../../core/logger.js";

import { normalizeAbortReason } from "./helpers/errors.js";
import { msFromSeconds } from "./helpers/time.js";
import type { PipelineHookRegistry } from "./pipeline-hooks.js";
import type { OrchestratorPorts } from "./ports.js";
import { runScanCycle, type ScanCycleSummary } from "./scan-cycle.js";

// =============================================================================
// TYPES
// =============================================================================

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type ScanLoopInput = {
  configPath: string;
  ports: OrchestratorPorts;
  hooks: PipelineHookRegistry;
  signal: AbortSignal;
  /** Config already loaded at startup; used as the fallback for the first reload. */
  initialConfig?: AppConfig;
  maxCycles?: number;
  sleep?: Sleep;
};

export type ScanLoopStopReason = "drained" | "cycle_limit";

export type ScanLoopResult = {
  cycles: number;
  stopReason: ScanLoopStopReason;
  lastSummary: ScanCycleSummary | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runScanLoop(input: ScanLoopInput): Promise<ScanLoopResult> {
  const { configPath, ports, hooks, signal } = input;
  const { logger } = ports;
  const sleep = input.sleep ?? abortableSleep;

  let config: AppConfig | null = input.initialConfig ?? null;
  let cycles = 0;
  let lastSummary: ScanCycleSummary | null = null;
  let stopReason: ScanLoopStopReason = "drained";

  while (!signal.aborted) {
    config = reloadAppConfig(configPath, config, logger);
    lastSummary = await runScanCycle({ config, ports, hooks, signal });
    cycles += 1;

    if (signal.aborted) break;
    if (input.maxCycles !== undefined && cycles >= input.maxCycles) {
      stopReason = "cycle_limit";
      break;
    }

    const intervalSeconds = resolveScanIntervalSeconds(config.scan_interval_seconds);
    logEvent(logger, "info", "sleep_start", { scan_interval_seconds: intervalSeconds });
    await sleep(msFromSeconds(intervalSeconds), signal);
  }

  logEvent(logger, "info", "scan_loop_stopped", {
    stop_reason: stopReason,
    cycles,
    ...(stopReason === "drained"
      ? { drain_reason: normalizeAbortReason(signal.reason) ?? null }
      : {}),
  });

  return { cycles, stopReason, lastSummary };
}

/** Resolves early, without rejecting, once the signal aborts. */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}
