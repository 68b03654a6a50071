/**
 * Orchestrator ports define the boundary between the scan engine and adapters.
 * Purpose: make process execution and time explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: provide implementations in `app/context.ts` and inject into the scan loop.
 */

import type { EventLogger } from "../../core/logger.js";

// =============================================================================
// PORTS
// =============================================================================

export type ProcessRunInput = {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs?: number;
};

export type ProcessRunResult = {
  exitCode: number;
  /** Interleaved stdout and stderr, for diagnostics only. */
  output: string;
  timedOut: boolean;
};

export interface ProcessRunner {
  run(input: ProcessRunInput): Promise<ProcessRunResult>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export type OrchestratorPorts = {
  processRunner: ProcessRunner;
  logger: EventLogger;
  clock: Clock;
};
