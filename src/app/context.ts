/**
 * AppContext wires the long-lived collaborators for one CLI process.
 * Purpose: make the config path, logger and ports explicit for command handlers.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config, logLevel, logFile });
 */

import path from "node:path";

import type { AppConfig } from "../core/config.js";
import { createEventLogger, type EventLogger, type LineWriter, type LogLevel } from "../core/logger.js";

import { createDefaultHookRegistry, type PipelineHookRegistry } from "./orchestrator/pipeline-hooks.js";
import { systemClock, type OrchestratorPorts, type ProcessRunner } from "./orchestrator/ports.js";
import { ExecaProcessRunner } from "./orchestrator/process/execa-process-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: AppConfig;
  logger: EventLogger;
  ports: OrchestratorPorts;
  hooks: PipelineHookRegistry;
};

export type CreateAppContextInput = {
  configPath: string;
  config: AppConfig;
  logLevel?: LogLevel;
  logFile?: string;
  logStream?: LineWriter;
  processRunner?: ProcessRunner;
  hooks?: PipelineHookRegistry;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const logger = createEventLogger({
    level: input.logLevel,
    logFile: input.logFile,
    stream: input.logStream,
  });

  return {
    configPath: path.resolve(input.configPath),
    config: input.config,
    logger,
    ports: {
      processRunner: input.processRunner ?? new ExecaProcessRunner(),
      logger,
      clock: systemClock,
    },
    hooks: input.hooks ?? createDefaultHookRegistry(),
  };
}
