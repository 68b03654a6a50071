import { createAppContext, type CreateAppContextInput } from "../app/context.js";
import { runScanLoop, type ScanLoopResult } from "../app/orchestrator/scan-loop.js";
import { loadAppConfig } from "../core/config-loader.js";
import { logEvent, type LogLevel } from "../core/logger.js";

import { createRunStopSignalHandler } from "./signal-handlers.js";

export type WatchCommandOptions = {
  config: string;
  once?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
};

export async function watchCommand(
  opts: WatchCommandOptions,
  deps: Pick<CreateAppContextInput, "processRunner" | "hooks" | "logStream"> = {},
): Promise<ScanLoopResult> {
  const config = loadAppConfig(opts.config);
  const ctx = createAppContext({
    configPath: opts.config,
    config,
    logLevel: opts.logLevel,
    logFile: opts.logFile,
    ...deps,
  });

  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => {
      logEvent(ctx.logger, "info", "drain_requested", {
        signal,
        message: "Finishing the current unit of work before exiting. Signal again to exit now.",
      });
    },
  });

  try {
    return await runScanLoop({
      configPath: ctx.configPath,
      ports: ctx.ports,
      hooks: ctx.hooks,
      signal: stopHandler.signal,
      initialConfig: config,
      maxCycles: opts.once ? 1 : undefined,
    });
  } finally {
    stopHandler.cleanup();
    ctx.logger.close();
  }
}
