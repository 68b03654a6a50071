import { planScanCycle, type PlannedUnit } from "../app/orchestrator/plan-cycle.js";
import { createDefaultHookRegistry } from "../app/orchestrator/pipeline-hooks.js";
import { loadAppConfig } from "../core/config-loader.js";
import { StreamLogger, type LineWriter } from "../core/logger.js";

export type PlanCommandOptions = {
  config: string;
  json?: boolean;
};

export async function planCommand(
  opts: PlanCommandOptions,
  out: LineWriter = process.stdout,
): Promise<PlannedUnit[]> {
  const config = loadAppConfig(opts.config);
  const logger = new StreamLogger(process.stderr, "warn");

  try {
    const units = await planScanCycle({
      config,
      logger,
      hooks: createDefaultHookRegistry(),
      now: new Date(),
    });

    if (opts.json) {
      out.write(`${JSON.stringify(units, null, 2)}\n`);
    } else {
      out.write(`${formatPlan(units).join("\n")}\n`);
    }
    return units;
  } finally {
    logger.close();
  }
}

export function formatPlan(units: PlannedUnit[]): string[] {
  if (units.length === 0) {
    return ["No ready runs found."];
  }

  const lines: string[] = [];
  for (const unit of units) {
    lines.push(`${unit.runId}  ${unit.pipelineName}@${unit.pipelineVersion}  ${unit.status}`);
    if (unit.status === "ready" && unit.commandLine) {
      lines.push(`  ${unit.commandLine}`);
    }
    if (unit.missingDependencies.length > 0) {
      lines.push(`  waiting on: ${unit.missingDependencies.join(", ")}`);
    }
    if (unit.error) {
      lines.push(`  error: ${unit.error}`);
    }
  }
  return lines;
}
