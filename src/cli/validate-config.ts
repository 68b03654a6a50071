import { resolveScanIntervalSeconds, type AppConfig } from "../core/config.js";
import { loadAppConfig } from "../core/config-loader.js";
import type { LineWriter } from "../core/logger.js";

export type ValidateConfigOptions = {
  config: string;
};

export function validateConfigCommand(
  opts: ValidateConfigOptions,
  out: LineWriter = process.stdout,
): AppConfig {
  const config = loadAppConfig(opts.config);
  out.write(`${formatConfigSummary(config).join("\n")}\n`);
  return config;
}

export function formatConfigSummary(config: AppConfig): string[] {
  const lines = [
    "Config OK.",
    `Runs:      ${config.fastq_by_run_dir}`,
    `Outputs:   ${config.analysis_output_dir}`,
    `Work dirs: ${config.analysis_work_dir}`,
    `Interval:  ${resolveScanIntervalSeconds(config.scan_interval_seconds)}s`,
    `Pipelines: ${config.pipelines.length}`,
  ];

  for (const pipeline of config.pipelines) {
    const dependencies = (pipeline.dependencies ?? []).map(
      (dependency) => `${dependency.name}@${dependency.version}`,
    );
    const suffix = dependencies.length > 0 ? ` (after ${dependencies.join(", ")})` : "";
    lines.push(`  - ${pipeline.pipeline_name}@${pipeline.pipeline_version}${suffix}`);
  }

  return lines;
}
