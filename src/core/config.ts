import os from "node:os";
import path from "node:path";

import { z } from "zod";

export const DEFAULT_SCAN_INTERVAL_SECONDS = 3600.0;
export const DEFAULT_OUTPUT_TAIL_LINES = 50;

// namespace/name, e.g. "example-org/example-pipeline"
const QUALIFIED_NAME = /^[^/\s]+\/[^/\s]+$/;
// dot-separated numeric components with an optional pre-release suffix on the last one
const DOTTED_VERSION = /^\d+(\.\d+)*([-+][0-9A-Za-z.-]+)?$/;

const PipelineNameSchema = z
  .string()
  .regex(QUALIFIED_NAME, "Expected a qualified pipeline name of the form namespace/name");

const PipelineVersionSchema = z
  .string()
  .regex(DOTTED_VERSION, "Expected a dot-separated version such as 1.2.3");

export const PipelineDependencySchema = z.object({
  name: PipelineNameSchema,
  version: PipelineVersionSchema,
});

const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const PipelineDefinitionSchema = z.object({
  pipeline_name: PipelineNameSchema,
  pipeline_version: PipelineVersionSchema,
  pipeline_parameters: z.record(ParameterValueSchema).default({}),
  dependencies: z.array(PipelineDependencySchema).nullish(),
  delete_work_dir: z.boolean().default(true),
});

const ExecutorSchema = z.object({
  program: z.string().min(1).default("nextflow"),
  profile: z.string().min(1).default("conda"),
  cache_dir: z.string().min(1).default(path.join(os.homedir(), ".conda", "envs")),
  timeout_minutes: z.number().positive().optional(),
  output_tail_lines: z.number().int().positive().default(DEFAULT_OUTPUT_TAIL_LINES),
});

export const AppConfigSchema = z.object({
  fastq_by_run_dir: z.string().min(1),
  analysis_output_dir: z.string().min(1),
  analysis_work_dir: z.string().min(1),

  // Unparsable values resolve to DEFAULT_SCAN_INTERVAL_SECONDS at sleep time.
  scan_interval_seconds: z.union([z.number(), z.string()]).optional(),

  analyze_runs_in_reverse_order: z.boolean().default(false),
  check_symlinks_complete: z.boolean().default(true),
  strict_pipeline_hooks: z.boolean().default(false),

  executor: ExecutorSchema.default({}),

  pipelines: z.array(PipelineDefinitionSchema).default([]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorSchema>;
export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;
export type ParameterValue = z.infer<typeof ParameterValueSchema>;

export function resolveScanIntervalSeconds(value: AppConfig["scan_interval_seconds"]): number {
  if (value === undefined) return DEFAULT_SCAN_INTERVAL_SECONDS;

  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (typeof value === "string" && value.trim().length === 0) {
    return DEFAULT_SCAN_INTERVAL_SECONDS;
  }
  if (!Number.isFinite(parsed) || parsed < 0) {
    return DEFAULT_SCAN_INTERVAL_SECONDS;
  }

  return parsed;
}
