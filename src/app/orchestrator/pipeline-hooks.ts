/**
 * Pipeline hooks attach per-pipeline preparation and finalization to a dispatch.
 * Purpose: select pipeline-specific behavior by qualified name through a lookup.
 * Assumptions: hooks are optional; a pipeline without an entry is still runnable.
 * Usage: createDefaultHookRegistry().get("namespace/name")?.finalize?.(ctx)
 */

import type { PipelineDefinition } from "../../core/config.js";
import type { Run } from "../../core/discovery.js";
import { PipelineConfigError } from "../../core/errors.js";
import { listLibraryFastqPaths } from "../../core/fastq.js";
import { logEvent, type EventLogger } from "../../core/logger.js";
import type { PipelineIdentity } from "../../core/pipeline-identity.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineHookContext = {
  run: Run;
  pipeline: PipelineDefinition;
  identity: PipelineIdentity;
  outputDir: string;
  logger: EventLogger;
};

export interface PipelineHooks {
  /** Runs before the work directory is created. Throwing aborts the dispatch. */
  prepare?(ctx: PipelineHookContext): Promise<void>;
  /** Runs after a successful invocation and work directory cleanup. */
  finalize?(ctx: PipelineHookContext): Promise<void>;
}

// =============================================================================
// REGISTRY
// =============================================================================

export class PipelineHookRegistry {
  private readonly entries = new Map<string, PipelineHooks>();

  register(qualifiedName: string, hooks: PipelineHooks): this {
    this.entries.set(qualifiedName, hooks);
    return this;
  }

  get(qualifiedName: string): PipelineHooks | undefined {
    return this.entries.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.entries.has(qualifiedName);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }
}

export const FLUVIEWER_PIPELINE_NAME = "BCCDC-PHL/fluviewer-nf";

export function createDefaultHookRegistry(): PipelineHookRegistry {
  return new PipelineHookRegistry().register(FLUVIEWER_PIPELINE_NAME, fluviewerHooks);
}

// =============================================================================
// BUILT-IN HOOKS
// =============================================================================

const fluviewerHooks: PipelineHooks = {
  async prepare(ctx) {
    const libraries = await listLibraryFastqPaths(ctx.run.fastqDirectory);
    const paired = [...libraries.values()].filter((library) => library.r1 && library.r2);

    logEvent(ctx.logger, "debug", "fastq_libraries_listed", {
      runId: ctx.run.sequencingRunId,
      pipelineName: ctx.pipeline.pipeline_name,
      library_count: libraries.size,
      paired_library_count: paired.length,
    });

    if (paired.length === 0) {
      throw new PipelineConfigError(
        `No paired FASTQ libraries found in ${ctx.run.fastqDirectory}.`,
      );
    }
  },

  async finalize(ctx) {
    const libraries = await listLibraryFastqPaths(ctx.run.fastqDirectory);
    logEvent(ctx.logger, "info", "post_analysis_started", {
      runId: ctx.run.sequencingRunId,
      pipelineName: ctx.pipeline.pipeline_name,
      analysis_output_dir: ctx.outputDir,
      library_count: libraries.size,
    });
  },
};
