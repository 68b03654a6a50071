import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createFakePorts, type FakePorts } from "../app/orchestrator/__tests__/fakes.js";
import { PipelineHookRegistry } from "../app/orchestrator/pipeline-hooks.js";
import { runScanCycle } from "../app/orchestrator/scan-cycle.js";
import { AppConfigSchema, type AppConfig } from "../core/config.js";
import { readCompletionMarker } from "../core/markers.js";

import { createTempRunTree, type TempRunTree } from "./helpers/temp-run-tree.js";

const RUN_ID = "220101_M00001_0001_000000000-AAAAA";

describe("acceptance: scan cycle", () => {
  let tree: TempRunTree;
  let ports: FakePorts;
  let runDir: string;

  beforeEach(async () => {
    tree = await createTempRunTree();
    ports = createFakePorts();
    runDir = await tree.addRun(RUN_ID);
  });

  afterEach(async () => {
    await tree.cleanup();
  });

  function config(pipelines: unknown[]): AppConfig {
    return AppConfigSchema.parse({
      fastq_by_run_dir: tree.runsDir,
      analysis_output_dir: tree.outputDir,
      analysis_work_dir: tree.workDir,
      pipelines,
    });
  }

  const TOOL = {
    pipeline_name: "org/tool",
    pipeline_version: "1.0.0",
    pipeline_parameters: { fastq_input: null },
  };

  const DOWNSTREAM = {
    pipeline_name: "org/downstream",
    pipeline_version: "1.0.0",
    pipeline_parameters: { fastq_input: null },
    dependencies: [{ name: "org/tool", version: "1.0.0" }],
  };

  it("discovers a ready run, invokes the pipeline once and writes its marker", async () => {
    const summary = await runScanCycle({
      config: config([TOOL]),
      ports,
      hooks: new PipelineHookRegistry(),
    });

    expect(summary.runsDiscovered).toBe(1);
    expect(ports.processRunner.calls).toHaveLength(1);

    const { args } = ports.processRunner.calls[0];
    expect(args[args.indexOf("--fastq_input") + 1]).toBe(runDir);

    const markerPath = path.join(tree.outputDir, RUN_ID, "tool-1.0-output", "analysis_complete.json");
    const marker = await readCompletionMarker(markerPath);
    expect(marker).not.toBeNull();
    expect(Date.parse(marker?.timestamp_analysis_complete ?? "")).toBeGreaterThan(
      Date.parse(marker?.timestamp_analysis_start ?? ""),
    );
  });

  it("holds a dependent pipeline until its dependency's marker exists", async () => {
    const cycleConfig = config([DOWNSTREAM, TOOL]);
    const hooks = new PipelineHookRegistry();
    const downstreamMarker = path.join(
      tree.outputDir,
      RUN_ID,
      "downstream-1.0-output",
      "analysis_complete.json",
    );

    const first = await runScanCycle({ config: cycleConfig, ports, hooks });

    expect(first).toMatchObject({ dispatched: 1, succeeded: 1, skipped: 1 });
    expect(ports.processRunner.calls.map((call) => call.args[3])).toEqual(["org/tool"]);
    expect(fs.existsSync(downstreamMarker)).toBe(false);
    const [skip] = ports.logger
      .ofType("analysis_skipped")
      .filter((event) => event.pipeline_name === "org/downstream");
    expect(skip.reason).toBe("dependencies_incomplete");

    const second = await runScanCycle({ config: cycleConfig, ports, hooks });

    expect(second).toMatchObject({ dispatched: 1, succeeded: 1, skipped: 1 });
    expect(ports.processRunner.calls.map((call) => call.args[3])).toEqual([
      "org/tool",
      "org/downstream",
    ]);
    expect(fs.existsSync(downstreamMarker)).toBe(true);
  });
});
