import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { main } from "../index.js";

import { parseEventLine } from "./helpers/memory-stream.js";
import { createTempRunTree, type TempRunTree } from "./helpers/temp-run-tree.js";

const RUN_ID = "220101_M00001_0001_000000000-AAAAA";
const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

describe("acceptance: CLI watch --once", () => {
  let tree: TempRunTree;
  let invocationsPath: string;
  let programPath: string;

  beforeEach(async () => {
    tree = await createTempRunTree();
    invocationsPath = path.join(tree.root, "invocations.txt");
    programPath = path.join(tree.root, "fake-nextflow.sh");
    // Stands in for the pipeline runner: records its arguments and exits cleanly.
    await fs.writeFile(
      programPath,
      `#!/bin/sh\nprintf '%s\\n' "$@" >> '${invocationsPath}'\nexit 0\n`,
      { mode: 0o755 },
    );
    process.exitCode = 0;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = 0;
    await tree.cleanup();
  });

  it("dispatches a ready run through the configured program and exits", async () => {
    const runDir = await tree.addRun(RUN_ID);
    const configPath = await tree.writeConfig({
      executor: { program: programPath, cache_dir: path.join(tree.root, "envs") },
      pipelines: [
        {
          pipeline_name: "org/tool",
          pipeline_version: "1.0.0",
          pipeline_parameters: { fastq_input: null },
        },
      ],
    });
    const logFile = path.join(tree.root, "events.jsonl");

    await main([
      "node",
      "seqrun-dispatch",
      "watch",
      "--config",
      configPath,
      "--once",
      "--log-file",
      logFile,
    ]);

    expect(process.exitCode).toBe(0);

    const args = (await fs.readFile(invocationsPath, "utf8")).trim().split("\n");
    expect(args.slice(2, 6)).toEqual(["run", "org/tool", "-r", "1.0.0"]);
    expect(args[args.indexOf("--fastq_input") + 1]).toBe(runDir);

    const markerPath = path.join(tree.outputDir, RUN_ID, "tool-1.0-output", "analysis_complete.json");
    await expect(fs.stat(markerPath)).resolves.toBeTruthy();
    await expect(fs.readdir(tree.workDir)).resolves.toEqual([]);

    const types = (await fs.readFile(logFile, "utf8"))
      .trim()
      .split("\n")
      .map((line) => parseEventLine(line).type);
    expect(types).toContain("analysis_complete");
    expect(types[types.length - 1]).toBe("scan_loop_stopped");
  });

  it("reports an invalid config with the config exit code", async () => {
    const configPath = await tree.writeConfig({ pipelines: "nope" });
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });

    await main(["node", "seqrun-dispatch", "watch", "--config", configPath, "--once"]);

    expect(process.exitCode).toBe(2);
    expect(errors).toHaveLength(1);
    const firstLine = errors[0].split("\n")[0].replace(ANSI_ESCAPE, "");
    expect(firstLine).toBe("Error: Config invalid.");
  });

  it("adds the error code and exit status when --debug is given", async () => {
    const configPath = await tree.writeConfig({ pipelines: "nope" });
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });

    await main(["node", "seqrun-dispatch", "--debug", "watch", "--config", configPath, "--once"]);

    expect(process.exitCode).toBe(2);
    const lines = errors[0].replace(ANSI_ESCAPE, "").split("\n");
    expect(lines).toContain("Code: CONFIG_ERROR (exit 2)");
    expect(lines).toContain("Name: UserFacingError");
  });

  it("rejects a missing --config as a usage error", async () => {
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });

    await main(["node", "seqrun-dispatch", "watch", "--once"]);

    expect(process.exitCode).toBe(1);
    expect(errors[0].replace(ANSI_ESCAPE, "").split("\n")).toEqual([
      "Error: Invalid command line.",
      "required option '--config <path>' not specified",
      "Hint: Run `seqrun-dispatch --help` for usage.",
    ]);
  });
});
