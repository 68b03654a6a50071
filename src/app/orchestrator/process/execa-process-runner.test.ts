import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ExecaProcessRunner } from "./execa-process-runner.js";

let cwd: string;

beforeEach(() => {
  cwd = fs.mkdtempSync(path.join(os.tmpdir(), "execa-runner-"));
});

afterEach(() => {
  fs.rmSync(cwd, { recursive: true, force: true });
});

describe("ExecaProcessRunner", () => {
  const runner = new ExecaProcessRunner();

  it("runs in the given directory and captures interleaved output", async () => {
    const result = await runner.run({
      command: process.execPath,
      args: ["-e", "console.log(process.cwd()); console.error('warned')"],
      cwd,
    });

    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.output.split("\n")).toEqual([fs.realpathSync(cwd), "warned"]);
  });

  it("reports a non-zero exit code without throwing", async () => {
    const result = await runner.run({
      command: process.execPath,
      args: ["-e", "process.exit(3)"],
      cwd,
    });

    expect(result).toEqual({ exitCode: 3, output: "", timedOut: false });
  });

  it("marks an invocation that outlives its timeout", async () => {
    const result = await runner.run({
      command: process.execPath,
      args: ["-e", "setTimeout(() => undefined, 10000)"],
      cwd,
      timeoutMs: 200,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
  });

  it("resolves a missing program to exit code -1", async () => {
    const result = await runner.run({
      command: path.join(cwd, "no-such-program"),
      args: [],
      cwd,
    });

    expect(result.exitCode).toBe(-1);
    expect(result.timedOut).toBe(false);
    expect(result.output).toContain("ENOENT");
  });
});
