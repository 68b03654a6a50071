/**
 * ExecaProcessRunner executes an external pipeline and waits for it to exit.
 * Purpose: turn every outcome (exit code, timeout, spawn failure) into a result value.
 * Assumptions: callers decide success purely from exitCode.
 * Usage: new ExecaProcessRunner().run({ command, args, cwd })
 */

import { execa } from "execa";

import { formatErrorMessage } from "../../../core/error-format.js";
import type { ProcessRunInput, ProcessRunner, ProcessRunResult } from "../ports.js";

export class ExecaProcessRunner implements ProcessRunner {
  async run(input: ProcessRunInput): Promise<ProcessRunResult> {
    try {
      const res = await execa(input.command, input.args, {
        cwd: input.cwd,
        all: true,
        reject: false,
        stdin: "ignore",
        env: process.env,
        ...(input.timeoutMs !== undefined ? { timeout: input.timeoutMs } : {}),
      });

      const output = typeof res.all === "string" ? res.all : "";
      const spawnFailure = res.exitCode === undefined;
      return {
        exitCode: res.exitCode ?? -1,
        output: spawnFailure && output.length === 0 ? res.message : output,
        timedOut: res.timedOut,
      };
    } catch (err) {
      return { exitCode: -1, output: formatErrorMessage(err), timedOut: false };
    }
  }
}
