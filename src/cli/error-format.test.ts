import { CommanderError, InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import {
  ConfigError,
  DiscoveryError,
  DispatchError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { renderCliError, resolveExitCode } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: "fastq_by_run_dir: Required",
    hint: "Fix the config file and rerun `seqrun-dispatch validate-config`.",
    next: "Edit config.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config invalid.",
        "fastq_by_run_dir: Required",
        "Hint: Fix the config file and rerun `seqrun-dispatch validate-config`.",
        "Next: Edit config.yaml",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.dispatch,
      title: "Dispatch failed",
      message: "Pipeline exited early",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: Pipeline exited early\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Dispatch failed",
        "Pipeline exited early",
        "Code: DISPATCH_ERROR (exit 4)",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: Pipeline exited early",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("titles a fatal discovery error", () => {
    const error = new DiscoveryError("Cannot enumerate run directory /data/runs: ENOENT");

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Run discovery failed.",
        "Cannot enumerate run directory /data/runs: ENOENT",
        "Hint: Rerun with --debug for the error code, cause and stack.",
      ].join("\n"),
    );
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream, useColor: true });

    expect(output.split("\n")[0]).toBe("Error: Config invalid.");
  });

  it("renders commander usage errors without the debug hint", () => {
    const error = new CommanderError(
      1,
      "commander.missingMandatoryOptionValue",
      "error: required option '--config <path>' not specified",
    );

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Invalid command line.",
        "required option '--config <path>' not specified",
        "Hint: Run `seqrun-dispatch --help` for usage.",
      ].join("\n"),
    );
  });
});

describe("resolveExitCode", () => {
  it("gives each error code its own exit status", () => {
    expect(resolveExitCode(buildUserFacingError())).toBe(2);
    expect(resolveExitCode(new ConfigError("bad"))).toBe(2);
    expect(resolveExitCode(new DiscoveryError("gone"))).toBe(3);
    expect(resolveExitCode(new DispatchError("failed"))).toBe(4);
    expect(resolveExitCode(new Error("surprise"))).toBe(1);
    expect(resolveExitCode("not an error")).toBe(1);
  });

  it("maps a user-facing error by its code rather than its class", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.discovery,
      title: "Run root missing.",
      message: "/data/runs does not exist",
    });

    expect(resolveExitCode(error)).toBe(3);
  });

  it("keeps the exit code commander assigned to a usage error", () => {
    expect(resolveExitCode(new InvalidArgumentError("Expected one of debug, info, warn, error."))).toBe(1);
    expect(resolveExitCode(new CommanderError(0, "commander.version", "0.1.0"))).toBe(0);
  });
});
