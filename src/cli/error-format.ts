/*
Purpose: turn the error that ended a seqrun-dispatch command into stderr text and a process exit code.
Assumptions: color only on a TTY; commander usage errors carry their own exit code.
Usage: console.error(renderCliError(err, { debug })); process.exitCode = resolveExitCode(err);
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  resolveErrorCode,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import { UserFacingError, type UserFacingErrorCode } from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// Process exit status per error code. Usage errors keep commander's own (1).
export const EXIT_CODES: Record<UserFacingErrorCode, number> = {
  UNKNOWN_ERROR: 1,
  CONFIG_ERROR: 2,
  DISCOVERY_ERROR: 3,
  DISPATCH_ERROR: 4,
};

const DEBUG_HINT = "Rerun with --debug for the error code, cause and stack.";
const USAGE_HINT = "Run `seqrun-dispatch --help` for usage.";

type LineStyle = { label?: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  return EXIT_CODES[resolveErrorCode(error)];
}

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return buildLines(error, options.debug === true)
    .map((line) => renderLine(line, format))
    .join("\n");
}

function buildLines(error: unknown, debug: boolean): ErrorFormatLine[] {
  // commander already phrases its messages as "error: ..."; keep only the detail.
  if (error instanceof CommanderError) {
    return [
      { kind: "title", text: "Invalid command line." },
      { kind: "message", text: error.message.replace(/^error:\s*/, "") },
      { kind: "hint", text: USAGE_HINT },
    ];
  }

  const lines = formatErrorLines(error, { mode: debug ? "debug" : "short" });
  if (debug) {
    return lines.map((line): ErrorFormatLine =>
      line.kind === "code" ? { kind: "code", text: `${line.text} (exit ${resolveExitCode(error)})` } : line,
    );
  }
  if (!(error instanceof UserFacingError)) {
    lines.push({ kind: "hint", text: DEBUG_HINT });
  }
  return lines;
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const { label, labelStyles, textStyles } = LINE_STYLES[line.kind];
  if (label === undefined) return line.text;

  if (line.kind === "stack") {
    const body = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format(label, labelStyles)}\n${format(body, textStyles)}`;
  }
  return `${format(label, labelStyles)} ${format(line.text, textStyles)}`;
}
