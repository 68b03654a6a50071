/*
Purpose: turn arbitrary thrown values into ordered, labelled lines for CLI and log output.
Assumptions: UserFacingError carries its own title/hint; DispatchError subclasses map to codes.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import {
  ConfigError,
  DiscoveryError,
  DispatchError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: resolveTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (mode === "short") {
    return lines;
  }

  lines.push({ kind: "code", text: resolveErrorCode(error) });
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    const cause = error instanceof DispatchError || error instanceof UserFacingError
      ? error.cause
      : undefined;
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function resolveErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof DiscoveryError) return USER_FACING_ERROR_CODES.discovery;
  if (error instanceof DispatchError) return USER_FACING_ERROR_CODES.dispatch;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Configuration invalid.";
  if (error instanceof DiscoveryError) return "Run discovery failed.";
  if (error instanceof DispatchError) return "Pipeline dispatch failed.";
  return "Unexpected error.";
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function resolveColorEnabled(args: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!args.stream.isTTY) return false;
  if (args.useColor !== undefined) return args.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
