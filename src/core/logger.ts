import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogEvent = JsonObject & {
  ts: string;
  level: LogLevel;
  type: string;
  sequencing_run_id?: string;
  pipeline_name?: string;
};

export type LogEventInput = JsonObject & {
  type: string;
  level?: LogLevel;
  runId?: string;
  pipelineName?: string;
  ts?: string;
};

export type EventDefaults = {
  runId?: string;
  pipelineName?: string;
};

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

export type LineWriter = {
  write(chunk: string): unknown;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly minLevel: LogLevel = "debug",
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    if (!isLevelEnabled(normalized.level, this.minLevel)) return;
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err));
    }
  }
}

export class StreamLogger implements EventLogger {
  constructor(
    private readonly stream: LineWriter = process.stderr,
    private readonly minLevel: LogLevel = "info",
    private readonly defaults: EventDefaults = {},
  ) {}

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    if (!isLevelEnabled(normalized.level, this.minLevel)) return;
    this.stream.write(`${JSON.stringify(normalized)}\n`);
  }

  close(): void {
    // The stream is owned by the caller.
  }
}

export class FanOutLogger implements EventLogger {
  constructor(private readonly sinks: EventLogger[]) {}

  log(event: LogEventInput): void {
    for (const sink of this.sinks) {
      sink.log(event);
    }
  }

  close(): void {
    for (const sink of this.sinks) {
      sink.close();
    }
  }
}

export function createEventLogger(opts: {
  level?: LogLevel;
  logFile?: string;
  stream?: LineWriter;
}): EventLogger {
  const level = opts.level ?? "info";
  const sinks: EventLogger[] = [new StreamLogger(opts.stream ?? process.stderr, level)];
  if (opts.logFile) {
    sinks.push(new JsonlLogger(path.resolve(opts.logFile), level));
  }
  return sinks.length === 1 ? sinks[0] : new FanOutLogger(sinks);
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId, pipelineName, ts, type, level, ...rest } = event;

  const normalizedTs = typeof ts === "string" ? ts : isoNow();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    level: level ?? "info",
    type,
  };

  const resolvedRunId = runId ?? defaults.runId;
  if (resolvedRunId) {
    result.sequencing_run_id = resolvedRunId;
  }
  const resolvedPipelineName = pipelineName ?? defaults.pipelineName;
  if (resolvedPipelineName) {
    result.pipeline_name = resolvedPipelineName;
  }

  return result;
}

export function logEvent(
  logger: EventLogger,
  level: LogLevel,
  type: string,
  fields: JsonObject & { runId?: string; pipelineName?: string } = {},
): void {
  const { runId, pipelineName, ...rest } = fields;
  const event: LogEventInput = { ...rest, type, level };

  if (runId !== undefined) event.runId = runId;
  if (pipelineName !== undefined) event.pipelineName = pipelineName;

  logger.log(event);
}

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!process.argv.includes("--debug")) {
    return message;
  }

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
