import path from "node:path";

import fse from "fs-extra";

import { DiscoveryError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { logEvent, type EventLogger } from "./logger.js";
import { hasReadyMarker } from "./markers.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstrumentClass = "miseq" | "nextseq" | "gridion" | "unknown";

export type KnownInstrument = Exclude<InstrumentClass, "unknown">;

export type Run = {
  readonly sequencingRunId: string;
  readonly fastqDirectory: string;
  readonly instrumentType: InstrumentClass;
  readonly analysisParameters: Readonly<Record<string, string | null>>;
};

export type DiscoverRunsOptions = {
  logger: EventLogger;
  requireReadyMarker?: boolean;
  reverseOrder?: boolean;
  instrumentPatterns?: Readonly<Record<KnownInstrument, RegExp>>;
};

// =============================================================================
// INSTRUMENT PATTERNS
// =============================================================================

const KNOWN_INSTRUMENTS: readonly KnownInstrument[] = ["miseq", "nextseq", "gridion"];

export const INSTRUMENT_RUN_ID_PATTERNS: Readonly<Record<KnownInstrument, RegExp>> = {
  miseq: /^\d{6}_M\d{5}_\d+_\d{9}-[A-Z0-9]{5}$/,
  nextseq: /^\d{6}_VH\d{5}_\d+_[A-Z0-9]{9}$/,
  gridion: /^\d{8}_\d{4}_X[1-5]_[A-Z0-9]+_[a-z0-9]{8}$/,
};

/** A name is classified only when exactly one instrument pattern matches it. */
export function classifyRunId(
  name: string,
  patterns: Readonly<Record<KnownInstrument, RegExp>> = INSTRUMENT_RUN_ID_PATTERNS,
): InstrumentClass {
  const matches = KNOWN_INSTRUMENTS.filter((instrument) => patterns[instrument].test(name));
  return matches.length === 1 ? matches[0] : "unknown";
}

// =============================================================================
// DISCOVERY
// =============================================================================

/**
 * Yields every ready run directly under `rootDir`. Skipped entries are
 * reported as `directory_skipped` events, never yielded. Each call rescans.
 */
export async function* discoverRuns(
  rootDir: string,
  opts: DiscoverRunsOptions,
): AsyncGenerator<Run, void, undefined> {
  const requireReadyMarker = opts.requireReadyMarker ?? true;
  const patterns = opts.instrumentPatterns ?? INSTRUMENT_RUN_ID_PATTERNS;
  const absoluteRoot = path.resolve(rootDir);

  logEvent(opts.logger, "info", "scan_start", { fastq_by_run_dir: absoluteRoot });

  let names: string[];
  try {
    names = await fse.readdir(absoluteRoot);
  } catch (err) {
    throw new DiscoveryError(
      `Cannot enumerate run directory ${absoluteRoot}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  if (opts.reverseOrder) {
    names = [...names].sort().reverse();
  }

  for (const name of names) {
    const entryPath = path.join(absoluteRoot, name);

    const isDirectory = await isDirectoryEntry(entryPath);
    const instrumentType = classifyRunId(name, patterns);
    const readyToAnalyze = requireReadyMarker
      ? isDirectory && (await hasReadyMarker(entryPath))
      : true;

    if (!isDirectory || instrumentType === "unknown" || !readyToAnalyze) {
      logEvent(opts.logger, "debug", "directory_skipped", {
        fastq_directory: entryPath,
        conditions_checked: {
          is_directory: isDirectory,
          matches_run_id_format: instrumentType !== "unknown",
          ready_to_analyze: readyToAnalyze,
        },
      });
      continue;
    }

    logEvent(opts.logger, "info", "fastq_directory_found", {
      runId: name,
      fastq_directory_path: entryPath,
      instrument_type: instrumentType,
    });

    yield {
      sequencingRunId: name,
      fastqDirectory: entryPath,
      instrumentType,
      analysisParameters: { fastq_input: entryPath },
    };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function isDirectoryEntry(entryPath: string): Promise<boolean> {
  try {
    // stat follows symlinks, so a symlinked run directory counts as a directory
    const stat = await fse.stat(entryPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
