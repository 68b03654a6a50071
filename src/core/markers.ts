import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { READY_MARKER_FILENAME } from "./paths.js";
import { writeJsonFileAtomic } from "./utils.js";

export const CompletionMarkerSchema = z.object({
  timestamp_analysis_start: z.string().datetime({ offset: true }),
  timestamp_analysis_complete: z.string().datetime({ offset: true }),
});

export type CompletionMarker = z.infer<typeof CompletionMarkerSchema>;

export async function writeCompletionMarker(
  markerPath: string,
  timestamps: { startedAt: Date; completedAt: Date },
): Promise<CompletionMarker> {
  const marker: CompletionMarker = {
    timestamp_analysis_start: timestamps.startedAt.toISOString(),
    timestamp_analysis_complete: timestamps.completedAt.toISOString(),
  };
  await writeJsonFileAtomic(markerPath, marker);
  return marker;
}

/** Returns null when the marker is absent or does not parse as a completion marker. */
export async function readCompletionMarker(markerPath: string): Promise<CompletionMarker | null> {
  if (!(await fse.pathExists(markerPath))) return null;

  let raw: unknown;
  try {
    raw = await fse.readJson(markerPath);
  } catch {
    return null;
  }

  const parsed = CompletionMarkerSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export async function completionMarkerExists(markerPath: string): Promise<boolean> {
  return fse.pathExists(markerPath);
}

export async function hasReadyMarker(runDir: string): Promise<boolean> {
  return fse.pathExists(path.join(runDir, READY_MARKER_FILENAME));
}
