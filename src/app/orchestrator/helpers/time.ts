/*
Duration conversions used by the scan loop and dispatcher.
Assumes inputs are non-negative durations.
*/

function roundToDecimals(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  return Number(value.toFixed(decimals));
}

export function secondsFromMs(durationMs: number): number {
  return roundToDecimals(durationMs / 1000, 3);
}

export function msFromSeconds(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) return 0;
  return Math.round(seconds * 1000);
}

export function msFromMinutes(minutes: number | undefined): number | undefined {
  if (minutes === undefined) return undefined;
  return msFromSeconds(minutes * 60);
}
