/*
Pure helpers for describing why the scan loop was asked to stop.
Assumes callers only need string representations for logs and summaries.
*/

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object") {
    if ("signal" in reason && typeof reason.signal === "string") return reason.signal;
    if ("type" in reason && typeof reason.type === "string") return reason.type;
  }

  return String(reason);
}
