/*
Purpose: translate SIGINT/SIGTERM into a drain request for the scan loop.
Assumptions: the first signal drains; a second signal exits immediately.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ... stop.cleanup();
*/

// =============================================================================
// TYPES
// =============================================================================

export type StopSignal = "SIGINT" | "SIGTERM";

export type SignalSource = {
  on(event: StopSignal, listener: () => void): unknown;
  off(event: StopSignal, listener: () => void): unknown;
};

export type RunStopSignalHandlerOptions = {
  onSignal?: (signal: StopSignal) => void;
  onForceExit?: (signal: StopSignal) => void;
  source?: SignalSource;
};

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export const FORCED_EXIT_CODE = 130;

const STOP_SIGNALS: readonly StopSignal[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRunStopSignalHandler(
  options: RunStopSignalHandlerOptions = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const source = options.source ?? process;
  const onForceExit = options.onForceExit ?? (() => process.exit(FORCED_EXIT_CODE));

  const listeners = STOP_SIGNALS.map((name) => {
    const listener = (): void => {
      if (controller.signal.aborted) {
        onForceExit(name);
        return;
      }
      controller.abort({ signal: name });
      options.onSignal?.(name);
    };
    source.on(name, listener);
    return { name, listener };
  });

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const { name, listener } of listeners) {
        source.off(name, listener);
      }
    },
    isStopped: () => controller.signal.aborted,
  };
}
