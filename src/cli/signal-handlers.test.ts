import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import { createRunStopSignalHandler, type SignalSource, type StopSignal } from "./signal-handlers.js";

class FakeSignalSource implements SignalSource {
  private readonly emitter = new EventEmitter();

  on(event: StopSignal, listener: () => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off(event: StopSignal, listener: () => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit(event: StopSignal): void {
    this.emitter.emit(event);
  }

  listenerCount(event: StopSignal): number {
    return this.emitter.listenerCount(event);
  }
}

describe("createRunStopSignalHandler", () => {
  it("aborts with the signal name on the first signal", () => {
    const source = new FakeSignalSource();
    const onSignal = vi.fn();
    const onForceExit = vi.fn();
    const handler = createRunStopSignalHandler({ source, onSignal, onForceExit });

    expect(handler.isStopped()).toBe(false);
    source.emit("SIGTERM");

    expect(handler.isStopped()).toBe(true);
    expect(handler.signal.reason).toEqual({ signal: "SIGTERM" });
    expect(onSignal).toHaveBeenCalledWith("SIGTERM");
    expect(onForceExit).not.toHaveBeenCalled();
  });

  it("forces an exit on the second signal", () => {
    const source = new FakeSignalSource();
    const onSignal = vi.fn();
    const onForceExit = vi.fn();
    createRunStopSignalHandler({ source, onSignal, onForceExit });

    source.emit("SIGINT");
    source.emit("SIGINT");

    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onForceExit).toHaveBeenCalledWith("SIGINT");
  });

  it("removes its listeners on cleanup", () => {
    const source = new FakeSignalSource();
    const handler = createRunStopSignalHandler({ source, onForceExit: vi.fn() });

    expect(source.listenerCount("SIGINT")).toBe(1);
    expect(source.listenerCount("SIGTERM")).toBe(1);

    handler.cleanup();
    source.emit("SIGTERM");

    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
    expect(handler.isStopped()).toBe(false);
  });
});
