import { describe, expect, it, vi } from "vitest";
import { createEmitter } from "../emitter.js";

type Events = {
  tick: [n: number];
  done: [];
};

describe("createEmitter", () => {
  it("calls handlers in registration order with the emitted arguments", () => {
    const emitter = createEmitter<Events>();
    const calls: string[] = [];
    emitter.on("tick", (n) => calls.push(`a${n}`));
    emitter.on("tick", (n) => calls.push(`b${n}`));
    emitter.emit("tick", 1);
    expect(calls).toEqual(["a1", "b1"]);
  });

  it("disposer removes the handler and is idempotent", () => {
    const emitter = createEmitter<Events>();
    const handler = vi.fn();
    const dispose = emitter.on("done", handler);
    dispose();
    dispose();
    emitter.emit("done");
    expect(handler).not.toHaveBeenCalled();
    expect(emitter.count("done")).toBe(0);
  });

  it("keeps running later handlers when one throws", () => {
    const onError = vi.fn();
    const emitter = createEmitter<Events>(onError);
    const boom = new Error("boom");
    const after = vi.fn();
    emitter.on("tick", () => {
      throw boom;
    });
    emitter.on("tick", after);

    emitter.emit("tick", 7);

    expect(after).toHaveBeenCalledWith(7);
    expect(onError).toHaveBeenCalledWith(boom, "tick");
  });

  it("emits over a snapshot: handlers added during emit run next time", () => {
    const emitter = createEmitter<Events>();
    const late = vi.fn();
    emitter.on("done", () => {
      emitter.on("done", late);
    });
    emitter.emit("done");
    expect(late).not.toHaveBeenCalled();
    emitter.emit("done");
    expect(late).toHaveBeenCalledTimes(1);
  });

  it("clear removes handlers for one event or all", () => {
    const emitter = createEmitter<Events>();
    emitter.on("tick", vi.fn());
    emitter.on("done", vi.fn());
    expect(emitter.count()).toBe(2);
    emitter.clear("tick");
    expect(emitter.count()).toBe(1);
    emitter.clear();
    expect(emitter.count()).toBe(0);
  });
});
