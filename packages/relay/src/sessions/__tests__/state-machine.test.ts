import { describe, expect, it } from "vitest";
import { transition } from "../state-machine.js";
import { SESSION_EVENTS, SESSION_STATES, SESSION_TRANSITIONS } from "../types.js";

describe("session state machine", () => {
  it("follows the happy path to closed", () => {
    let state = transition("admitted", "connect_upstream").state;
    expect(state).toBe("upstream_connecting");
    state = transition(state, "upstream_ready").state;
    expect(state).toBe("streaming");
    state = transition(state, "pump_ended").state;
    expect(state).toBe("closing");
    state = transition(state, "teardown_complete").state;
    expect(state).toBe("closed");
  });

  it("goes straight to closing when the upstream connect fails", () => {
    expect(transition("upstream_connecting", "upstream_failed")).toEqual({
      valid: true,
      state: "closing",
      previousState: "upstream_connecting",
      event: "upstream_failed",
    });
  });

  it("accepts force_close from every state before closing", () => {
    expect(transition("admitted", "force_close").state).toBe("closing");
    expect(transition("upstream_connecting", "force_close").state).toBe("closing");
    expect(transition("streaming", "force_close").state).toBe("closing");
  });

  it("reports invalid transitions without changing state", () => {
    expect(transition("streaming", "upstream_ready")).toEqual({
      valid: false,
      state: "streaming",
      previousState: "streaming",
      event: "upstream_ready",
    });
    expect(transition("closing", "force_close").valid).toBe(false);
  });

  it("has no way out of closed", () => {
    for (const event of SESSION_EVENTS) {
      expect(transition("closed", event).valid).toBe(false);
    }
  });

  it("covers every state and event in the table", () => {
    for (const state of SESSION_STATES) {
      expect(Object.keys(SESSION_TRANSITIONS[state]).sort()).toEqual([...SESSION_EVENTS].sort());
    }
  });
});
