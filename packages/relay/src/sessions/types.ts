import type { RelaySocket } from "../transport/socket.js";

// ---------------------------------------------------------------------------
// Session State Machine
// ---------------------------------------------------------------------------

export const SESSION_STATES = [
  "admitted",
  "upstream_connecting",
  "streaming",
  "closing",
  "closed",
] as const;
export type SessionState = (typeof SESSION_STATES)[number];

export const SESSION_EVENTS = [
  "connect_upstream",
  "upstream_ready",
  "upstream_failed",
  "pump_ended",
  "force_close",
  "teardown_complete",
] as const;
export type SessionEvent = (typeof SESSION_EVENTS)[number];

/**
 * Transition table: SESSION_TRANSITIONS[state][event] is the next state,
 * or null when the event is not valid in that state.
 */
export const SESSION_TRANSITIONS: Readonly<
  Record<SessionState, Readonly<Record<SessionEvent, SessionState | null>>>
> = {
  admitted: {
    connect_upstream: "upstream_connecting",
    upstream_ready: null,
    upstream_failed: null,
    pump_ended: null,
    force_close: "closing",
    teardown_complete: null,
  },
  upstream_connecting: {
    connect_upstream: null,
    upstream_ready: "streaming",
    upstream_failed: "closing",
    pump_ended: null,
    force_close: "closing",
    teardown_complete: null,
  },
  streaming: {
    connect_upstream: null,
    upstream_ready: null,
    upstream_failed: null,
    pump_ended: "closing",
    force_close: "closing",
    teardown_complete: null,
  },
  closing: {
    connect_upstream: null,
    upstream_ready: null,
    upstream_failed: null,
    pump_ended: null,
    force_close: null,
    teardown_complete: "closed",
  },
  closed: {
    connect_upstream: null,
    upstream_ready: null,
    upstream_failed: null,
    pump_ended: null,
    force_close: null,
    teardown_complete: null,
  },
};

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

/**
 * Why a session was asked to close from outside its own pumps.
 */
export type ForcedCloseReason = "stale" | "shutdown";

/**
 * One active client↔upstream pairing.
 *
 * The session exclusively owns both handles once they are attached. The
 * mutable fields are written only by the ProxySession that runs it.
 */
export interface Session {
  readonly id: string;
  readonly identity: string;
  /** Epoch ms, immutable */
  readonly createdAt: number;
  /** Aborting forces the session into closing; the reason is a ForcedCloseReason */
  readonly lifetime: AbortController;
  state: SessionState;
  clientHandle: RelaySocket | undefined;
  /** Undefined until the upstream handshake succeeds */
  upstreamHandle: RelaySocket | undefined;
  /** Text frames forwarded client → upstream */
  messageCount: number;
}

