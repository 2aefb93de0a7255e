import {
  CLOSE_CODES,
  encodeErrorPayload,
  type TransportSide,
  toError,
  UpstreamUnreachableError,
} from "@realtime-relay/errors";
import { type RelayLogger, shortId, silentLogger } from "../logger.js";
import type { SessionRegistry } from "../sessions/session-registry.js";
import { transition } from "../sessions/state-machine.js";
import type { ForcedCloseReason, Session, SessionEvent } from "../sessions/types.js";
import { FrameReader } from "../transport/frame-reader.js";
import { LivenessMonitor, type LivenessMonitorConfig } from "../transport/liveness-monitor.js";
import { isOpen, type RelaySocket, sendFrame, tryClose } from "../transport/socket.js";
import { type Clock, systemClock } from "../utils/clock.js";
import { type PumpOutcome, pump } from "./pump.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The part of UpstreamConnector a session needs.
 */
export interface UpstreamDialer {
  connect(signal?: AbortSignal): Promise<RelaySocket>;
}

export type SessionCloseReason =
  | "client_closed"
  | "upstream_closed"
  | "upstream_unreachable"
  | "transport_error"
  | "liveness_timeout"
  | "stale"
  | "shutdown";

export interface SessionSummary {
  readonly id: string;
  readonly identity: string;
  /** Text frames forwarded client → upstream */
  readonly messageCount: number;
  readonly durationMs: number;
  readonly closeReason: SessionCloseReason;
}

export interface ProxySessionOptions {
  readonly session: Session;
  /** Attached to the client socket when the connection was accepted */
  readonly clientReader: FrameReader;
  readonly connector: UpstreamDialer;
  readonly registry: SessionRegistry;
  readonly liveness: LivenessMonitorConfig;
  /** How long teardown waits for a cancelled pump (default: 5000) */
  readonly cancelGraceMs?: number;
  /** Unread upstream bytes at which the upstream socket is paused */
  readonly readHighWaterMark?: number;
  readonly logger?: RelayLogger;
  readonly clock?: Clock;
}

const DEFAULT_CANCEL_GRACE_MS = 5_000;

interface ClosePlan {
  readonly reason: SessionCloseReason;
  readonly code: number;
  readonly text: string;
  /** Error message for the client, if it should get one */
  readonly clientError?: string;
}

const FORCED_CLOSES: Readonly<Record<ForcedCloseReason, ClosePlan>> = {
  stale: { reason: "stale", code: CLOSE_CODES.GOING_AWAY, text: "Session expired" },
  shutdown: { reason: "shutdown", code: CLOSE_CODES.GOING_AWAY, text: "Server shutting down" },
};

function forcedReasonOf(signal: AbortSignal): ForcedCloseReason | undefined {
  if (!signal.aborted) return undefined;
  return signal.reason === "stale" ? "stale" : "shutdown";
}

type Direction = "client_to_upstream" | "upstream_to_client";

// ---------------------------------------------------------------------------
// ProxySession
// ---------------------------------------------------------------------------

/**
 * Drives one session from admission to removal: opens the upstream
 * connection, runs one pump per direction, and tears everything down
 * exactly once when either side stops.
 *
 * Aborting `session.lifetime` (janitor, shutdown) forces the session
 * through the same teardown.
 */
export class ProxySession {
  private readonly session: Session;
  private readonly client: RelaySocket;
  private readonly clientReader: FrameReader;
  private readonly connector: UpstreamDialer;
  private readonly registry: SessionRegistry;
  private readonly liveness: LivenessMonitorConfig;
  private readonly cancelGraceMs: number;
  private readonly readHighWaterMark: number | undefined;
  private readonly logger: RelayLogger;
  private readonly clock: Clock;
  private readonly monitors: LivenessMonitor[] = [];
  private upstreamReader: FrameReader | undefined;
  private deadPeer: TransportSide | undefined;
  private running: Promise<SessionSummary> | undefined;
  private summary: SessionSummary | undefined;

  constructor(options: ProxySessionOptions) {
    const { session } = options;
    if (!session.clientHandle) {
      throw new Error(`Session ${shortId(session.id)} has no client handle`);
    }
    this.session = session;
    this.client = session.clientHandle;
    this.clientReader = options.clientReader;
    this.connector = options.connector;
    this.registry = options.registry;
    this.liveness = options.liveness;
    this.cancelGraceMs = options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
    this.readHighWaterMark = options.readHighWaterMark;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Run the session to completion. Calling again returns the same promise.
   * Never rejects.
   */
  run(): Promise<SessionSummary> {
    this.running ??= this.execute();
    return this.running;
  }

  /**
   * Force the session to close. No-op once it is already closing.
   */
  close(reason: ForcedCloseReason): void {
    this.session.lifetime.abort(reason);
  }

  get id(): string {
    return this.session.id;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  private async execute(): Promise<SessionSummary> {
    const { session } = this;
    const { signal } = session.lifetime;

    this.apply("connect_upstream");
    this.startLivenessMonitor(this.client, "client");

    const forced = forcedReasonOf(signal);
    if (forced) {
      this.apply("force_close");
      return this.teardown(FORCED_CLOSES[forced]);
    }

    let upstream: RelaySocket;
    const dial = new AbortController();
    const abortDial = (): void => dial.abort();
    // Frames the client sent before leaving are still owed to the upstream
    const onClientClose = (): void => {
      if (this.clientReader.buffered === 0) dial.abort();
    };
    signal.addEventListener("abort", abortDial, { once: true });
    this.client.on("close", onClientClose);
    try {
      upstream = await this.connector.connect(dial.signal);
    } catch (error) {
      const forcedDuringDial = forcedReasonOf(signal);
      if (forcedDuringDial) {
        this.apply("force_close");
        return this.teardown(FORCED_CLOSES[forcedDuringDial]);
      }
      if (dial.signal.aborted) {
        this.apply("force_close");
        return this.teardown({
          reason: "client_closed",
          code: CLOSE_CODES.NORMAL,
          text: "Session ended",
        });
      }
      const failure =
        error instanceof UpstreamUnreachableError
          ? error
          : new UpstreamUnreachableError(undefined, toError(error));
      this.logger.error(`Session ${shortId(session.id)}: ${failure.message}`);
      this.apply("upstream_failed");
      return this.teardown({
        reason: "upstream_unreachable",
        code: CLOSE_CODES.INTERNAL_ERROR,
        text: "Upstream unavailable",
        clientError: failure.message,
      });
    } finally {
      signal.removeEventListener("abort", abortDial);
      this.client.off("close", onClientClose);
    }

    session.upstreamHandle = upstream;
    this.upstreamReader = new FrameReader(upstream, "upstream", {
      highWaterMark: this.readHighWaterMark,
    });
    this.startLivenessMonitor(upstream, "upstream");
    this.apply("upstream_ready");
    this.logger.info(`Session ${shortId(session.id)} streaming for ${session.identity}`);

    const plan = await this.stream(upstream, this.upstreamReader);
    this.apply("pump_ended");
    return this.teardown(plan);
  }

  /**
   * Run both pumps until one stops, cancel the other, and wait for it
   * within the grace period.
   */
  private async stream(upstream: RelaySocket, upstreamReader: FrameReader): Promise<ClosePlan> {
    const { session } = this;
    const cancel = new AbortController();
    const onLifetimeAbort = (): void => cancel.abort();
    if (session.lifetime.signal.aborted) {
      cancel.abort();
    } else {
      session.lifetime.signal.addEventListener("abort", onLifetimeAbort, { once: true });
    }

    const run = (direction: Direction, task: Promise<PumpOutcome>) =>
      task.then((outcome) => {
        cancel.abort();
        return { direction, outcome };
      });

    const clientToUpstream = run(
      "client_to_upstream",
      pump({
        source: this.clientReader,
        sink: upstream,
        sinkSide: "upstream",
        signal: cancel.signal,
        onForwarded: (frame) => {
          if (frame.kind === "text") session.messageCount++;
        },
      }),
    );
    const upstreamToClient = run(
      "upstream_to_client",
      pump({
        source: upstreamReader,
        sink: this.client,
        sinkSide: "client",
        signal: cancel.signal,
      }),
    );

    const first = await Promise.race([clientToUpstream, upstreamToClient]);
    session.lifetime.signal.removeEventListener("abort", onLifetimeAbort);

    const drained = await this.within(
      Promise.all([clientToUpstream, upstreamToClient]),
      this.cancelGraceMs,
    );
    if (!drained) {
      this.logger.warn(
        `Session ${shortId(session.id)}: pumps did not stop within ${this.cancelGraceMs}ms, terminating`,
      );
      this.client.terminate();
      upstream.terminate();
    }

    return this.planFor(first.direction, first.outcome);
  }

  private planFor(direction: Direction, outcome: PumpOutcome): ClosePlan {
    const forced = forcedReasonOf(this.session.lifetime.signal);
    if (forced) return FORCED_CLOSES[forced];

    if (this.deadPeer) {
      return {
        reason: "liveness_timeout",
        code: CLOSE_CODES.INTERNAL_ERROR,
        text: "Connection lost",
        clientError: `${this.deadPeer} connection timed out`,
      };
    }

    switch (outcome.kind) {
      case "source_closed":
        return {
          reason: direction === "client_to_upstream" ? "client_closed" : "upstream_closed",
          code: CLOSE_CODES.NORMAL,
          text: "Session ended",
        };
      case "source_failed":
      case "sink_failed":
        this.logger.warn(`Session ${shortId(this.session.id)}: ${outcome.error.message}`);
        return {
          reason: "transport_error",
          code: CLOSE_CODES.INTERNAL_ERROR,
          text: "Relay error",
          clientError: outcome.error.message,
        };
      case "cancelled":
        return { reason: "shutdown", code: CLOSE_CODES.GOING_AWAY, text: "Server shutting down" };
    }
  }

  /**
   * Release everything the session holds. Runs once; later calls return
   * the first summary.
   */
  private teardown(plan: ClosePlan): SessionSummary {
    if (this.summary) return this.summary;
    const { session } = this;

    for (const monitor of this.monitors) monitor.stop();

    if (plan.clientError !== undefined) {
      this.sendErrorToClient(plan.clientError);
    }

    this.clientReader.dispose();
    this.upstreamReader?.dispose();
    this.release(this.client, "client", plan);
    if (session.upstreamHandle) {
      this.release(session.upstreamHandle, "upstream", plan);
    }

    this.registry.destroy(session.id);
    this.apply("teardown_complete");

    this.summary = {
      id: session.id,
      identity: session.identity,
      messageCount: session.messageCount,
      durationMs: this.clock.now() - session.createdAt,
      closeReason: plan.reason,
    };
    this.logger.info(`Session ${shortId(session.id)} stats: ${session.messageCount} messages`);
    return this.summary;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private apply(event: SessionEvent): boolean {
    const result = transition(this.session.state, event);
    if (!result.valid) {
      this.logger.warn(
        `Session ${shortId(this.session.id)}: ignored '${event}' in state '${result.state}'`,
      );
      return false;
    }
    this.session.state = result.state;
    return true;
  }

  private startLivenessMonitor(socket: RelaySocket, side: TransportSide): void {
    const monitor = new LivenessMonitor(socket, this.liveness, (cause) => {
      this.deadPeer ??= side;
      this.logger.warn(`Session ${shortId(this.session.id)}: ${side} ${cause}`);
    });
    monitor.start();
    this.monitors.push(monitor);
  }

  private sendErrorToClient(message: string): void {
    if (!isOpen(this.client)) return;
    sendFrame(this.client, { kind: "text", payload: encodeErrorPayload(message) }, "client").catch(
      (error: unknown) => {
        this.logger.debug(
          `Session ${shortId(this.session.id)}: error payload not delivered: ${toError(error).message}`,
        );
      },
    );
  }

  private release(socket: RelaySocket, side: TransportSide, plan: ClosePlan): void {
    // Listeners are detached, so late socket errors need a sink
    socket.on("error", (err: unknown) => {
      this.logger.debug(
        `Session ${shortId(this.session.id)}: ${side} error after close: ${toError(err).message}`,
      );
    });
    const failure = tryClose(socket, plan.code, plan.text);
    if (failure) {
      this.logger.warn(
        `Session ${shortId(this.session.id)}: closing ${side} failed: ${failure.message}`,
      );
    }
  }

  private async within(task: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([task.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
