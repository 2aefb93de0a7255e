import { isOpen, type RelaySocket } from "./socket.js";

export interface LivenessMonitorConfig {
  /** Interval between pings in ms */
  readonly pingIntervalMs: number;
  /** How long to wait for the matching pong before the peer is declared dead */
  readonly pingTimeoutMs: number;
}

export type DeadPeerHandler = (cause: "pong_timeout" | "ping_failed") => void;

/**
 * Ping/pong idle-liveness checks for one socket.
 *
 * Every interval a ping goes out; if no pong arrives within the timeout the
 * socket is terminated. Termination makes the socket emit `close`, so the
 * owning session tears down through its usual path.
 */
export class LivenessMonitor {
  private readonly socket: RelaySocket;
  private readonly config: LivenessMonitorConfig;
  private readonly onDead: DeadPeerHandler | undefined;
  private interval: ReturnType<typeof setInterval> | undefined;
  private pongTimer: ReturnType<typeof setTimeout> | undefined;

  private readonly onPong = (): void => {
    if (this.pongTimer !== undefined) {
      clearTimeout(this.pongTimer);
      this.pongTimer = undefined;
    }
  };

  constructor(socket: RelaySocket, config: LivenessMonitorConfig, onDead?: DeadPeerHandler) {
    this.socket = socket;
    this.config = config;
    this.onDead = onDead;
  }

  start(): void {
    if (this.interval !== undefined) return;
    this.socket.on("pong", this.onPong);
    this.interval = setInterval(() => this.check(), this.config.pingIntervalMs);
  }

  stop(): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
      this.socket.off("pong", this.onPong);
    }
    this.onPong();
  }

  get isRunning(): boolean {
    return this.interval !== undefined;
  }

  /** Whether a ping is out and its pong has not arrived yet. */
  get awaitingPong(): boolean {
    return this.pongTimer !== undefined;
  }

  private check(): void {
    if (this.pongTimer !== undefined || !isOpen(this.socket)) return;
    try {
      this.socket.ping();
    } catch {
      this.declareDead("ping_failed");
      return;
    }
    this.pongTimer = setTimeout(() => {
      this.pongTimer = undefined;
      this.declareDead("pong_timeout");
    }, this.config.pingTimeoutMs);
  }

  private declareDead(cause: "pong_timeout" | "ping_failed"): void {
    this.stop();
    this.onDead?.(cause);
    this.socket.terminate();
  }
}
