import {
  AuthenticationFailedError,
  CLOSE_CODES,
  closeCodeFor,
  RateLimitExceededError,
  toError,
  truncateCloseReason,
} from "@realtime-relay/errors";
import {
  type Authenticator,
  type ConnectionMetadata,
  createPlaceholderAuthenticator,
} from "./auth/authenticator.js";
import type { RelayConfig } from "./config.js";
import { Janitor } from "./janitor.js";
import { type RelayLogger, shortId, silentLogger } from "./logger.js";
import { ProxySession, type SessionSummary, type UpstreamDialer } from "./proxy/proxy-session.js";
import { RateLimiter } from "./rate-limiter.js";
import { SessionRegistry } from "./sessions/session-registry.js";
import { FrameReader } from "./transport/frame-reader.js";
import { isOpen, isRelaySocket, type RelaySocket, tryClose } from "./transport/socket.js";
import { UpstreamConnector, type WsClientFactory } from "./upstream/upstream-connector.js";
import { type Clock, systemClock } from "./utils/clock.js";
import { createEmitter, type Emitter } from "./utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WebSocketServerLike {
  on(event: string, handler: (...args: unknown[]) => void): void;
  close(cb?: (err?: Error) => void): void;
}

export interface WsServerOptions {
  readonly host: string;
  readonly port: number;
  readonly maxPayload: number;
}

/**
 * Factory for creating the client-facing WebSocket server.
 * Injectable for testing.
 */
export type WsServerFactory = (options: WsServerOptions) => WebSocketServerLike;

export interface RelayServerOptions {
  readonly config: RelayConfig;
  /** Default: the placeholder bearer-or-anonymous authenticator */
  readonly authenticator?: Authenticator;
  readonly serverFactory?: WsServerFactory;
  /** Used to build the default connector */
  readonly upstreamFactory?: WsClientFactory;
  /** Replaces the default UpstreamConnector */
  readonly connector?: UpstreamDialer;
  readonly logger?: RelayLogger;
  readonly clock?: Clock;
}

export type SessionClosedHandler = (summary: SessionSummary) => void;

type RelayServerEvents = {
  sessionClosed: [summary: SessionSummary];
};

// ---------------------------------------------------------------------------
// Connection metadata
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readHeaders(value: unknown): Record<string, string | readonly string[]> {
  const headers: Record<string, string | readonly string[]> = {};
  if (!isRecord(value)) return headers;
  for (const [name, raw] of Object.entries(value)) {
    if (typeof raw === "string") {
      headers[name.toLowerCase()] = raw;
    } else if (Array.isArray(raw) && raw.every((v): v is string => typeof v === "string")) {
      headers[name.toLowerCase()] = raw;
    }
  }
  return headers;
}

/**
 * Extract what an authenticator may look at from the upgrade request.
 */
export function connectionMetadata(req: unknown): ConnectionMetadata {
  if (!isRecord(req)) return { headers: {} };
  const remoteAddress = isRecord(req.socket) ? req.socket.remoteAddress : undefined;
  return {
    headers: readHeaders(req.headers),
    ...(typeof remoteAddress === "string" ? { remoteAddress } : {}),
    ...(typeof req.url === "string" ? { url: req.url } : {}),
  };
}

// ---------------------------------------------------------------------------
// RelayServer
// ---------------------------------------------------------------------------

/**
 * Client-facing WebSocket server. Each accepted connection is
 * authenticated, admitted and handed to its own ProxySession.
 */
export class RelayServer {
  private wss: WebSocketServerLike | undefined;
  private stopping = false;
  private readonly sessions: Map<string, ProxySession> = new Map();
  private readonly connections: Set<Promise<void>> = new Set();
  private readonly events: Emitter<RelayServerEvents> = createEmitter();
  private readonly config: RelayConfig;
  private readonly authenticator: Authenticator;
  private readonly serverFactory: WsServerFactory | undefined;
  private readonly connector: UpstreamDialer;
  private readonly logger: RelayLogger;
  private readonly clock: Clock;
  private readonly limiter: RateLimiter;
  private readonly janitor: Janitor;
  readonly registry: SessionRegistry;

  constructor(options: RelayServerOptions) {
    const { config } = options;
    this.config = config;
    this.authenticator = options.authenticator ?? createPlaceholderAuthenticator();
    this.serverFactory = options.serverFactory;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.connector =
      options.connector ??
      new UpstreamConnector({
        upstream: config.upstream,
        maxPayload: config.maxPayload,
        logger: this.logger,
        ...(options.upstreamFactory ? { factory: options.upstreamFactory } : {}),
      });
    this.registry = new SessionRegistry({ clock: this.clock });
    this.limiter = new RateLimiter(
      config,
      (identity) => this.registry.countFor(identity),
      this.clock,
    );
    this.janitor = new Janitor(this.registry, config, {
      limiter: this.limiter,
      logger: this.logger,
    });
  }

  /**
   * Open the WebSocket server and start the janitor.
   */
  async start(): Promise<void> {
    if (this.wss) return;
    this.stopping = false;
    const options: WsServerOptions = {
      host: this.config.host,
      port: this.config.port,
      maxPayload: this.config.maxPayload,
    };

    if (this.serverFactory) {
      this.wss = this.serverFactory(options);
    } else {
      const { WebSocketServer } = await import("ws");
      const wss = new WebSocketServer(options) as unknown as WebSocketServerLike;
      await new Promise<void>((resolve, reject) => {
        let settled = false;
        wss.on("listening", () => {
          if (settled) return;
          settled = true;
          resolve();
        });
        wss.on("error", (err: unknown) => {
          if (settled) return;
          settled = true;
          reject(toError(err));
        });
      });
      this.wss = wss;
    }

    this.wss.on("connection", (ws: unknown, req: unknown) => {
      if (!isRelaySocket(ws)) {
        this.logger.error("Ignoring connection without a usable socket");
        return;
      }
      this.handleConnection(ws, connectionMetadata(req));
    });
    this.wss.on("error", (err: unknown) => {
      this.logger.error(`Server error: ${toError(err).message}`);
    });

    this.janitor.start();
    this.logger.info(`Listening on ${this.config.host}:${this.config.port}`);
  }

  /**
   * Stop accepting, close every session with 1001 and wait for their
   * teardown, then close the server.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.janitor.stop();
    for (const session of this.sessions.values()) {
      session.close("shutdown");
    }
    await Promise.all([...this.connections]);

    const wss = this.wss;
    this.wss = undefined;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.logger.info("Server stopped");
  }

  /**
   * Register a handler called with the summary of every finished session.
   * Returns a disposer function.
   */
  onSessionClosed(handler: SessionClosedHandler): () => void {
    return this.events.on("sessionClosed", handler);
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  /** Run one janitor sweep now. */
  sweepStaleSessions(): readonly string[] {
    return this.janitor.sweep();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleConnection(ws: RelaySocket, metadata: ConnectionMetadata): void {
    // Attached first so frames sent during auth and the upstream handshake are kept
    const reader = new FrameReader(ws, "client", {
      highWaterMark: this.config.readBufferHighWaterMark,
    });
    const task = this.serveConnection(ws, reader, metadata).catch((error: unknown) => {
      this.logger.error(`Connection handling failed: ${toError(error).message}`);
      reader.dispose();
      this.reject(ws, CLOSE_CODES.INTERNAL_ERROR, "Internal error");
    });
    this.connections.add(task);
    void task.finally(() => this.connections.delete(task));
  }

  private async serveConnection(
    ws: RelaySocket,
    reader: FrameReader,
    metadata: ConnectionMetadata,
  ): Promise<void> {
    let identity: string;
    try {
      identity = await this.authenticator(metadata);
    } catch (error) {
      const failure =
        error instanceof AuthenticationFailedError
          ? error
          : new AuthenticationFailedError(undefined, toError(error));
      this.logger.warn(
        `Rejected connection from ${metadata.remoteAddress ?? "unknown"}: ${failure.message}`,
      );
      reader.dispose();
      this.reject(ws, closeCodeFor(failure), "Authentication failed");
      return;
    }

    if (this.stopping) {
      reader.dispose();
      this.reject(ws, CLOSE_CODES.GOING_AWAY, "Server shutting down");
      return;
    }
    if (!isOpen(ws)) {
      reader.dispose();
      this.reject(ws, CLOSE_CODES.NORMAL, "Session ended");
      return;
    }

    // Admission and creation happen in one synchronous turn
    const decision = this.limiter.admit(identity);
    if (!decision.allowed) {
      const failure = new RateLimitExceededError(identity, decision.limit, decision.reason);
      this.logger.warn(`Rejected ${identity}: ${decision.reason}`);
      reader.dispose();
      this.reject(ws, closeCodeFor(failure), truncateCloseReason(decision.reason));
      return;
    }
    const session = this.registry.create(identity, ws);

    const proxy = new ProxySession({
      session,
      clientReader: reader,
      connector: this.connector,
      registry: this.registry,
      liveness: this.config,
      cancelGraceMs: this.config.cancelGraceMs,
      readHighWaterMark: this.config.readBufferHighWaterMark,
      logger: this.logger,
      clock: this.clock,
    });
    this.sessions.set(session.id, proxy);
    this.logger.info(`Session ${shortId(session.id)} created for ${identity}`);

    try {
      const summary = await proxy.run();
      this.events.emit("sessionClosed", summary);
    } finally {
      this.sessions.delete(session.id);
    }
  }

  private reject(ws: RelaySocket, code: number, reason: string): void {
    ws.on("error", (err: unknown) => {
      this.logger.debug(`Rejected client error: ${toError(err).message}`);
    });
    const failure = tryClose(ws, code, reason);
    if (failure) {
      this.logger.warn(`Closing rejected client failed: ${failure.message}`);
    }
  }
}
