/**
 * Shared test helpers for @realtime-relay/relay tests.
 *
 * Mock sockets and a mock server that behave like `ws` closely enough for
 * the relay: listeners by event name, `send` callbacks, and `close` events.
 */

import { type Mock, vi } from "vitest";
import { parseRelayConfig, type RelayConfig, type RelayConfigInput } from "../config.js";
import type { RelayLogger } from "../logger.js";
import type { WebSocketServerLike } from "../server.js";
import { type RelaySocket, WS_CLOSED, WS_CONNECTING, WS_OPEN } from "../transport/socket.js";

// ---------------------------------------------------------------------------
// Config fixture
// ---------------------------------------------------------------------------

export function createTestConfig(overrides: Partial<RelayConfigInput> = {}): RelayConfig {
  return parseRelayConfig({
    port: 0,
    upstream: {
      endpoint: "https://realtime.example.test",
      apiKey: "test-key",
    },
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// Mock socket
// ---------------------------------------------------------------------------

export interface SentFrame {
  readonly data: string | Buffer;
  readonly binary: boolean;
}

export interface MockSocket extends RelaySocket {
  readyState: number;
  readonly send: Mock<RelaySocket["send"]>;
  readonly ping: Mock<RelaySocket["ping"]>;
  readonly close: Mock<RelaySocket["close"]>;
  readonly terminate: Mock<RelaySocket["terminate"]>;
  readonly pause: Mock<RelaySocket["pause"]>;
  readonly resume: Mock<RelaySocket["resume"]>;
  readonly sent: SentFrame[];
  /** Payloads of sent text frames, in order */
  sentText(): string[];
  emit(event: string, ...args: unknown[]): void;
  listenerCount(event: string): number;
  /** Deliver a frame as `ws` does: a Buffer plus the isBinary flag */
  receive(data: string | Buffer): void;
  /** The peer closed the connection */
  remoteClose(code?: number, reason?: string): void;
  /** CONNECTING → OPEN, emitting `open` */
  open(): void;
  /** Hold send callbacks until `releaseSends()` */
  holdSends(): void;
  releaseSends(): void;
  /** Make every later send fail through its callback */
  failSends(message: string): void;
}

export function createMockSocket(readyState: number = WS_OPEN): MockSocket {
  const handlers = new Map<string, ((...args: unknown[]) => void)[]>();
  const sent: SentFrame[] = [];
  const held: ((err?: Error) => void)[] = [];
  let holding = false;
  let sendError: Error | undefined;

  const emit = (event: string, ...args: unknown[]): void => {
    for (const handler of [...(handlers.get(event) ?? [])]) {
      handler(...args);
    }
  };

  const socket: MockSocket = {
    readyState,
    sent,
    send: vi.fn((data: string | Buffer, options: { binary: boolean }, cb: (err?: Error) => void) => {
      sent.push({ data, binary: options.binary });
      if (holding) {
        held.push(cb);
        return;
      }
      cb(sendError);
    }),
    ping: vi.fn<RelaySocket["ping"]>(),
    close: vi.fn((code?: number, reason?: string) => {
      if (socket.readyState === WS_CLOSED) return;
      socket.readyState = WS_CLOSED;
      emit("close", code ?? 1005, Buffer.from(reason ?? ""));
    }),
    terminate: vi.fn(() => {
      if (socket.readyState === WS_CLOSED) return;
      socket.readyState = WS_CLOSED;
      emit("close", 1006, Buffer.alloc(0));
    }),
    pause: vi.fn<RelaySocket["pause"]>(),
    resume: vi.fn<RelaySocket["resume"]>(),
    on(event, handler) {
      handlers.set(event, [...(handlers.get(event) ?? []), handler]);
    },
    off(event, handler) {
      handlers.set(
        event,
        (handlers.get(event) ?? []).filter((h) => h !== handler),
      );
    },
    sentText() {
      return sent.flatMap((frame) =>
        !frame.binary && typeof frame.data === "string" ? [frame.data] : [],
      );
    },
    emit,
    listenerCount(event) {
      return handlers.get(event)?.length ?? 0;
    },
    receive(data) {
      if (typeof data === "string") {
        emit("message", Buffer.from(data, "utf8"), false);
      } else {
        emit("message", data, true);
      }
    },
    remoteClose(code = 1000, reason = "") {
      if (socket.readyState === WS_CLOSED) return;
      socket.readyState = WS_CLOSED;
      emit("close", code, Buffer.from(reason));
    },
    open() {
      socket.readyState = WS_OPEN;
      emit("open");
    },
    holdSends() {
      holding = true;
    },
    releaseSends() {
      holding = false;
      for (const cb of held.splice(0)) {
        cb(sendError);
      }
    },
    failSends(message) {
      sendError = new Error(message);
    },
  };
  return socket;
}

export function createConnectingSocket(): MockSocket {
  return createMockSocket(WS_CONNECTING);
}

// ---------------------------------------------------------------------------
// Mock WebSocket Server
// ---------------------------------------------------------------------------

export interface MockWss extends WebSocketServerLike {
  readonly close: Mock<WebSocketServerLike["close"]>;
  simulateConnection(ws: unknown, req?: unknown): void;
  /** Open a client connection with the given request headers */
  connect(headers?: Record<string, string>): MockSocket;
}

export function createMockWss(): MockWss {
  const handlers = new Map<string, ((...args: unknown[]) => void)[]>();
  const wss: MockWss = {
    on(event, handler) {
      handlers.set(event, [...(handlers.get(event) ?? []), handler]);
    },
    close: vi.fn((cb?: (err?: Error) => void) => {
      cb?.();
    }),
    simulateConnection(ws, req = { headers: {} }) {
      for (const handler of handlers.get("connection") ?? []) {
        handler(ws, req);
      }
    },
    connect(headers = {}) {
      const ws = createMockSocket();
      wss.simulateConnection(ws, {
        headers,
        url: "/realtime",
        socket: { remoteAddress: "127.0.0.1" },
      });
      return ws;
    },
  };
  return wss;
}

// ---------------------------------------------------------------------------
// Logger & scheduling
// ---------------------------------------------------------------------------

export interface RecordingLogger extends RelayLogger {
  readonly lines: { level: string; message: string }[];
  messages(level?: string): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: { level: string; message: string }[] = [];
  const record = (level: string) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    messages(level) {
      return lines.filter((l) => level === undefined || l.level === level).map((l) => l.message);
    },
  };
}

/**
 * Let pending promise continuations run. Does not advance timers.
 */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
