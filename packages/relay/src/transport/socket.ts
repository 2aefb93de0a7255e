import { getErrorMessage, toError, TransportError, type TransportSide } from "@realtime-relay/errors";

// ---------------------------------------------------------------------------
// Socket surface
// ---------------------------------------------------------------------------

/**
 * The subset of a `ws` WebSocket the relay depends on, on either side.
 * Injectable for testing.
 */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string | Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  /** Stop reading from the underlying connection; no `message` events until resumed */
  pause(): void;
  resume(): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
  off(event: string, handler: (...args: unknown[]) => void): void;
}

const SOCKET_METHODS = ["send", "ping", "close", "terminate", "pause", "resume", "on", "off"] as const;

/**
 * Whether `value` has the socket surface the relay uses.
 */
export function isRelaySocket(value: unknown): value is RelaySocket {
  if (typeof value !== "object" || value === null) return false;
  if (!("readyState" in value) || typeof value.readyState !== "number") return false;
  return SOCKET_METHODS.every(
    (method) => method in value && typeof Reflect.get(value, method) === "function",
  );
}

// ---------------------------------------------------------------------------
// WS Ready States
// ---------------------------------------------------------------------------

export const WS_CONNECTING = 0;
export const WS_OPEN = 1;
export const WS_CLOSING = 2;
export const WS_CLOSED = 3;

export function isOpen(socket: RelaySocket): boolean {
  return socket.readyState === WS_OPEN;
}

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/**
 * One received unit. Text frames carry application events (JSON);
 * binary frames carry raw audio.
 */
export type RelayFrame =
  | { readonly kind: "text"; readonly payload: string }
  | { readonly kind: "binary"; readonly payload: Buffer };

function toBuffer(data: unknown): Buffer | undefined {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  if (Array.isArray(data)) {
    const parts: Buffer[] = [];
    for (const part of data) {
      if (!Buffer.isBuffer(part)) return undefined;
      parts.push(part);
    }
    return Buffer.concat(parts);
  }
  return undefined;
}

/**
 * Classify the arguments of a `message` event into a frame.
 * Returns undefined for data of an unknown shape.
 */
export function toFrame(data: unknown, isBinary: unknown): RelayFrame | undefined {
  if (isBinary === true) {
    const payload = toBuffer(data);
    return payload ? { kind: "binary", payload } : undefined;
  }
  if (typeof data === "string") {
    return { kind: "text", payload: data };
  }
  const payload = toBuffer(data);
  return payload ? { kind: "text", payload: payload.toString("utf8") } : undefined;
}

export function frameSize(frame: RelayFrame): number {
  return frame.kind === "text" ? Buffer.byteLength(frame.payload, "utf8") : frame.payload.length;
}

// ---------------------------------------------------------------------------
// Sending
// ---------------------------------------------------------------------------

/**
 * Send one frame and resolve once `ws` has handed it to the socket.
 * Rejects with TransportError when the socket is not open or the write fails.
 */
export function sendFrame(socket: RelaySocket, frame: RelayFrame, side: TransportSide): Promise<void> {
  if (!isOpen(socket)) {
    return Promise.reject(
      new TransportError(side, `socket is not open (readyState ${socket.readyState})`),
    );
  }
  return new Promise<void>((resolve, reject) => {
    try {
      socket.send(frame.payload, { binary: frame.kind === "binary" }, (err) => {
        if (err) {
          reject(new TransportError(side, err.message, err));
        } else {
          resolve();
        }
      });
    } catch (error) {
      reject(new TransportError(side, getErrorMessage(error), toError(error)));
    }
  });
}

/**
 * Close a socket without throwing. A socket still in its handshake is
 * terminated. Returns the error a failing close raised, for the caller to log.
 */
export function tryClose(socket: RelaySocket, code: number, reason: string): Error | undefined {
  if (socket.readyState === WS_CLOSED) return undefined;
  try {
    if (socket.readyState === WS_CONNECTING) {
      socket.terminate();
    } else {
      socket.close(code, reason);
    }
    return undefined;
  } catch (error) {
    return toError(error);
  }
}
