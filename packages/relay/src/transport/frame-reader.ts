import { TransportError, type TransportSide, toError } from "@realtime-relay/errors";
import { FifoQueue } from "../utils/fifo-queue.js";
import { frameSize, type RelayFrame, type RelaySocket, toFrame } from "./socket.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Why a reader stopped producing frames. */
export type ReaderEnd =
  | { readonly kind: "closed"; readonly code: number; readonly reason: string }
  | { readonly kind: "failed"; readonly error: TransportError }
  | { readonly kind: "cancelled" };

export type ReadResult =
  | { readonly done: false; readonly frame: RelayFrame }
  | { readonly done: true; readonly end: ReaderEnd };

export interface FrameReaderOptions {
  /** Unread bytes at which the socket is paused (default: 4 MiB) */
  readonly highWaterMark?: number;
}

export const DEFAULT_READ_HIGH_WATER_MARK = 4 * 1024 * 1024;

// ---------------------------------------------------------------------------
// FrameReader
// ---------------------------------------------------------------------------

/**
 * Buffers the frames a socket receives and hands them out one `read()` at a
 * time, in arrival order.
 *
 * Attach it as soon as the socket exists: frames that arrive before anyone
 * reads (during authentication or the upstream handshake) are kept.
 * Frames received before the socket closed are still returned after the
 * close; only then does `read()` report the end.
 *
 * Once the unread frames reach `highWaterMark` bytes the socket is paused,
 * and it is resumed when `read()` brings them back under the mark.
 */
export class FrameReader {
  private readonly queue = new FifoQueue<RelayFrame>();
  private readonly socket: RelaySocket;
  private readonly side: TransportSide;
  private readonly highWaterMark: number;
  private bufferedBytes = 0;
  private paused = false;
  private end: ReaderEnd | undefined;
  private waiter: ((result: ReadResult) => void) | undefined;
  private disposed = false;
  private received = 0;

  private readonly onMessage = (data: unknown, isBinary: unknown): void => {
    const frame = toFrame(data, isBinary);
    if (!frame) return;
    this.received++;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = undefined;
      deliver({ done: false, frame });
      return;
    }
    this.queue.enqueue(frame);
    this.bufferedBytes += frameSize(frame);
    if (!this.paused && this.bufferedBytes >= this.highWaterMark) {
      this.paused = true;
      this.socket.pause();
    }
  };

  private readonly onClose = (code: unknown, reason: unknown): void => {
    this.finish({
      kind: "closed",
      code: typeof code === "number" ? code : 1005,
      reason: reason === undefined ? "" : String(reason),
    });
  };

  private readonly onError = (err: unknown): void => {
    const error = toError(err);
    this.finish({ kind: "failed", error: new TransportError(this.side, error.message, error) });
  };

  constructor(socket: RelaySocket, side: TransportSide, options: FrameReaderOptions = {}) {
    this.socket = socket;
    this.side = side;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_READ_HIGH_WATER_MARK;
    socket.on("message", this.onMessage);
    socket.on("close", this.onClose);
    socket.on("error", this.onError);
  }

  /**
   * Resolve with the next frame, or with the end once the queue is empty
   * and the socket has closed or failed. Aborting `signal` ends a pending
   * read with `cancelled`; frames already queued are still returned first.
   */
  read(signal?: AbortSignal): Promise<ReadResult> {
    const frame = this.queue.dequeue();
    if (frame !== undefined) {
      this.bufferedBytes -= frameSize(frame);
      this.resumeBelowMark();
      return Promise.resolve({ done: false, frame });
    }
    if (this.end) {
      return Promise.resolve({ done: true, end: this.end });
    }
    if (signal?.aborted) {
      return Promise.resolve({ done: true, end: { kind: "cancelled" } });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Concurrent read on ${this.side} frame reader`));
    }

    return new Promise<ReadResult>((resolve) => {
      const onAbort = (): void => {
        this.waiter = undefined;
        resolve({ done: true, end: { kind: "cancelled" } });
      };
      this.waiter = (result) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Frames received and not yet read. */
  get buffered(): number {
    return this.queue.size;
  }

  /** Payload bytes of the frames received and not yet read. */
  get bufferedByteCount(): number {
    return this.bufferedBytes;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Frames received over the reader's lifetime. */
  get receivedCount(): number {
    return this.received;
  }

  get ended(): ReaderEnd | undefined {
    return this.end;
  }

  /**
   * Detach from the socket. Pending frames are dropped and a paused socket
   * is resumed so its close handshake can complete.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.socket.off("message", this.onMessage);
    this.socket.off("close", this.onClose);
    this.socket.off("error", this.onError);
    this.queue.drain();
    this.bufferedBytes = 0;
    this.resumeBelowMark();
    this.finish({ kind: "cancelled" });
  }

  private resumeBelowMark(): void {
    if (this.paused && this.bufferedBytes < this.highWaterMark) {
      this.paused = false;
      this.socket.resume();
    }
  }

  private finish(end: ReaderEnd): void {
    if (this.end) return;
    this.end = end;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = undefined;
      deliver({ done: true, end });
    }
  }
}
