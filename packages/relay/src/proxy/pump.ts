import { getErrorMessage, toError, TransportError, type TransportSide } from "@realtime-relay/errors";
import type { FrameReader, ReadResult } from "../transport/frame-reader.js";
import { type RelayFrame, type RelaySocket, sendFrame } from "../transport/socket.js";

/** How one direction of a session stopped. */
export type PumpOutcome =
  | { readonly kind: "source_closed"; readonly code: number; readonly reason: string }
  | { readonly kind: "source_failed"; readonly error: TransportError }
  | { readonly kind: "sink_failed"; readonly error: TransportError }
  | { readonly kind: "cancelled" };

export interface PumpOptions {
  readonly source: FrameReader;
  readonly sink: RelaySocket;
  readonly sinkSide: TransportSide;
  readonly signal: AbortSignal;
  /** Called after each frame has been handed to the sink */
  readonly onForwarded?: (frame: RelayFrame) => void;
}

/**
 * Forward frames from `source` to `sink` one at a time, in order, until the
 * source ends, a send fails, or `signal` aborts. Frames the source had
 * already received when the abort came are still forwarded.
 *
 * Never rejects: every way of stopping is reported as a PumpOutcome.
 */
export async function pump(options: PumpOptions): Promise<PumpOutcome> {
  const { source, sink, sinkSide, signal, onForwarded } = options;

  for (;;) {
    let result: ReadResult;
    try {
      result = await source.read(signal);
    } catch (error) {
      const side: TransportSide = sinkSide === "upstream" ? "client" : "upstream";
      return {
        kind: "source_failed",
        error: new TransportError(side, getErrorMessage(error), toError(error)),
      };
    }

    if (!result.done) {
      try {
        await sendFrame(sink, result.frame, sinkSide);
      } catch (error) {
        const failure =
          error instanceof TransportError
            ? error
            : new TransportError(sinkSide, getErrorMessage(error), toError(error));
        return { kind: "sink_failed", error: failure };
      }
      onForwarded?.(result.frame);
      continue;
    }

    const { end } = result;
    switch (end.kind) {
      case "closed":
        return { kind: "source_closed", code: end.code, reason: end.reason };
      case "failed":
        return { kind: "source_failed", error: end.error };
      case "cancelled":
        return { kind: "cancelled" };
    }
  }
}
