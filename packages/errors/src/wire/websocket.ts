/**
 * WebSocket wire helpers
 *
 * Close codes the relay uses and the structured error payload it sends to
 * clients before closing a session.
 */

import { z } from "zod";
import { RelayError } from "../base.js";

// ============================================================================
// CLOSE CODES (RFC 6455 §7.4.1)
// ============================================================================

export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  MESSAGE_TOO_BIG: 1009,
  INTERNAL_ERROR: 1011,
} as const;

export type CloseCode = (typeof CLOSE_CODES)[keyof typeof CLOSE_CODES];

/**
 * Map an error to the close code used when it ends a connection.
 * Admission failures are policy violations; everything else is an
 * internal error from the client's point of view.
 */
export function closeCodeFor(error: unknown): CloseCode {
  if (error instanceof RelayError) {
    switch (error.code) {
      case "RELAY_AUTHENTICATION_FAILED":
      case "RELAY_CONCURRENCY_LIMIT_EXCEEDED":
      case "RELAY_RATE_LIMIT_EXCEEDED":
        return CLOSE_CODES.POLICY_VIOLATION;
      default:
        return CLOSE_CODES.INTERNAL_ERROR;
    }
  }
  return CLOSE_CODES.INTERNAL_ERROR;
}

/**
 * Close reasons are limited to 123 bytes of UTF-8 by the protocol.
 */
export const MAX_CLOSE_REASON_BYTES = 123;

export function truncateCloseReason(reason: string): string {
  if (Buffer.byteLength(reason, "utf8") <= MAX_CLOSE_REASON_BYTES) {
    return reason;
  }
  let out = "";
  for (const char of reason) {
    if (Buffer.byteLength(out + char, "utf8") > MAX_CLOSE_REASON_BYTES) break;
    out += char;
  }
  return out;
}

// ============================================================================
// ERROR PAYLOAD
// ============================================================================

/**
 * Error message sent to a client before its session is closed.
 */
export interface ErrorPayload {
  type: "error";
  error: string;
}

export const ErrorPayloadSchema = z.object({
  type: z.literal("error"),
  error: z.string(),
});

/**
 * Serialize an error payload as the text frame sent to the client.
 */
export function encodeErrorPayload(message: string): string {
  const payload: ErrorPayload = { type: "error", error: message };
  return JSON.stringify(payload);
}
