import { describe, expect, it } from "vitest";
import {
  AuthenticationFailedError,
  CLOSE_CODES,
  closeCodeFor,
  encodeErrorPayload,
  ErrorPayloadSchema,
  RateLimitExceededError,
  truncateCloseReason,
  UpstreamUnreachableError,
} from "../../index.js";

describe("closeCodeFor", () => {
  it("uses policy violation for admission failures", () => {
    expect(closeCodeFor(new AuthenticationFailedError())).toBe(1008);
    expect(closeCodeFor(new RateLimitExceededError("u", "rate", "rate limit exceeded"))).toBe(1008);
  });

  it("uses internal error for everything else", () => {
    expect(closeCodeFor(new UpstreamUnreachableError(503))).toBe(CLOSE_CODES.INTERNAL_ERROR);
    expect(closeCodeFor(new Error("x"))).toBe(1011);
  });
});

describe("encodeErrorPayload", () => {
  it("produces the client error frame", () => {
    expect(encodeErrorPayload("Failed to connect to upstream: 401")).toBe(
      '{"type":"error","error":"Failed to connect to upstream: 401"}',
    );
  });

  it("round-trips through the schema", () => {
    const parsed = ErrorPayloadSchema.parse(JSON.parse(encodeErrorPayload("boom")));
    expect(parsed).toEqual({ type: "error", error: "boom" });
  });
});

describe("truncateCloseReason", () => {
  it("keeps short reasons", () => {
    expect(truncateCloseReason("rate limit exceeded")).toBe("rate limit exceeded");
  });

  it("cuts long reasons to 123 bytes", () => {
    expect(truncateCloseReason("a".repeat(200))).toBe("a".repeat(123));
  });

  it("never splits a multi-byte character", () => {
    // "é" is 2 bytes: 61 of them fit in 122 bytes, the 62nd would exceed 123
    expect(truncateCloseReason("é".repeat(100))).toBe("é".repeat(61));
  });
});
