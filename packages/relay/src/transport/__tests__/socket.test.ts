import { TransportError } from "@realtime-relay/errors";
import { describe, expect, it } from "vitest";
import { createMockSocket } from "../../__tests__/helpers.js";
import {
  frameSize,
  isRelaySocket,
  sendFrame,
  toFrame,
  tryClose,
  WS_CLOSED,
  WS_CONNECTING,
} from "../socket.js";

describe("toFrame", () => {
  it("decodes a non-binary Buffer as UTF-8 text", () => {
    expect(toFrame(Buffer.from('{"type":"ping"}'), false)).toEqual({
      kind: "text",
      payload: '{"type":"ping"}',
    });
  });

  it("keeps binary data as a Buffer", () => {
    const frame = toFrame(Buffer.from([1, 2, 3]), true);
    expect(frame?.kind).toBe("binary");
    expect(frame?.payload).toEqual(Buffer.from([1, 2, 3]));
  });

  it("joins fragmented binary data", () => {
    const frame = toFrame([Buffer.from([1]), Buffer.from([2, 3])], true);
    expect(frame?.payload).toEqual(Buffer.from([1, 2, 3]));
  });

  it("accepts an ArrayBuffer", () => {
    const frame = toFrame(new Uint8Array([9, 8]).buffer, true);
    expect(frame?.payload).toEqual(Buffer.from([9, 8]));
  });

  it("accepts a string as text", () => {
    expect(toFrame("hello", false)).toEqual({ kind: "text", payload: "hello" });
  });

  it("returns undefined for data of an unknown shape", () => {
    expect(toFrame(42, false)).toBeUndefined();
    expect(toFrame([Buffer.from([1]), "x"], true)).toBeUndefined();
  });
});

describe("frameSize", () => {
  it("counts UTF-8 bytes for text and length for binary", () => {
    expect(frameSize({ kind: "text", payload: "é" })).toBe(2);
    expect(frameSize({ kind: "binary", payload: Buffer.alloc(5) })).toBe(5);
  });
});

describe("sendFrame", () => {
  it("sends text frames with binary: false", async () => {
    const socket = createMockSocket();
    await sendFrame(socket, { kind: "text", payload: "hi" }, "client");
    expect(socket.sent).toEqual([{ data: "hi", binary: false }]);
  });

  it("sends binary frames with binary: true", async () => {
    const socket = createMockSocket();
    await sendFrame(socket, { kind: "binary", payload: Buffer.from([7]) }, "upstream");
    expect(socket.sent).toEqual([{ data: Buffer.from([7]), binary: true }]);
  });

  it("rejects with TransportError when the socket is not open", async () => {
    const socket = createMockSocket(WS_CLOSED);
    await expect(sendFrame(socket, { kind: "text", payload: "hi" }, "client")).rejects.toThrow(
      "client transport failed: socket is not open (readyState 3)",
    );
    expect(socket.send).not.toHaveBeenCalled();
  });

  it("rejects with TransportError when the write fails", async () => {
    const socket = createMockSocket();
    socket.failSends("broken pipe");
    const result = sendFrame(socket, { kind: "text", payload: "hi" }, "upstream");
    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toThrow("upstream transport failed: broken pipe");
  });

  it("rejects when send throws", async () => {
    const socket = createMockSocket();
    socket.send.mockImplementation(() => {
      throw new Error("boom");
    });
    await expect(sendFrame(socket, { kind: "text", payload: "hi" }, "client")).rejects.toThrow(
      "client transport failed: boom",
    );
  });
});

describe("tryClose", () => {
  it("closes an open socket with the code and reason", () => {
    const socket = createMockSocket();
    expect(tryClose(socket, 1000, "Session ended")).toBeUndefined();
    expect(socket.close).toHaveBeenCalledWith(1000, "Session ended");
  });

  it("terminates a socket still in its handshake", () => {
    const socket = createMockSocket(WS_CONNECTING);
    tryClose(socket, 1000, "Session ended");
    expect(socket.terminate).toHaveBeenCalledTimes(1);
    expect(socket.close).not.toHaveBeenCalled();
  });

  it("does nothing for a closed socket", () => {
    const socket = createMockSocket(WS_CLOSED);
    tryClose(socket, 1000, "Session ended");
    expect(socket.close).not.toHaveBeenCalled();
  });

  it("returns the error instead of throwing", () => {
    const socket = createMockSocket();
    socket.close.mockImplementation(() => {
      throw new Error("invalid close code");
    });
    expect(tryClose(socket, 1000, "x")?.message).toBe("invalid close code");
  });
});

describe("isRelaySocket", () => {
  it("accepts a socket-shaped object", () => {
    expect(isRelaySocket(createMockSocket())).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isRelaySocket(undefined)).toBe(false);
    expect(isRelaySocket({ readyState: 1, send: () => {} })).toBe(false);
  });
});
