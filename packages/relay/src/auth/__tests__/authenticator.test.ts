import { AuthenticationFailedError } from "@realtime-relay/errors";
import { describe, expect, it } from "vitest";
import { createPlaceholderAuthenticator } from "../authenticator.js";

describe("createPlaceholderAuthenticator", () => {
  const authenticate = createPlaceholderAuthenticator();

  it("uses the bearer token as the identity", () => {
    expect(authenticate({ headers: { authorization: "Bearer user-123" } })).toBe("user-123");
  });

  it("trims the token and accepts any casing of the scheme", () => {
    expect(authenticate({ headers: { authorization: "bearer   user-123  " } })).toBe("user-123");
  });

  it("uses the first value of a repeated header", () => {
    expect(authenticate({ headers: { authorization: ["Bearer first", "Bearer second"] } })).toBe(
      "first",
    );
  });

  it("rejects an empty bearer token", () => {
    expect(() => authenticate({ headers: { authorization: "Bearer    " } })).toThrow(
      AuthenticationFailedError,
    );
  });

  it("synthesizes an anonymous identity without a bearer credential", () => {
    const identity = authenticate({ headers: {} });
    expect(identity).toMatch(/^anonymous-[0-9a-f]{8}$/);
  });

  it("treats other schemes as anonymous", () => {
    expect(authenticate({ headers: { authorization: "Basic dGVzdDp0ZXN0" } })).toMatch(
      /^anonymous-[0-9a-f]{8}$/,
    );
  });

  it("gives each anonymous connection its own identity", () => {
    expect(authenticate({ headers: {} })).not.toBe(authenticate({ headers: {} }));
  });
});
