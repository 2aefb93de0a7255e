import { randomBytes } from "node:crypto";
import { AuthenticationFailedError } from "@realtime-relay/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * What is known about an inbound connection when it is established.
 * Header names are lower-case, as Node's HTTP parser delivers them.
 */
export interface ConnectionMetadata {
  readonly headers: Readonly<Record<string, string | readonly string[] | undefined>>;
  readonly remoteAddress?: string;
  readonly url?: string;
}

/**
 * Maps connection metadata to an identity string.
 *
 * Throws (or rejects with) AuthenticationFailedError when no identity can be
 * derived; any other thrown error is treated the same way by the server.
 */
export type Authenticator = (metadata: ConnectionMetadata) => string | Promise<string>;

// ---------------------------------------------------------------------------
// Placeholder
// ---------------------------------------------------------------------------

const BEARER_PREFIX = /^bearer\s+/i;

function firstHeader(value: string | readonly string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  return value?.[0];
}

/**
 * Default authenticator. NOT a security boundary: it verifies nothing.
 *
 * `Authorization: Bearer <token>` yields `<token>` as the identity; any other
 * connection gets a fresh `anonymous-<8 hex>` identity. Deployments must
 * supply a real Authenticator.
 */
export function createPlaceholderAuthenticator(): Authenticator {
  return (metadata) => {
    const authorization = firstHeader(metadata.headers.authorization);
    if (authorization === undefined || !BEARER_PREFIX.test(authorization)) {
      return `anonymous-${randomBytes(4).toString("hex")}`;
    }
    const token = authorization.replace(BEARER_PREFIX, "").trim();
    if (token === "") {
      throw new AuthenticationFailedError("empty bearer token");
    }
    return token;
  };
}
