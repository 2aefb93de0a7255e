/**
 * Relay errors: admission, upstream and transport failures
 *
 * Concrete:
 *   - AuthenticationFailedError (RELAY_AUTHENTICATION_FAILED)
 *   - RateLimitExceededError (RELAY_CONCURRENCY_LIMIT_EXCEEDED | RELAY_RATE_LIMIT_EXCEEDED)
 *   - UpstreamUnreachableError (RELAY_UPSTREAM_UNREACHABLE)
 *   - TransportError (RELAY_TRANSPORT_FAILED)
 *   - RelayConfigurationError (RELAY_CONFIGURATION_INVALID)
 *   - InternalRelayError (INTERNAL_ERROR)
 */

import { RelayError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

/**
 * Thrown by an authenticator when connection metadata cannot be mapped
 * to an identity. The connection is rejected before any session exists.
 */
export class AuthenticationFailedError extends RelayError {
  readonly _tag = "PermissionError" as const;
  readonly code = "RELAY_AUTHENTICATION_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(detail?: string, cause?: Error) {
    super(
      detail ? `Authentication failed: ${detail}` : "Authentication failed",
      undefined,
      undefined,
      ...(cause ? [{ cause }] : []),
    );
    const entry = ERROR_CATALOG.RELAY_AUTHENTICATION_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------

export type RateLimitKind = "concurrency" | "rate";

const RATE_LIMIT_CODES = {
  concurrency: "RELAY_CONCURRENCY_LIMIT_EXCEEDED",
  rate: "RELAY_RATE_LIMIT_EXCEEDED",
} as const;

/**
 * Admission was refused for an identity. `limit` tells the concurrent-session
 * cap apart from the request-rate cap; the message is the client-facing reason.
 */
export class RateLimitExceededError extends RelayError {
  readonly _tag = "RateLimitError" as const;
  readonly code: (typeof RATE_LIMIT_CODES)[RateLimitKind];
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly identity: string;
  readonly limit: RateLimitKind;

  constructor(identity: string, limit: RateLimitKind, reason: string) {
    super(reason, { identity, limit });
    this.code = RATE_LIMIT_CODES[limit];
    const entry = ERROR_CATALOG[this.code];
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.identity = identity;
    this.limit = limit;
  }
}

// ---------------------------------------------------------------------------
// Upstream
// ---------------------------------------------------------------------------

/**
 * The upstream handshake did not complete. `statusCode` carries the HTTP
 * status the upstream answered the upgrade with, when there was one.
 */
export class UpstreamUnreachableError extends RelayError {
  readonly _tag = "ExternalError" as const;
  readonly code = "RELAY_UPSTREAM_UNREACHABLE" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly statusCode: number | undefined;

  constructor(statusCode?: number, cause?: Error) {
    super(
      `Failed to connect to upstream: ${statusCode ?? cause?.message ?? "unknown error"}`,
      statusCode !== undefined ? { statusCode: String(statusCode) } : undefined,
      undefined,
      ...(cause ? [{ cause }] : []),
    );
    const entry = ERROR_CATALOG.RELAY_UPSTREAM_UNREACHABLE;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.statusCode = statusCode;
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export type TransportSide = "client" | "upstream";

/**
 * A send or receive failed on an established connection. Ends the session
 * through the normal closing path; never escalated past the session.
 */
export class TransportError extends RelayError {
  readonly _tag = "ExternalError" as const;
  readonly code = "RELAY_TRANSPORT_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly side: TransportSide;

  constructor(side: TransportSide, detail: string, cause?: Error) {
    super(`${side} transport failed: ${detail}`, { side }, undefined, ...(cause ? [{ cause }] : []));
    const entry = ERROR_CATALOG.RELAY_TRANSPORT_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.side = side;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Startup configuration is missing or invalid. Fatal to the process.
 */
export class RelayConfigurationError extends RelayError {
  readonly _tag = "ValidationError" as const;
  readonly code = "RELAY_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid relay configuration: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.RELAY_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

export class InternalRelayError extends RelayError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string, metadata?: Record<string, string>, cause?: Error) {
    super(message, metadata, undefined, ...(cause ? [{ cause }] : []));
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
