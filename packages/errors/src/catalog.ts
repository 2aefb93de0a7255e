/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the relay maps to an HTTP-equivalent status,
 * a domain, and the base behavioral type it belongs to.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

export type BaseErrorType =
  | "PermissionError"
  | "RateLimitError"
  | "ExternalError"
  | "ValidationError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // RELAY ERRORS - Admission, upstream and transport failures
  // ============================================================================
  RELAY_AUTHENTICATION_FAILED: {
    domain: "relay",
    httpStatus: 401,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Authentication failed",
    description: "The inbound connection could not be mapped to an identity",
  },
  RELAY_CONCURRENCY_LIMIT_EXCEEDED: {
    domain: "relay",
    httpStatus: 429,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Too many concurrent connections",
    description: "The identity already holds the maximum number of open sessions",
  },
  RELAY_RATE_LIMIT_EXCEEDED: {
    domain: "relay",
    httpStatus: 429,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Rate limit exceeded",
    description: "The identity exceeded the allowed connection requests per window",
  },
  RELAY_UPSTREAM_UNREACHABLE: {
    domain: "relay",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Upstream unreachable",
    description: "The upstream realtime handshake did not complete",
  },
  RELAY_TRANSPORT_FAILED: {
    domain: "relay",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Transport failure",
    description: "A send or receive failed on an established connection",
  },
  RELAY_CONFIGURATION_INVALID: {
    domain: "relay",
    httpStatus: 500,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid relay configuration",
    description: "Required configuration is missing or malformed",
  },
} as const satisfies Record<
  string,
  {
    readonly domain: string;
    readonly httpStatus: number;
    readonly baseType: BaseErrorType;
    readonly isExpected: boolean;
    readonly title: string;
    readonly description: string;
  }
>;

export type ErrorCode = keyof typeof ERROR_CATALOG;

export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];
