import type { ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * Serialized shape of a RelayError, safe to log.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly isExpected: boolean;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly timestamp: string;
}

/**
 * Root of the relay error hierarchy.
 *
 * Subclasses pin `code` to a catalog entry; status, domain and
 * expectedness are looked up from the catalog at construction time.
 */
export abstract class RelayError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      isExpected: this.isExpected,
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** Check if a value is a RelayError */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
