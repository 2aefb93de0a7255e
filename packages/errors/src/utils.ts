import { RelayError } from "./base.js";
import { ERROR_CATALOG, type ErrorCode } from "./catalog.js";
import { InternalRelayError } from "./relay.js";

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Wrap an unknown error into a RelayError.
 * If the error is already a RelayError, return it as-is.
 * Otherwise, wrap it in an InternalRelayError.
 */
export function wrapError(error: unknown): RelayError {
  if (error instanceof RelayError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalRelayError(error.message, { originalName: error.name }, error);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalRelayError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Normalize a thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
