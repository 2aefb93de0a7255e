/**
 * @realtime-relay/errors
 *
 * Error taxonomy for the realtime relay.
 *
 * Each error carries a `.code` from the catalog. Use `error.code === "XXX"`
 * for fine-grained matching, or `instanceof` for category matching.
 */

export { type ErrorJSON, isRelayError, RelayError } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  AuthenticationFailedError,
  InternalRelayError,
  RateLimitExceededError,
  type RateLimitKind,
  RelayConfigurationError,
  TransportError,
  type TransportSide,
  UpstreamUnreachableError,
} from "./relay.js";

export { getErrorMessage, isValidErrorCode, toError, wrapError } from "./utils.js";

export {
  CLOSE_CODES,
  type CloseCode,
  closeCodeFor,
  encodeErrorPayload,
  type ErrorPayload,
  ErrorPayloadSchema,
  MAX_CLOSE_REASON_BYTES,
  truncateCloseReason,
} from "./wire/websocket.js";
