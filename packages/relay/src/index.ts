/**
 * @realtime-relay/relay
 *
 * Bidirectional WebSocket relay between untrusted clients and a credentialed
 * realtime API endpoint.
 */

export {
  type Authenticator,
  type ConnectionMetadata,
  createPlaceholderAuthenticator,
} from "./auth/index.js";
export {
  DEFAULT_RELAY_CONFIG,
  DEFAULT_UPSTREAM_CONFIG,
  loadRelayConfigFromEnv,
  parseRelayConfig,
  type RelayConfig,
  type RelayConfigInput,
  RelayConfigSchema,
  type UpstreamConfig,
  UpstreamConfigSchema,
} from "./config.js";
export { Janitor, type JanitorConfig, type SweepHandler } from "./janitor.js";
export {
  createConsoleLogger,
  LOG_LEVELS,
  type LogLevel,
  type RelayLogger,
  shortId,
  silentLogger,
} from "./logger.js";
export { type PumpOptions, type PumpOutcome, pump } from "./proxy/pump.js";
export {
  ProxySession,
  type ProxySessionOptions,
  type SessionCloseReason,
  type SessionSummary,
  type UpstreamDialer,
} from "./proxy/proxy-session.js";
export {
  type AdmissionDecision,
  CONCURRENCY_EXCEEDED_REASON,
  type ConcurrencySource,
  RATE_EXCEEDED_REASON,
  RateLimiter,
  type RateLimiterConfig,
} from "./rate-limiter.js";
export {
  connectionMetadata,
  RelayServer,
  type RelayServerOptions,
  type SessionClosedHandler,
  type WebSocketServerLike,
  type WsServerFactory,
  type WsServerOptions,
} from "./server.js";
export * from "./sessions/index.js";
export {
  DEFAULT_READ_HIGH_WATER_MARK,
  FrameReader,
  type FrameReaderOptions,
  type ReadResult,
  type ReaderEnd,
} from "./transport/frame-reader.js";
export {
  type DeadPeerHandler,
  LivenessMonitor,
  type LivenessMonitorConfig,
} from "./transport/liveness-monitor.js";
export {
  frameSize,
  isOpen,
  isRelaySocket,
  type RelayFrame,
  type RelaySocket,
  sendFrame,
  toFrame,
  tryClose,
  WS_CLOSED,
  WS_CLOSING,
  WS_CONNECTING,
  WS_OPEN,
} from "./transport/socket.js";
export * from "./upstream/index.js";
export { type Clock, systemClock } from "./utils/clock.js";
export { RELAY_USER_AGENT, RELAY_VERSION } from "./version.js";
