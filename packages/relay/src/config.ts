import { RelayConfigurationError } from "@realtime-relay/errors";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RELAY_CONFIG = {
  host: "0.0.0.0",
  port: 8001,
  maxPayload: 10 * 1024 * 1024,
  pingIntervalMs: 20_000,
  pingTimeoutMs: 20_000,
  maxConcurrentPerIdentity: 3,
  maxRequestsPerWindow: 60,
  windowMs: 60_000,
  staleSessionMaxAgeMs: 3_600_000,
  janitorIntervalMs: 300_000,
  cancelGraceMs: 5_000,
  readBufferHighWaterMark: 4 * 1024 * 1024,
  logLevel: "info",
} as const;

export const DEFAULT_UPSTREAM_CONFIG = {
  deployment: "gpt-realtime",
  apiVersion: "2024-10-01-preview",
  credentialPlacement: "query",
  handshakeTimeoutMs: 10_000,
} as const;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const UPSTREAM_SCHEMES = new Set(["https:", "http:", "wss:", "ws:"]);

function hasUpstreamScheme(value: string): boolean {
  try {
    return UPSTREAM_SCHEMES.has(new URL(value).protocol);
  } catch {
    // Malformed URLs are reported by the url() check
    return false;
  }
}

export const UpstreamConfigSchema = z.object({
  /** Base address of the upstream resource, e.g. https://my-resource.openai.azure.com */
  endpoint: z
    .string()
    .url("endpoint must be a valid URL")
    .refine(hasUpstreamScheme, { message: "endpoint must use http(s) or ws(s)" }),
  /** Server-held credential. Never logged, never sent to clients. */
  apiKey: z.string().min(1, "apiKey is required"),
  deployment: z.string().min(1).default(DEFAULT_UPSTREAM_CONFIG.deployment),
  apiVersion: z.string().min(1).default(DEFAULT_UPSTREAM_CONFIG.apiVersion),
  /** Where the credential travels: `api-key` query parameter or `api-key` header */
  credentialPlacement: z
    .enum(["query", "header"])
    .default(DEFAULT_UPSTREAM_CONFIG.credentialPlacement),
  handshakeTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_UPSTREAM_CONFIG.handshakeTimeoutMs),
});

export const RelayConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_RELAY_CONFIG.host),
  port: z.number().int().min(0).max(65535).default(DEFAULT_RELAY_CONFIG.port),
  upstream: UpstreamConfigSchema,
  /** Largest single message accepted on either side, in bytes */
  maxPayload: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.maxPayload),
  pingIntervalMs: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.pingIntervalMs),
  pingTimeoutMs: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.pingTimeoutMs),
  maxConcurrentPerIdentity: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RELAY_CONFIG.maxConcurrentPerIdentity),
  maxRequestsPerWindow: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RELAY_CONFIG.maxRequestsPerWindow),
  windowMs: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.windowMs),
  staleSessionMaxAgeMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RELAY_CONFIG.staleSessionMaxAgeMs),
  janitorIntervalMs: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.janitorIntervalMs),
  /** How long teardown waits for a cancelled pump before terminating both sockets */
  cancelGraceMs: z.number().int().positive().default(DEFAULT_RELAY_CONFIG.cancelGraceMs),
  /** Bytes a socket may have buffered and unread before it is paused */
  readBufferHighWaterMark: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_RELAY_CONFIG.readBufferHighWaterMark),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_RELAY_CONFIG.logLevel),
});

export type UpstreamConfig = z.output<typeof UpstreamConfigSchema>;
export type RelayConfig = z.output<typeof RelayConfigSchema>;
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse and validate raw config into a typed RelayConfig with defaults applied.
 * Throws RelayConfigurationError listing every issue.
 */
export function parseRelayConfig(raw: unknown): RelayConfig {
  const result = RelayConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new RelayConfigurationError(issues);
  }
  return result.data;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Build a RelayConfig from environment variables.
 *
 * AZURE_ENDPOINT and AZURE_API_KEY are required; everything else falls back
 * to its default.
 */
export function loadRelayConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  return parseRelayConfig({
    host: optionalString(env.RELAY_HOST),
    port: optionalNumber(env.RELAY_PORT),
    upstream: {
      endpoint: optionalString(env.AZURE_ENDPOINT),
      apiKey: optionalString(env.AZURE_API_KEY),
      deployment: optionalString(env.AZURE_DEPLOYMENT),
      apiVersion: optionalString(env.API_VERSION),
      credentialPlacement: optionalString(env.AZURE_CREDENTIAL_PLACEMENT),
      handshakeTimeoutMs: optionalNumber(env.UPSTREAM_HANDSHAKE_TIMEOUT_MS),
    },
    maxPayload: optionalNumber(env.RELAY_MAX_PAYLOAD_BYTES),
    pingIntervalMs: optionalNumber(env.RELAY_PING_INTERVAL_MS),
    pingTimeoutMs: optionalNumber(env.RELAY_PING_TIMEOUT_MS),
    maxConcurrentPerIdentity: optionalNumber(env.RELAY_MAX_CONNECTIONS_PER_IDENTITY),
    maxRequestsPerWindow: optionalNumber(env.RELAY_MAX_REQUESTS_PER_WINDOW),
    windowMs: optionalNumber(env.RELAY_RATE_WINDOW_MS),
    staleSessionMaxAgeMs: optionalNumber(env.RELAY_STALE_SESSION_MAX_AGE_MS),
    janitorIntervalMs: optionalNumber(env.RELAY_JANITOR_INTERVAL_MS),
    cancelGraceMs: optionalNumber(env.RELAY_CANCEL_GRACE_MS),
    readBufferHighWaterMark: optionalNumber(env.RELAY_READ_BUFFER_BYTES),
    logLevel: optionalString(env.LOG_LEVEL),
  });
}
