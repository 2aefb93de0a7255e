import { toError, UpstreamUnreachableError } from "@realtime-relay/errors";
import type { UpstreamConfig } from "../config.js";
import { type RelayLogger, silentLogger } from "../logger.js";
import type { RelaySocket } from "../transport/socket.js";
import { RELAY_USER_AGENT } from "../version.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UpstreamSocketOptions {
  readonly headers: Record<string, string>;
  readonly maxPayload: number;
  readonly handshakeTimeout: number;
}

/**
 * Factory for upstream WebSocket clients.
 * Injectable for testing.
 */
export type WsClientFactory = (url: string, options: UpstreamSocketOptions) => RelaySocket;

export interface UpstreamConnectorOptions {
  readonly upstream: UpstreamConfig;
  /** Same bound as the client-facing server */
  readonly maxPayload: number;
  readonly factory?: WsClientFactory;
  readonly logger?: RelayLogger;
}

// ---------------------------------------------------------------------------
// URL
// ---------------------------------------------------------------------------

export const UPSTREAM_PATH = "openai/realtime";
const CREDENTIAL_PARAM = "api-key";
const REDACTED = "***";

/**
 * Build the upstream realtime URL. The credential is included only when
 * it travels as a query parameter.
 */
export function buildUpstreamUrl(upstream: UpstreamConfig): string {
  const base = upstream.endpoint
    .replace(/\/+$/, "")
    .replace(/^https:\/\//i, "wss://")
    .replace(/^http:\/\//i, "ws://");
  const url = new URL(`${base}/${UPSTREAM_PATH}`);
  url.searchParams.set("api-version", upstream.apiVersion);
  url.searchParams.set("deployment", upstream.deployment);
  if (upstream.credentialPlacement === "query") {
    url.searchParams.set(CREDENTIAL_PARAM, upstream.apiKey);
  }
  return url.toString();
}

/**
 * Mask the credential query parameter for logging.
 */
export function redactUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.searchParams.has(CREDENTIAL_PARAM)) {
    parsed.searchParams.set(CREDENTIAL_PARAM, REDACTED);
  }
  return parsed.toString();
}

const UNEXPECTED_RESPONSE = /Unexpected server response: (\d{3})/;

/**
 * HTTP status the upstream answered the upgrade request with, if the
 * handshake error carries one.
 */
export function handshakeStatus(error: Error): number | undefined {
  const match = UNEXPECTED_RESPONSE.exec(error.message);
  return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

// ---------------------------------------------------------------------------
// UpstreamConnector
// ---------------------------------------------------------------------------

/**
 * Opens the credentialed upstream connection for one session.
 */
export class UpstreamConnector {
  private readonly upstream: UpstreamConfig;
  private readonly maxPayload: number;
  private readonly factory: WsClientFactory | undefined;
  private readonly logger: RelayLogger;

  constructor(options: UpstreamConnectorOptions) {
    this.upstream = options.upstream;
    this.maxPayload = options.maxPayload;
    this.factory = options.factory;
    this.logger = options.logger ?? silentLogger;
  }

  /** The upstream URL with the credential masked. */
  get displayUrl(): string {
    return redactUrl(buildUpstreamUrl(this.upstream));
  }

  /**
   * Resolve with an open upstream socket.
   * Rejects with UpstreamUnreachableError on handshake failure, timeout,
   * close during the handshake, or abort of `signal`.
   */
  async connect(signal?: AbortSignal): Promise<RelaySocket> {
    if (signal?.aborted) {
      throw new UpstreamUnreachableError(undefined, new Error("connect aborted"));
    }

    const url = buildUpstreamUrl(this.upstream);
    const headers: Record<string, string> = { "User-Agent": RELAY_USER_AGENT };
    if (this.upstream.credentialPlacement === "header") {
      headers[CREDENTIAL_PARAM] = this.upstream.apiKey;
    }
    const options: UpstreamSocketOptions = {
      headers,
      maxPayload: this.maxPayload,
      handshakeTimeout: this.upstream.handshakeTimeoutMs,
    };

    this.logger.debug(`Connecting to upstream ${redactUrl(url)}`);

    let ws: RelaySocket;
    try {
      ws = this.factory ? this.factory(url, options) : await this.createDefaultWs(url, options);
    } catch (error) {
      throw new UpstreamUnreachableError(undefined, toError(error));
    }

    return new Promise<RelaySocket>((resolve, reject) => {
      let settled = false;

      const settle = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        ws.off("open", onOpen);
        ws.off("error", onError);
        ws.off("close", onClose);
        fn();
      };

      const onOpen = (): void => {
        settle(() => resolve(ws));
      };

      const onError = (err: unknown): void => {
        settle(() => {
          const error = toError(err);
          ws.on("error", ignoreLateError);
          ws.terminate();
          reject(new UpstreamUnreachableError(handshakeStatus(error), error));
        });
      };

      const onClose = (code: unknown): void => {
        settle(() => {
          reject(
            new UpstreamUnreachableError(
              undefined,
              new Error(`closed during handshake (code ${String(code)})`),
            ),
          );
        });
      };

      const onAbort = (): void => {
        settle(() => {
          ws.on("error", ignoreLateError);
          ws.terminate();
          reject(new UpstreamUnreachableError(undefined, new Error("connect aborted")));
        });
      };

      // A socket that failed its handshake may still report errors while it is torn down
      const ignoreLateError = (err: unknown): void => {
        this.logger.debug(`Upstream error after failed handshake: ${toError(err).message}`);
      };

      ws.on("open", onOpen);
      ws.on("error", onError);
      ws.on("close", onClose);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async createDefaultWs(url: string, options: UpstreamSocketOptions): Promise<RelaySocket> {
    const { WebSocket } = await import("ws");
    return new WebSocket(url, {
      headers: options.headers,
      maxPayload: options.maxPayload,
      handshakeTimeout: options.handshakeTimeout,
    }) as unknown as RelaySocket;
  }
}
