import type { RateLimitKind } from "@realtime-relay/errors";
import { type Clock, systemClock } from "./utils/clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimiterConfig {
  /** Max simultaneously open sessions per identity (default: 3) */
  readonly maxConcurrentPerIdentity: number;
  /** Max admissions per identity within the trailing window (default: 60) */
  readonly maxRequestsPerWindow: number;
  /** Trailing window length in ms (default: 60_000) */
  readonly windowMs: number;
}

/**
 * Source of the number of sessions an identity currently has open.
 */
export type ConcurrencySource = (identity: string) => number;

export type AdmissionDecision =
  | { readonly allowed: true; readonly reason: "OK" }
  | { readonly allowed: false; readonly reason: string; readonly limit: RateLimitKind };

export const CONCURRENCY_EXCEEDED_REASON = "max concurrent connections exceeded";
export const RATE_EXCEEDED_REASON = "rate limit exceeded";

// ---------------------------------------------------------------------------
// RateLimiter
// ---------------------------------------------------------------------------

/**
 * Per-identity admission control: a cap on concurrently open sessions and a
 * sliding-window cap on admissions.
 *
 * The concurrent count comes from the session registry. `admit` is
 * synchronous, so a caller that creates the session in the same turn gets
 * an atomic check-and-record on the event loop.
 */
export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly openSessions: ConcurrencySource;
  private readonly clock: Clock;
  private readonly logs: Map<string, number[]> = new Map();

  constructor(config: RateLimiterConfig, openSessions: ConcurrencySource, clock: Clock = systemClock) {
    this.config = config;
    this.openSessions = openSessions;
    this.clock = clock;
  }

  /**
   * Decide whether `identity` may open another session, recording the
   * admission when it is allowed.
   */
  admit(identity: string): AdmissionDecision {
    if (this.openSessions(identity) >= this.config.maxConcurrentPerIdentity) {
      return { allowed: false, reason: CONCURRENCY_EXCEEDED_REASON, limit: "concurrency" };
    }

    const now = this.clock.now();
    const log = this.prune(identity, now);
    if (log.length >= this.config.maxRequestsPerWindow) {
      return { allowed: false, reason: RATE_EXCEEDED_REASON, limit: "rate" };
    }

    // Keep the log non-decreasing even if the wall clock steps back
    const last = log[log.length - 1];
    log.push(last !== undefined && last > now ? last : now);
    this.logs.set(identity, log);
    return { allowed: true, reason: "OK" };
  }

  /**
   * Admissions recorded for `identity` inside the current window.
   */
  recentCount(identity: string): number {
    return this.prune(identity, this.clock.now()).length;
  }

  /**
   * Drop the request log of one identity.
   */
  reset(identity: string): void {
    this.logs.delete(identity);
  }

  /**
   * Drop identities whose logs are empty once expired entries are pruned.
   * Returns how many identities were dropped.
   */
  pruneIdle(): number {
    const now = this.clock.now();
    let dropped = 0;
    for (const identity of [...this.logs.keys()]) {
      if (this.prune(identity, now).length === 0) {
        this.logs.delete(identity);
        dropped++;
      }
    }
    return dropped;
  }

  /**
   * Clear all tracking state.
   */
  clear(): void {
    this.logs.clear();
  }

  /** Number of identities with a request log. */
  get trackedIdentities(): number {
    return this.logs.size;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /**
   * Remove timestamps that fell out of the window. The log is in
   * non-decreasing order, so expired entries are a prefix.
   */
  private prune(identity: string, now: number): number[] {
    const log = this.logs.get(identity);
    if (!log) return [];
    let firstLive = 0;
    while (firstLive < log.length && now - (log[firstLive] ?? now) >= this.config.windowMs) {
      firstLive++;
    }
    if (firstLive > 0) {
      log.splice(0, firstLive);
    }
    return log;
  }
}
