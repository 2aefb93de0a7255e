import { type RelayLogger, shortId, silentLogger } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { SessionRegistry } from "./sessions/session-registry.js";
import { createEmitter, type Emitter } from "./utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JanitorConfig {
  /** Sweep interval in ms (default: 300_000) */
  readonly janitorIntervalMs: number;
  /** Sessions at least this old are closed (default: 3_600_000) */
  readonly staleSessionMaxAgeMs: number;
}

export type SweepHandler = (sessionIds: readonly string[]) => void;

type JanitorEvents = {
  sweep: [sessionIds: readonly string[]];
};

// ---------------------------------------------------------------------------
// Janitor
// ---------------------------------------------------------------------------

/**
 * Periodically forces sessions past their maximum age to close.
 *
 * A swept session is only signalled: its own ProxySession tears it down
 * and removes it from the registry, so a sweep racing a normal close ends
 * in a single removal.
 */
export class Janitor {
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly events: Emitter<JanitorEvents> = createEmitter();
  private readonly registry: SessionRegistry;
  private readonly limiter: RateLimiter | undefined;
  private readonly config: JanitorConfig;
  private readonly logger: RelayLogger;

  constructor(
    registry: SessionRegistry,
    config: JanitorConfig,
    options: { readonly limiter?: RateLimiter; readonly logger?: RelayLogger } = {},
  ) {
    this.registry = registry;
    this.config = config;
    this.limiter = options.limiter;
    this.logger = options.logger ?? silentLogger;
  }

  start(): void {
    if (this.timer !== undefined) return;
    this.timer = setInterval(() => this.sweep(), this.config.janitorIntervalMs);
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Register a handler called after every sweep with the ids it closed.
   * Returns a disposer function.
   */
  onSweep(handler: SweepHandler): () => void {
    return this.events.on("sweep", handler);
  }

  /**
   * Run one sweep now. Returns the ids of the sessions told to close.
   */
  sweep(): readonly string[] {
    const swept: string[] = [];
    for (const id of this.registry.listStaleOlderThan(this.config.staleSessionMaxAgeMs)) {
      const session = this.registry.get(id);
      if (!session || session.lifetime.signal.aborted) continue;
      this.logger.info(`Cleaning up stale session ${shortId(id)}`);
      session.lifetime.abort("stale");
      swept.push(id);
    }
    const pruned = this.limiter?.pruneIdle() ?? 0;
    if (pruned > 0) {
      this.logger.debug(`Dropped rate-limit state for ${pruned} idle identities`);
    }
    this.events.emit("sweep", swept);
    return swept;
  }
}
