import { randomUUID } from "node:crypto";
import { InternalRelayError } from "@realtime-relay/errors";
import type { RelaySocket } from "../transport/socket.js";
import { type Clock, systemClock } from "../utils/clock.js";
import { createEmitter, type Emitter } from "../utils/emitter.js";
import { mapDelete, mapSet, multiMapAdd, multiMapRemove } from "../utils/immutable-map.js";
import type { Session } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionRegistryOptions {
  readonly clock?: Clock;
  /** Session id source (default: random UUID) */
  readonly generateId?: () => string;
}

type RegistryEvents = {
  created: [session: Session];
  destroyed: [session: Session];
};

// ---------------------------------------------------------------------------
// SessionRegistry
// ---------------------------------------------------------------------------

/**
 * Authoritative table of live sessions, indexed by id and by identity.
 *
 * Both indexes are replaced on every write, so the generator returned by
 * `listStaleOlderThan` walks a snapshot and callers may destroy sessions
 * while consuming it.
 */
export class SessionRegistry {
  private sessions: ReadonlyMap<string, Session> = new Map();
  private byIdentity: ReadonlyMap<string, ReadonlySet<string>> = new Map();
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private readonly events: Emitter<RegistryEvents> = createEmitter();

  constructor(options: SessionRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Register a new session in the `admitted` state.
   */
  create(identity: string, clientHandle?: RelaySocket): Session {
    const id = this.generateId();
    if (this.sessions.has(id)) {
      throw new InternalRelayError("Session id collision", { sessionId: id });
    }
    const session: Session = {
      id,
      identity,
      createdAt: this.clock.now(),
      lifetime: new AbortController(),
      state: "admitted",
      clientHandle,
      upstreamHandle: undefined,
      messageCount: 0,
    };
    this.sessions = mapSet(this.sessions, id, session);
    this.byIdentity = multiMapAdd(this.byIdentity, identity, id);
    this.events.emit("created", session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * Remove a session. Returns false if it was already gone.
   */
  destroy(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions = mapDelete(this.sessions, id);
    this.byIdentity = multiMapRemove(this.byIdentity, session.identity, id);
    this.events.emit("destroyed", session);
    return true;
  }

  /**
   * Yield the id of every session whose age is at least `maxAgeMs`.
   */
  *listStaleOlderThan(maxAgeMs: number): Generator<string, void, undefined> {
    const snapshot = this.sessions;
    const now = this.clock.now();
    for (const session of snapshot.values()) {
      if (now - session.createdAt >= maxAgeMs) {
        yield session.id;
      }
    }
  }

  /** Sessions currently open for `identity`. */
  countFor(identity: string): number {
    return this.byIdentity.get(identity)?.size ?? 0;
  }

  idsFor(identity: string): readonly string[] {
    return [...(this.byIdentity.get(identity) ?? [])];
  }

  get size(): number {
    return this.sessions.size;
  }

  onCreated(handler: (session: Session) => void): () => void {
    return this.events.on("created", handler);
  }

  onDestroyed(handler: (session: Session) => void): () => void {
    return this.events.on("destroyed", handler);
  }
}
