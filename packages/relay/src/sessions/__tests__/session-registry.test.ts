import { InternalRelayError } from "@realtime-relay/errors";
import { describe, expect, it, vi } from "vitest";
import { SessionRegistry } from "../session-registry.js";
import { createMockSocket } from "../../__tests__/helpers.js";

function createClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    set(ms: number) {
      now = ms;
    },
  };
}

describe("SessionRegistry", () => {
  describe("create", () => {
    it("creates an admitted session with zero messages", () => {
      const clock = createClock(1_000);
      const registry = new SessionRegistry({ clock });
      const client = createMockSocket();

      const session = registry.create("alice", client);

      expect(session.identity).toBe("alice");
      expect(session.createdAt).toBe(1_000);
      expect(session.state).toBe("admitted");
      expect(session.messageCount).toBe(0);
      expect(session.clientHandle).toBe(client);
      expect(session.upstreamHandle).toBeUndefined();
      expect(session.lifetime.signal.aborted).toBe(false);
      expect(registry.get(session.id)).toBe(session);
    });

    it("generates UUIDs by default", () => {
      const registry = new SessionRegistry();
      const { id } = registry.create("alice");
      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });

    it("indexes sessions by identity", () => {
      const registry = new SessionRegistry();
      const a = registry.create("alice");
      const b = registry.create("alice");
      registry.create("bob");

      expect(registry.countFor("alice")).toBe(2);
      expect(registry.idsFor("alice")).toEqual([a.id, b.id]);
      expect(registry.countFor("bob")).toBe(1);
      expect(registry.countFor("carol")).toBe(0);
      expect(registry.size).toBe(3);
    });

    it("throws on an id collision", () => {
      const registry = new SessionRegistry({ generateId: () => "fixed-id" });
      registry.create("alice");
      expect(() => registry.create("bob")).toThrow(InternalRelayError);
      expect(registry.size).toBe(1);
    });

    it("notifies created handlers", () => {
      const registry = new SessionRegistry();
      const handler = vi.fn();
      registry.onCreated(handler);
      const session = registry.create("alice");
      expect(handler).toHaveBeenCalledWith(session);
    });
  });

  describe("destroy", () => {
    it("removes the session from both indexes", () => {
      const registry = new SessionRegistry();
      const session = registry.create("alice");

      expect(registry.destroy(session.id)).toBe(true);
      expect(registry.get(session.id)).toBeUndefined();
      expect(registry.countFor("alice")).toBe(0);
      expect(registry.idsFor("alice")).toEqual([]);
      expect(registry.size).toBe(0);
    });

    it("is idempotent: a second destroy is a no-op", () => {
      const registry = new SessionRegistry();
      const handler = vi.fn();
      registry.onDestroyed(handler);
      const session = registry.create("alice");

      expect(registry.destroy(session.id)).toBe(true);
      expect(registry.destroy(session.id)).toBe(false);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it("returns false for an unknown id", () => {
      const registry = new SessionRegistry();
      expect(registry.destroy("missing")).toBe(false);
    });

    it("leaves the identity's other sessions in place", () => {
      const registry = new SessionRegistry();
      const a = registry.create("alice");
      const b = registry.create("alice");
      registry.destroy(a.id);
      expect(registry.idsFor("alice")).toEqual([b.id]);
    });
  });

  describe("listStaleOlderThan", () => {
    it("includes a session only once its age reaches maxAge", () => {
      const clock = createClock(0);
      const registry = new SessionRegistry({ clock });
      const session = registry.create("alice");

      clock.set(3_599_999);
      expect([...registry.listStaleOlderThan(3_600_000)]).toEqual([]);

      clock.set(3_600_000);
      expect([...registry.listStaleOlderThan(3_600_000)]).toEqual([session.id]);
    });

    it("never includes younger sessions", () => {
      const clock = createClock(0);
      const registry = new SessionRegistry({ clock });
      const old = registry.create("alice");
      clock.set(1_000);
      registry.create("bob");

      clock.set(3_600_500);
      expect([...registry.listStaleOlderThan(3_600_000)]).toEqual([old.id]);
    });

    it("iterates a snapshot, so sessions can be destroyed while consuming it", () => {
      const clock = createClock(0);
      const registry = new SessionRegistry({ clock });
      const ids = [registry.create("a").id, registry.create("b").id, registry.create("c").id];
      clock.set(10);

      const swept: string[] = [];
      for (const id of registry.listStaleOlderThan(5)) {
        swept.push(id);
        registry.destroy(id);
        registry.create("late");
      }

      expect(swept).toEqual(ids);
      expect(registry.countFor("late")).toBe(3);
    });

    it("is lazy: nothing is computed until iteration starts", () => {
      const clock = createClock(0);
      const registry = new SessionRegistry({ clock });
      const stale = registry.listStaleOlderThan(100);
      const session = registry.create("alice");
      clock.set(100);

      expect([...stale]).toEqual([session.id]);
    });
  });
});
