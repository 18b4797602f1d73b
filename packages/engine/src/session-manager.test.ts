import { describe, it, expect, vi, afterEach } from "vitest";
import type { Logger } from "@wayfarer/schemas";
import { WayfarerError } from "@wayfarer/schemas";
import { SessionManager } from "./session-manager.js";
import { WorldCatalog } from "./world-catalog.js";
import { fixtureModule } from "./testing/fixture-world.js";

function spyLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function manager(maxSessions?: number, idleTimeoutMs?: number): SessionManager {
  return new SessionManager({ catalog: new WorldCatalog([fixtureModule]), maxSessions, idleTimeoutMs, logger: spyLogger() });
}

describe("SessionManager", () => {
  it("creates sessions from the default world", () => {
    const sessions = manager();
    const session = sessions.create(undefined, "Robin");
    expect(session.module.id).toBe("fixture");
    expect(session.state.playerName).toBe("Robin");
    expect(sessions.get(session.id)).toBe(session);
    expect(sessions.size).toBe(1);
  });

  it("builds a fresh world for every session", () => {
    const sessions = manager();
    const a = sessions.create("fixture");
    const b = sessions.create("fixture");
    expect(a.world).not.toBe(b.world);
    expect(a.id).not.toBe(b.id);
  });

  it("rejects an unknown world", () => {
    expect(thrownBy(() => manager().create("atlantis"))).toMatchObject({ code: "UNKNOWN_WORLD" });
  });

  it("enforces the session cap", () => {
    const sessions = manager(2);
    sessions.create();
    sessions.create();
    try {
      sessions.create();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WayfarerError);
      expect(err).toMatchObject({ code: "SESSION_LIMIT" });
    }
  });

  it("frees a slot when a session ends", () => {
    const sessions = manager(1);
    const first = sessions.create();
    expect(sessions.end(first.id)).toBe(true);
    expect(sessions.end(first.id)).toBe(false);
    expect(sessions.get(first.id)).toBeUndefined();
    expect(() => sessions.create()).not.toThrow();
  });

  describe("idle expiry", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("drops stale sessions before enforcing the cap", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
      const sessions = manager(2);
      const a = sessions.create();
      const b = sessions.create();

      vi.setSystemTime(new Date("2026-01-08T00:00:00Z"));
      const fresh = sessions.create();

      expect(sessions.size).toBe(1);
      expect(sessions.get(a.id)).toBeUndefined();
      expect(sessions.get(b.id)).toBeUndefined();
      expect(sessions.get(fresh.id)).toBe(fresh);
    });

    it("keeps sessions that played a turn within the timeout", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
      const sessions = manager(5, 60_000);
      const active = sessions.create();
      const idle = sessions.create();

      vi.setSystemTime(new Date("2026-01-01T00:00:50Z"));
      active.execute("look");
      vi.setSystemTime(new Date("2026-01-01T00:01:30Z"));

      expect(sessions.pruneIdle()).toBe(1);
      expect(sessions.get(active.id)).toBe(active);
      expect(sessions.get(idle.id)).toBeUndefined();
    });
  });

  it("requires existing sessions", () => {
    expect(thrownBy(() => manager().require("nope"))).toMatchObject({ code: "SESSION_NOT_FOUND" });
  });

  it("lists session summaries", () => {
    const sessions = manager();
    const session = sessions.create("fixture", "Robin");
    session.start();
    session.execute("north");
    expect(sessions.list()).toEqual([
      expect.objectContaining({ session_id: session.id, world: "fixture", player_name: "Robin", turn: 1 }),
    ]);
  });
});

describe("WorldCatalog", () => {
  it("lists registered worlds", () => {
    const catalog = new WorldCatalog([fixtureModule]);
    expect(catalog.list()).toEqual([{ id: "fixture", title: "Fixture", description: "A two-room test world." }]);
    expect(catalog.ids()).toEqual(["fixture"]);
    expect(catalog.has("fixture")).toBe(true);
  });

  it("rejects a duplicate registration", () => {
    const catalog = new WorldCatalog([fixtureModule]);
    expect(() => catalog.register(fixtureModule)).toThrow(/already registered/);
  });
});
