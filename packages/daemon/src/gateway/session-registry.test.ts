/**
 * SessionRegistry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SessionRegistry, type SessionClosedEvent } from "./session-registry.js";
import { Router } from "./router.js";
import { FakeBackend } from "../test-utils/fake-backend.js";
import { RecordingConnection } from "../test-utils/recording-connection.js";
import { waitFor } from "../test-utils/wait-for.js";
import {
  CapacityExceededError,
  InvalidMessageError,
  ProcessStartError,
  SessionNotFoundError,
} from "../utils/errors.js";

/** Id generator that hands out the given ids in order. */
function idsFrom(...ids: string[]): () => string {
  let index = 0;
  return () => ids[index++] ?? `extra${index}`;
}

describe("SessionRegistry", () => {
  let backend: FakeBackend;
  let router: Router;
  let registry: SessionRegistry;
  let now: number;

  function createRegistry(overrides: { maxSessions?: number; generateId?: () => string } = {}): SessionRegistry {
    return new SessionRegistry({
      backend,
      router,
      maxSessions: overrides.maxSessions ?? 5,
      clock: () => now,
      generateId: overrides.generateId,
      defaultShell: () => "bash",
      pollTimeoutMs: 5,
    });
  }

  beforeEach(() => {
    now = 1_000;
    backend = new FakeBackend({ failCommands: ["nope"] });
    router = new Router();
    registry = createRegistry();
  });

  afterEach(async () => {
    await registry.destroyAll();
  });

  // ===========================================================================
  // create
  // ===========================================================================

  describe("create", () => {
    it("starts the default shell with default geometry", () => {
      const id = registry.create();
      const session = registry.require(id);

      expect(session.command).toBe("bash");
      expect(session.args).toEqual([]);
      expect(session.rows).toBe(24);
      expect(session.cols).toBe(80);
      expect(session.createdAt).toBe(1_000);
      expect(session.backendHandle).toEqual({ pid: 1000, platform: "unix" });
      expect(backend.calls).toEqual([`start:${id}`]);
    });

    it("splits a command line given without args", () => {
      const id = registry.create({ command: "cat -n" });
      expect(registry.require(id).command).toBe("cat");
      expect(registry.require(id).args).toEqual(["-n"]);
    });

    it("generates 8-character hex ids that never repeat", () => {
      const ids = new Set<string>();
      for (let i = 0; i < 5; i++) {
        ids.add(registry.create({ command: "cat" }));
      }
      expect(ids.size).toBe(5);
      for (const id of ids) {
        expect(id).toMatch(/^[0-9a-f]{8}$/);
      }
    });

    it("regenerates an id that is already in use", () => {
      registry = createRegistry({ generateId: idsFrom("aaaa", "aaaa", "bbbb") });
      expect(registry.create({ command: "cat" })).toBe("aaaa");
      expect(registry.create({ command: "cat" })).toBe("bbbb");
    });

    it("enforces the session cap", () => {
      registry = createRegistry({ maxSessions: 2 });
      registry.create({ command: "cat" });
      registry.create({ command: "cat" });

      expect(() => registry.create({ command: "cat" })).toThrow(CapacityExceededError);
      expect(registry.size).toBe(2);
    });

    it("counts a session still being destroyed toward the cap", async () => {
      registry = createRegistry({ maxSessions: 1 });
      const id = registry.create({ command: "cat" });

      const destroyed = registry.destroy(id);
      expect(() => registry.create({ command: "cat" })).toThrow(CapacityExceededError);

      await destroyed;
      expect(registry.create({ command: "cat" })).not.toBe(id);
    });

    it("throws ProcessStartError and keeps nothing when the start fails", () => {
      registry = createRegistry({ generateId: idsFrom("f1") });
      expect(() => registry.create({ command: "nope" })).toThrow(ProcessStartError);
      expect(registry.size).toBe(0);
      expect(registry.get("f1")).toBeUndefined();
    });

    it("rejects non-positive geometry before starting anything", () => {
      expect(() => registry.create({ rows: 0, cols: 80 })).toThrow(InvalidMessageError);
      expect(backend.calls).toEqual([]);
    });
  });

  // ===========================================================================
  // Lookup
  // ===========================================================================

  describe("require / touch / listActive", () => {
    it("require throws for an unknown session", () => {
      expect(() => registry.require("missing")).toThrow(SessionNotFoundError);
    });

    it("treats a session being destroyed as gone", async () => {
      const id = registry.create({ command: "cat" });
      const destroyed = registry.destroy(id);

      expect(registry.get(id)).toBeDefined();
      expect(() => registry.require(id)).toThrow(SessionNotFoundError);
      expect(registry.listActive()).toEqual([]);
      expect(registry.touch(id)).toBe(false);

      await destroyed;
    });

    it("touch refreshes lastActivity", () => {
      const id = registry.create({ command: "cat" });
      now = 5_000;
      expect(registry.touch(id)).toBe(true);
      expect(registry.require(id).lastActivity).toBe(5_000);
      expect(registry.touch("missing")).toBe(false);
    });
  });

  // ===========================================================================
  // destroy
  // ===========================================================================

  describe("destroy", () => {
    it("releases the backend, notifies the room, then drops the room", async () => {
      const conn = new RecordingConnection();
      const id = registry.create({ command: "cat" });
      router.join(conn, id);

      expect(await registry.destroy(id)).toBe(true);

      expect(backend.calls).toEqual([`start:${id}`, `cleanup:${id}`]);
      expect(conn.ofType("session_closed")).toEqual([
        { type: "session_closed", session_id: id, exit_code: null, reason: "closed" },
      ]);
      expect(router.members(id)).toEqual([]);
      expect(registry.get(id)).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it("shares one teardown between concurrent calls", async () => {
      const id = registry.create({ command: "cat" });

      const results = await Promise.all([registry.destroy(id), registry.destroy(id, "idle_timeout")]);

      expect(results).toEqual([true, true]);
      expect(backend.cleanupCalls(id)).toBe(1);
      expect(await registry.destroy(id)).toBe(false);
    });

    it("returns false for an unknown session", async () => {
      expect(await registry.destroy("missing")).toBe(false);
      expect(backend.calls).toEqual([]);
    });

    it("destroys everything on destroyAll", async () => {
      const events: SessionClosedEvent[] = [];
      registry.onSessionClosed((event) => events.push(event));
      const a = registry.create({ command: "cat" });
      const b = registry.create({ command: "cat" });

      await registry.destroyAll();

      expect(registry.size).toBe(0);
      expect(events).toHaveLength(2);
      expect(events.map((e) => e.sessionId).sort()).toEqual([a, b].sort());
      expect(events.every((e) => e.reason === "shutdown" && e.exitCode === null)).toBe(true);
    });
  });

  // ===========================================================================
  // Process exit
  // ===========================================================================

  describe("process exit", () => {
    it("delivers output, then one session_closed, then removes the session", async () => {
      const events: SessionClosedEvent[] = [];
      registry.onSessionClosed((event) => events.push(event));
      const conn = new RecordingConnection();

      const id = registry.create({ command: "echo", args: ["hi"] });
      router.join(conn, id);

      await waitFor(() => registry.get(id) === undefined);

      expect(conn.messages).toEqual([
        { type: "pty-output", session_id: id, output: "hi\r\n" },
        { type: "session_closed", session_id: id, exit_code: 0, reason: "exited" },
      ]);
      expect(events).toEqual([{ sessionId: id, exitCode: 0, reason: "exited" }]);
      expect(backend.cleanupCalls(id)).toBe(1);
    });

    it("reports a non-zero exit code", async () => {
      const conn = new RecordingConnection();
      const id = registry.create({ command: "false" });
      router.join(conn, id);

      await waitFor(() => registry.get(id) === undefined);

      expect(conn.ofType("session_closed")).toEqual([
        { type: "session_closed", session_id: id, exit_code: 1, reason: "exited" },
      ]);
    });

    it("frees capacity once an exited session is removed", async () => {
      registry = createRegistry({ maxSessions: 1 });
      const id = registry.create({ command: "false" });

      await waitFor(() => registry.get(id) === undefined);

      expect(() => registry.create({ command: "cat" })).not.toThrow();
    });
  });

  // ===========================================================================
  // Listeners
  // ===========================================================================

  describe("onSessionClosed", () => {
    it("stops notifying after unsubscribe", async () => {
      const events: SessionClosedEvent[] = [];
      const unsubscribe = registry.onSessionClosed((event) => events.push(event));
      unsubscribe();

      await registry.destroy(registry.create({ command: "cat" }));
      expect(events).toEqual([]);
    });

    it("keeps notifying when one listener throws", async () => {
      const events: SessionClosedEvent[] = [];
      registry.onSessionClosed(() => {
        throw new Error("listener failed");
      });
      registry.onSessionClosed((event) => events.push(event));

      const id = registry.create({ command: "cat" });
      await registry.destroy(id);

      expect(events).toEqual([{ sessionId: id, exitCode: null, reason: "closed" }]);
    });
  });
});
