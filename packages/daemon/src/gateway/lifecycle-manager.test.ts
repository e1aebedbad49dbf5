/**
 * SessionLifecycleManager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SessionLifecycleManager } from "./lifecycle-manager.js";
import { SessionRegistry } from "./session-registry.js";
import { Router } from "./router.js";
import type { TerminalSession } from "./session.js";
import { FakeBackend } from "../test-utils/fake-backend.js";
import { RecordingConnection } from "../test-utils/recording-connection.js";

/** Backend that can declare a process dead without waking its pump. */
class DeadableBackend extends FakeBackend {
  readonly dead = new Set<string>();

  override isAlive(session: TerminalSession): boolean {
    return !this.dead.has(session.sessionId) && super.isAlive(session);
  }
}

const IDLE_TIMEOUT_MS = 60_000;

describe("SessionLifecycleManager", () => {
  let backend: DeadableBackend;
  let router: Router;
  let registry: SessionRegistry;
  let lifecycle: SessionLifecycleManager;
  let now: number;

  beforeEach(() => {
    now = 0;
    backend = new DeadableBackend();
    router = new Router();
    registry = new SessionRegistry({
      backend,
      router,
      clock: () => now,
      defaultShell: () => "cat",
      pollTimeoutMs: 5,
    });
    lifecycle = new SessionLifecycleManager(registry, backend, {
      idleTimeoutMs: IDLE_TIMEOUT_MS,
      sweepIntervalMs: 1_000,
      clock: () => now,
    });
  });

  afterEach(async () => {
    lifecycle.stop();
    await registry.destroyAll();
  });

  // ===========================================================================
  // Heartbeats and idle sweep
  // ===========================================================================

  describe("idle sweep", () => {
    it("keeps heartbeated sessions and destroys silent ones", async () => {
      const kept = registry.create();
      const silent = registry.create();

      now = 30_000;
      expect(lifecycle.heartbeat(kept)).toBe(true);
      now = 60_000;
      expect(lifecycle.heartbeat(kept)).toBe(true);

      const swept = await lifecycle.sweep(90_000);

      expect(swept).toEqual([{ sessionId: silent, reason: "idle_timeout" }]);
      expect(registry.listActive()).toEqual([kept]);
    });

    it("keeps a session idle for exactly the timeout", async () => {
      const id = registry.create();
      expect(await lifecycle.sweep(IDLE_TIMEOUT_MS)).toEqual([]);
      expect(registry.get(id)).toBeDefined();
    });

    it("expires sessions regardless of attached connections", async () => {
      const conn = new RecordingConnection();
      const id = registry.create();
      router.join(conn, id);

      await lifecycle.sweep(IDLE_TIMEOUT_MS + 1);

      expect(registry.get(id)).toBeUndefined();
      expect(conn.ofType("session_closed")).toEqual([
        { type: "session_closed", session_id: id, exit_code: null, reason: "idle_timeout" },
      ]);
    });

    it("heartbeat fails for unknown sessions", () => {
      expect(lifecycle.heartbeat("missing")).toBe(false);
    });
  });

  // ===========================================================================
  // Dead sessions
  // ===========================================================================

  describe("dead sessions", () => {
    it("destroys sessions whose process is gone", async () => {
      const dead = registry.create();
      const alive = registry.create();
      backend.dead.add(dead);

      const swept = await lifecycle.sweep(1);

      expect(swept).toEqual([{ sessionId: dead, reason: "exited" }]);
      expect(registry.get(dead)).toBeUndefined();
      expect(registry.listActive()).toEqual([alive]);
    });
  });

  // ===========================================================================
  // Timer
  // ===========================================================================

  describe("start / stop", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("sweeps on every interval until stopped", () => {
      vi.useFakeTimers();
      const sweep = vi.spyOn(lifecycle, "sweep");

      lifecycle.start();
      lifecycle.start();
      expect(lifecycle.running).toBe(true);

      vi.advanceTimersByTime(3_000);
      expect(sweep).toHaveBeenCalledTimes(3);

      lifecycle.stop();
      vi.advanceTimersByTime(3_000);
      expect(sweep).toHaveBeenCalledTimes(3);
      expect(lifecycle.running).toBe(false);
    });

    it("shares one sweep between overlapping calls", async () => {
      const first = lifecycle.sweep(0);
      expect(lifecycle.sweep(0)).toBe(first);
      await first;
    });
  });
});
