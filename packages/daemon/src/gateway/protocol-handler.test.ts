/**
 * ProtocolHandler Tests - the event contract end to end, over an in-process
 * backend and recording connections.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createPtyHub, type PtyHub } from "../hub.js";
import { FakeBackend } from "../test-utils/fake-backend.js";
import { RecordingConnection } from "../test-utils/recording-connection.js";
import { waitFor } from "../test-utils/wait-for.js";
import type { ServerMessage } from "./protocol.js";

describe("ProtocolHandler", () => {
  let backend: FakeBackend;
  let hub: PtyHub;
  let alice: RecordingConnection;
  let bob: RecordingConnection;
  let now: number;

  function send(conn: RecordingConnection, message: Record<string, unknown>): Promise<void> {
    return hub.handler.handleMessage(conn, JSON.stringify(message));
  }

  /** Create a session from `conn` and return its id. */
  async function createSession(conn: RecordingConnection, params: Record<string, unknown> = {}): Promise<string> {
    await send(conn, { type: "create_session", command: "cat", ...params });
    const reply = conn.ofType("create_session").at(-1);
    if (!reply || !("session_id" in reply)) {
      throw new Error(`create_session failed: ${JSON.stringify(reply)}`);
    }
    return reply.session_id;
  }

  beforeEach(() => {
    now = 1_000;
    backend = new FakeBackend({ failCommands: ["nope"] });
    hub = createPtyHub({ backend, maxSessions: 2, pollTimeoutMs: 5, clock: () => now });
    alice = new RecordingConnection("alice");
    bob = new RecordingConnection("bob");
  });

  afterEach(async () => {
    await hub.shutdown();
  });

  // ===========================================================================
  // create_session
  // ===========================================================================

  describe("create_session", () => {
    it("delivers output before session_closed, then forgets the session", async () => {
      await send(alice, { type: "create_session", request_id: 1, command: "echo hi" });
      const id = hub.registry.list()[0]?.sessionId;
      if (!id) throw new Error("no session created");

      await waitFor(() => hub.registry.get(id) === undefined);

      expect(alice.messages).toEqual([
        { type: "create_session", request_id: 1, session_id: id },
        { type: "pty-output", session_id: id, output: "hi\r\n" },
        { type: "session_closed", session_id: id, exit_code: 0, reason: "exited" },
      ]);
      expect(hub.registry.listActive()).not.toContain(id);
    });

    it("answers a failed start with PROCESS_START_FAILED", async () => {
      await send(alice, { type: "create_session", request_id: "r1", command: "nope" });

      expect(alice.messages).toEqual([
        {
          type: "create_session",
          request_id: "r1",
          error: { code: "PROCESS_START_FAILED", message: "Failed to start process: nope" },
        },
      ]);
    });

    it("answers the create past the cap with CAPACITY_EXCEEDED", async () => {
      await createSession(alice);
      await createSession(alice);
      await send(alice, { type: "create_session", request_id: 3, command: "cat" });

      expect(alice.messages.at(-1)).toEqual({
        type: "create_session",
        request_id: 3,
        error: { code: "CAPACITY_EXCEEDED", message: "Maximum number of sessions reached (2)" },
      });
      expect(hub.registry.size).toBe(2);
    });

    it("does not attach the creator when attachOnCreate is off", async () => {
      await hub.shutdown();
      hub = createPtyHub({ backend, pollTimeoutMs: 5, attachOnCreate: false });

      const id = await createSession(alice);
      expect(hub.router.isMember(alice, id)).toBe(false);
    });
  });

  // ===========================================================================
  // Rooms
  // ===========================================================================

  describe("connect / disconnect", () => {
    it("isolates output between sessions", async () => {
      const a = await createSession(alice);
      const b = await createSession(bob);

      await send(alice, { type: "pty-input", session_id: a, input: "hello" });
      await waitFor(() => alice.outputFor(a) === "hello");

      expect(bob.outputFor(a)).toBe("");
      expect(alice.outputFor(b)).toBe("");
    });

    it("lets a second connection join and leave a room", async () => {
      const a = await createSession(alice);

      await send(bob, { type: "connect", session_id: a, request_id: "c1" });
      expect(bob.messages).toEqual([{ type: "connect", session_id: a, request_id: "c1" }]);

      await send(alice, { type: "pty-input", session_id: a, input: "one" });
      await waitFor(() => bob.outputFor(a) === "one");

      await send(bob, { type: "disconnect", session_id: a });
      expect(bob.messages.at(-1)).toEqual({ type: "disconnect", session_id: a });

      await send(alice, { type: "pty-input", session_id: a, input: "two" });
      await waitFor(() => alice.outputFor(a) === "onetwo");
      expect(bob.outputFor(a)).toBe("one");
    });

    it("rejects connect to an unknown session", async () => {
      await send(bob, { type: "connect", session_id: "missing", request_id: "c2" });

      expect(bob.messages).toEqual([
        {
          type: "error",
          event: "connect",
          request_id: "c2",
          session_id: "missing",
          error: { code: "SESSION_NOT_FOUND", message: "Session not found: missing" },
        },
      ]);
      expect(hub.router.size).toBe(0);
    });

    it("keeps the session running after its connection closes", async () => {
      const a = await createSession(alice);

      hub.handler.handleClose(alice);

      expect(hub.router.members(a)).toEqual([]);
      expect(hub.registry.listActive()).toEqual([a]);
    });

    it("joins the room named when the transport opens", async () => {
      const a = await createSession(alice);

      expect(hub.handler.handleOpen(bob, a)).toBe(true);
      expect(hub.router.isMember(bob, a)).toBe(true);
      expect(hub.handler.handleOpen(bob, "missing")).toBe(false);
    });
  });

  // ===========================================================================
  // Session operations
  // ===========================================================================

  describe("session operations", () => {
    it("writes input and refreshes lastActivity", async () => {
      const a = await createSession(alice);
      now = 9_000;

      await send(alice, { type: "pty-input", session_id: a, input: "ls\n" });

      expect(backend.processes.get(a)?.inputs).toEqual(["ls\n"]);
      expect(hub.registry.require(a).lastActivity).toBe(9_000);
    });

    it("reports input to an unknown session", async () => {
      await send(alice, { type: "pty-input", session_id: "missing", input: "x" });

      expect(alice.messages).toEqual([
        {
          type: "error",
          event: "pty-input",
          session_id: "missing",
          error: { code: "SESSION_NOT_FOUND", message: "Session not found: missing" },
        },
      ]);
    });

    it("resizes and acknowledges", async () => {
      const a = await createSession(alice);

      await send(alice, { type: "resize", session_id: a, rows: 40, cols: 120, request_id: "z" });

      expect(alice.messages.at(-1)).toEqual({ type: "resize", session_id: a, rows: 40, cols: 120, request_id: "z" });
      const session = hub.registry.require(a);
      expect(hub.backend.getSize(session)).toEqual({ rows: 40, cols: 120 });
    });

    it("accepts heartbeats silently", async () => {
      const a = await createSession(alice);
      const before = alice.messages.length;
      now = 5_000;

      await send(alice, { type: "heartbeat", session_id: a });

      expect(alice.messages).toHaveLength(before);
      expect(hub.registry.require(a).lastActivity).toBe(5_000);
    });

    it("reports heartbeats for unknown sessions", async () => {
      await send(alice, { type: "heartbeat", session_id: "missing" });

      const errors = alice.ofType("error");
      expect(errors).toHaveLength(1);
      expect(errors[0]?.error.code).toBe("SESSION_NOT_FOUND");
    });

    it("closes a session on request", async () => {
      const a = await createSession(alice);
      alice.clear();

      await send(alice, { type: "close_session", session_id: a, request_id: 9 });

      const expected: ServerMessage[] = [
        { type: "session_closed", session_id: a, exit_code: null, reason: "closed" },
        { type: "close_session", session_id: a, request_id: 9 },
      ];
      expect(alice.messages).toEqual(expected);
      expect(hub.registry.get(a)).toBeUndefined();
      expect(backend.cleanupCalls(a)).toBe(1);
    });

    it("answers ping with pong", async () => {
      await send(alice, { type: "ping" });
      expect(alice.messages).toEqual([{ type: "pong" }]);
    });

    it("answers malformed frames with INVALID_MESSAGE", async () => {
      await hub.handler.handleMessage(alice, "not json");

      expect(alice.messages).toEqual([
        {
          type: "error",
          event: "unknown",
          error: { code: "INVALID_MESSAGE", message: "Message is not valid JSON" },
        },
      ]);
    });
  });

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  describe("shutdown", () => {
    it("closes every session with reason shutdown", async () => {
      const a = await createSession(alice);

      await hub.shutdown();

      expect(alice.ofType("session_closed")).toEqual([
        { type: "session_closed", session_id: a, exit_code: null, reason: "shutdown" },
      ]);
      expect(hub.registry.size).toBe(0);
    });
  });
});
