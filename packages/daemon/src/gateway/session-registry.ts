/**
 * SessionRegistry - single source of truth for hosted sessions.
 *
 * Owns the session map, enforces the session cap, and supervises exactly one
 * OutputPump per active session. `create()` is synchronous end to end, so no
 * reader ever observes a half-initialized session and concurrent creates
 * cannot overshoot the cap.
 */

import { randomUUID } from "node:crypto";
import {
  MAX_SESSIONS,
  PTY_DEFAULT_COLS,
  PTY_DEFAULT_ROWS,
  PTY_POLL_TIMEOUT_MS,
  PTY_READ_CHUNK_CHARS,
  SESSION_ID_LENGTH,
} from "../config/index.js";
import { getDefaultShell, parseCommandLine } from "../backend/shell.js";
import type { TerminalBackend } from "../backend/types.js";
import {
  addPtyAttributes,
  withSpan,
  withSpanSync,
} from "../telemetry/spans.js";
import { recordError as recordErrorMetric, recordSessionsActive } from "../telemetry/metrics.js";
import {
  CapacityExceededError,
  InvalidMessageError,
  ProcessStartError,
  PtyHubError,
  SessionNotFoundError,
} from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { OutputPump } from "./output-pump.js";
import type { CreateSessionParams } from "./protocol.js";
import type { Router } from "./router.js";
import {
  createSessionRecord,
  type SessionCloseReason,
  type TerminalSession,
} from "./session.js";

const logger = createLogger("REGISTRY");

const MAX_ID_ATTEMPTS = 100;

// =============================================================================
// Types
// =============================================================================

export interface SessionClosedEvent {
  sessionId: string;
  /** null when the process was terminated by the server */
  exitCode: number | null;
  reason: SessionCloseReason;
}

export type SessionClosedListener = (event: SessionClosedEvent) => void;

export interface SessionRegistryOptions {
  backend: TerminalBackend;
  router: Router;
  maxSessions?: number;
  /** Epoch-millisecond clock */
  clock?: () => number;
  generateId?: () => string;
  defaultShell?: () => string;
  pollTimeoutMs?: number;
  readChunkChars?: number;
}

function defaultGenerateId(): string {
  return randomUUID().replace(/-/g, "").slice(0, SESSION_ID_LENGTH);
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

// =============================================================================
// SessionRegistry
// =============================================================================

export class SessionRegistry {
  private sessions = new Map<string, TerminalSession>();
  private pumps = new Map<string, OutputPump>();
  private destroying = new Map<string, Promise<boolean>>();
  private listeners = new Set<SessionClosedListener>();

  private readonly backend: TerminalBackend;
  private readonly router: Router;
  readonly maxSessions: number;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly defaultShell: () => string;
  private readonly pollTimeoutMs: number;
  private readonly readChunkChars: number;

  constructor(options: SessionRegistryOptions) {
    this.backend = options.backend;
    this.router = options.router;
    this.maxSessions = options.maxSessions ?? MAX_SESSIONS;
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? defaultGenerateId;
    this.defaultShell = options.defaultShell ?? (() => getDefaultShell());
    this.pollTimeoutMs = options.pollTimeoutMs ?? PTY_POLL_TIMEOUT_MS;
    this.readChunkChars = options.readChunkChars ?? PTY_READ_CHUNK_CHARS;
  }

  /**
   * Create a session, start its process and its output pump.
   *
   * @returns the new session id
   * @throws CapacityExceededError when `maxSessions` sessions are hosted
   * @throws InvalidMessageError on non-positive geometry or malformed args
   * @throws ProcessStartError when the backend cannot spawn the command
   */
  create(params: CreateSessionParams = {}): string {
    return withSpanSync("session.create", (span) => {
      if (this.sessions.size >= this.maxSessions) {
        recordErrorMetric("capacity_exceeded");
        throw new CapacityExceededError(this.maxSessions);
      }

      const rows = params.rows ?? PTY_DEFAULT_ROWS;
      const cols = params.cols ?? PTY_DEFAULT_COLS;
      if (!isPositiveInt(rows) || !isPositiveInt(cols)) {
        throw new InvalidMessageError(`rows and cols must be positive integers (got ${rows}x${cols})`);
      }

      const { command, args } = parseCommandLine(params.command ?? this.defaultShell(), params.args);
      const sessionId = this.nextId();
      const session = createSessionRecord({
        sessionId,
        command,
        args,
        cwd: params.cwd ?? null,
        env: { ...params.env },
        rows,
        cols,
        now: this.clock(),
      });

      addPtyAttributes(span, { sessionId, rows, cols, command });

      if (!this.backend.startProcess(session)) {
        recordErrorMetric("process_start_failed");
        throw new ProcessStartError(command);
      }

      this.sessions.set(sessionId, session);
      this.startPump(session);
      recordSessionsActive(this.sessions.size);

      if (session.backendHandle) {
        span.setAttribute("pty.pid", session.backendHandle.pid);
      }
      logger.info(
        `Created session ${sessionId}: ${[command, ...args].join(" ")} (${cols}x${rows}, total: ${this.sessions.size})`
      );
      return sessionId;
    });
  }

  /**
   * Get a session by id, including one that is being destroyed.
   */
  get(sessionId: string): TerminalSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Get an active session or throw.
   * @throws SessionNotFoundError
   */
  require(sessionId: string): TerminalSession {
    const session = this.sessions.get(sessionId);
    if (!session || !session.active) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Ids of sessions that are active (not being destroyed).
   */
  listActive(): string[] {
    return this.list()
      .filter((session) => session.active)
      .map((session) => session.sessionId);
  }

  /**
   * Every session in the map.
   */
  list(): TerminalSession[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Refresh a session's last-activity timestamp.
   * @returns false when the session is unknown or inactive
   */
  touch(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || !session.active) {
      return false;
    }
    session.lastActivity = this.clock();
    return true;
  }

  /**
   * Destroy a session: deactivate it, stop and await its pump, release the
   * backend handle, notify its room, drop the room, then drop the entry.
   * Concurrent calls for one id share the same teardown.
   *
   * @returns false when the session does not exist
   */
  destroy(sessionId: string, reason: SessionCloseReason = "closed"): Promise<boolean> {
    const inFlight = this.destroying.get(sessionId);
    if (inFlight) {
      return inFlight;
    }

    const session = this.sessions.get(sessionId);
    if (!session) {
      return Promise.resolve(false);
    }

    session.active = false;
    const teardown = this.teardown(session, reason).finally(() => {
      this.destroying.delete(sessionId);
    });
    this.destroying.set(sessionId, teardown);
    return teardown;
  }

  /**
   * Destroy every session (server shutdown).
   */
  async destroyAll(reason: SessionCloseReason = "shutdown"): Promise<void> {
    const ids = Array.from(this.sessions.keys());
    await Promise.all(ids.map((id) => this.destroy(id, reason)));
    if (ids.length > 0) {
      logger.info(`Destroyed ${ids.length} session(s) (${reason})`);
    }
  }

  /**
   * Subscribe to session teardown notifications.
   * @returns unsubscribe function
   */
  onSessionClosed(listener: SessionClosedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Number of sessions in the map (including ones being destroyed).
   */
  get size(): number {
    return this.sessions.size;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private nextId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (!this.sessions.has(id) && !this.destroying.has(id)) {
        return id;
      }
      logger.debug(`Session id collision on ${id}, regenerating`);
    }
    throw new PtyHubError("BACKEND_IO_ERROR", "Could not generate a unique session id");
  }

  private startPump(session: TerminalSession): void {
    const sessionId = session.sessionId;
    const pump = new OutputPump(session, this.backend, this.router, {
      pollTimeoutMs: this.pollTimeoutMs,
      readChunkChars: this.readChunkChars,
      clock: this.clock,
    });
    this.pumps.set(sessionId, pump);

    pump
      .start()
      .then((outcome) => (outcome.reason === "exited" ? this.destroy(sessionId, "exited") : false))
      .catch((error) => {
        logger.error(`Teardown of session ${sessionId} failed`, error);
      });
  }

  private teardown(session: TerminalSession, reason: SessionCloseReason): Promise<boolean> {
    const sessionId = session.sessionId;

    return withSpan(
      "session.destroy",
      async () => {
        const pump = this.pumps.get(sessionId);
        if (pump) {
          pump.stop();
          await pump.done;
        }

        // A process still running at this point is terminated by us
        const exitCode = this.backend.isAlive(session) ? null : this.backend.exitCode(session);

        await this.backend.cleanup(session);

        if (!session.closeNotified) {
          session.closeNotified = true;
          this.router.emit(sessionId, {
            type: "session_closed",
            session_id: sessionId,
            exit_code: exitCode,
            reason,
          });
        }

        this.router.closeRoom(sessionId);
        this.pumps.delete(sessionId);
        this.sessions.delete(sessionId);
        recordSessionsActive(this.sessions.size);

        logger.info(`Destroyed session ${sessionId} (${reason}, remaining: ${this.sessions.size})`);
        this.notify({ sessionId, exitCode, reason });
        return true;
      },
      { "pty.session_id": sessionId, "session.close_reason": reason }
    );
  }

  private notify(event: SessionClosedEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`Session-closed listener failed for ${event.sessionId}`, error);
      }
    }
  }
}
