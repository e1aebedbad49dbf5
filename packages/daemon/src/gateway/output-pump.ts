/**
 * OutputPump - one background loop per active session.
 *
 * Polls the session's backend, forwards output to the session's room and
 * reports process death with a single `session_closed`. The pump never
 * releases backend resources itself; the registry does that once `done`
 * settles.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { PTY_POLL_TIMEOUT_MS, PTY_READ_CHUNK_CHARS } from "../config/index.js";
import type { TerminalBackend } from "../backend/types.js";
import { BackendIOError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { delay } from "../utils/timeout.js";
import type { Router } from "./router.js";
import type { TerminalSession } from "./session.js";

export type PumpOutcome =
  | { reason: "exited"; exitCode: number | null }
  | { reason: "stopped" };

export interface OutputPumpOptions {
  pollTimeoutMs?: number;
  readChunkChars?: number;
  clock?: () => number;
}

export class OutputPump {
  private stopped = false;
  private running: Promise<PumpOutcome> | null = null;
  private readonly pollTimeoutMs: number;
  private readonly readChunkChars: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly session: TerminalSession,
    private readonly backend: TerminalBackend,
    private readonly router: Router,
    options: OutputPumpOptions = {}
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs ?? PTY_POLL_TIMEOUT_MS;
    this.readChunkChars = options.readChunkChars ?? PTY_READ_CHUNK_CHARS;
    this.clock = options.clock ?? Date.now;
    this.logger = createLogger("PUMP").child(session.sessionId);
  }

  /**
   * Start the loop. Calling start() again returns the same run.
   */
  start(): Promise<PumpOutcome> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  /**
   * Ask the loop to finish. It observes the request within one poll timeout.
   */
  stop(): void {
    this.stopped = true;
  }

  /**
   * Settles once the loop has exited. Never rejects.
   */
  get done(): Promise<PumpOutcome> {
    return this.running ?? Promise.resolve({ reason: "stopped" });
  }

  private shouldRun(): boolean {
    return !this.stopped && this.session.active;
  }

  private async run(): Promise<PumpOutcome> {
    const { session, backend } = this;
    const sessionId = session.sessionId;

    while (this.shouldRun()) {
      let ready = false;
      try {
        ready = await backend.poll(session, this.pollTimeoutMs);
      } catch (error) {
        this.logger.error(new BackendIOError(sessionId, "poll", error).message);
        await delay(this.pollTimeoutMs);
      }

      if (!this.shouldRun()) break;

      if (ready) {
        let output: string | null = null;
        try {
          output = backend.readOutput(session, this.readChunkChars);
        } catch (error) {
          this.logger.error(new BackendIOError(sessionId, "read", error).message);
        }
        if (output) {
          session.lastActivity = this.clock();
          this.router.emit(sessionId, { type: "pty-output", session_id: sessionId, output });
        }
      } else if (!backend.isAlive(session)) {
        const exitCode = backend.exitCode(session);
        this.notifyClosed(exitCode);
        this.logger.info(`Process exited (code=${exitCode ?? "unknown"})`);
        return { reason: "exited", exitCode };
      }

      await yieldToEventLoop();
    }

    this.logger.debug("Stopped");
    return { reason: "stopped" };
  }

  private notifyClosed(exitCode: number | null): void {
    if (this.session.closeNotified) return;
    this.session.closeNotified = true;
    this.router.emit(this.session.sessionId, {
      type: "session_closed",
      session_id: this.session.sessionId,
      exit_code: exitCode,
      reason: "exited",
    });
  }
}
