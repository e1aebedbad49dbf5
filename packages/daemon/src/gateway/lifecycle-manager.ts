/**
 * SessionLifecycleManager - heartbeats and the periodic idle/dead sweep.
 *
 * Idleness is measured from `lastActivity`, which output, input and
 * heartbeats all refresh. Connection state plays no part: a session nobody
 * is attached to survives as long as someone heartbeats it.
 */

import { SESSION_IDLE_TIMEOUT_MS, SESSION_SWEEP_INTERVAL_MS } from "../config/index.js";
import type { TerminalBackend } from "../backend/types.js";
import { createLogger } from "../utils/logger.js";
import type { SessionRegistry } from "./session-registry.js";
import type { SessionCloseReason } from "./session.js";

const logger = createLogger("LIFECYCLE");

export interface SweptSession {
  sessionId: string;
  reason: Extract<SessionCloseReason, "idle_timeout" | "exited">;
}

export interface SessionLifecycleOptions {
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  clock?: () => number;
}

export class SessionLifecycleManager {
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<SweptSession[]> | null = null;
  readonly idleTimeoutMs: number;
  readonly sweepIntervalMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly backend: TerminalBackend,
    options: SessionLifecycleOptions = {}
  ) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? SESSION_IDLE_TIMEOUT_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? SESSION_SWEEP_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Record a heartbeat for a session.
   * @returns false when the session is unknown or already closing
   */
  heartbeat(sessionId: string): boolean {
    const ok = this.registry.touch(sessionId);
    if (ok) {
      logger.debug(`Heartbeat for ${sessionId}`);
    }
    return ok;
  }

  /**
   * Destroy sessions that are idle past the timeout, whose process is no
   * longer alive, or that were left inactive.
   * @returns the sessions destroyed by this sweep
   */
  sweep(now: number = this.clock()): Promise<SweptSession[]> {
    // Overlapping timer ticks share one sweep
    if (this.sweeping) {
      return this.sweeping;
    }
    this.sweeping = this.runSweep(now).finally(() => {
      this.sweeping = null;
    });
    return this.sweeping;
  }

  /**
   * Start the periodic sweep.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((error) => {
        logger.error("Sweep failed", error);
      });
    }, this.sweepIntervalMs);
    this.timer.unref();
    logger.info(
      `Sweeping every ${this.sweepIntervalMs / 1000}s (idle timeout ${this.idleTimeoutMs / 1000}s)`
    );
  }

  /**
   * Stop the periodic sweep.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  private async runSweep(now: number): Promise<SweptSession[]> {
    const swept: SweptSession[] = [];

    for (const session of this.registry.list()) {
      if (!session.active || !this.backend.isAlive(session)) {
        swept.push({ sessionId: session.sessionId, reason: "exited" });
      } else if (now - session.lastActivity > this.idleTimeoutMs) {
        swept.push({ sessionId: session.sessionId, reason: "idle_timeout" });
      }
    }

    await Promise.all(swept.map(({ sessionId, reason }) => this.registry.destroy(sessionId, reason)));

    if (swept.length > 0) {
      logger.info(`Swept ${swept.length} session(s): ${swept.map((s) => `${s.sessionId}=${s.reason}`).join(", ")}`);
    }
    return swept;
  }
}
