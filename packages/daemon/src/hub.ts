/**
 * Wiring for one hub instance: backend, router, registry, lifecycle and
 * protocol handler, created once and shared by reference.
 */

import { createBackend } from "./backend/index.js";
import type { TerminalBackend } from "./backend/types.js";
import { SessionLifecycleManager } from "./gateway/lifecycle-manager.js";
import { ProtocolHandler } from "./gateway/protocol-handler.js";
import { Router } from "./gateway/router.js";
import { SessionRegistry } from "./gateway/session-registry.js";

export interface PtyHubOptions {
  /** Defaults to the backend for the current platform */
  backend?: TerminalBackend;
  maxSessions?: number;
  idleTimeoutMs?: number;
  sweepIntervalMs?: number;
  pollTimeoutMs?: number;
  readChunkChars?: number;
  clock?: () => number;
  generateId?: () => string;
  attachOnCreate?: boolean;
}

export interface PtyHub {
  backend: TerminalBackend;
  router: Router;
  registry: SessionRegistry;
  lifecycle: SessionLifecycleManager;
  handler: ProtocolHandler;
  /** Stop sweeping and destroy every session. */
  shutdown(): Promise<void>;
}

export function createPtyHub(options: PtyHubOptions = {}): PtyHub {
  const backend = options.backend ?? createBackend();
  const router = new Router();
  const registry = new SessionRegistry({
    backend,
    router,
    maxSessions: options.maxSessions,
    clock: options.clock,
    generateId: options.generateId,
    pollTimeoutMs: options.pollTimeoutMs,
    readChunkChars: options.readChunkChars,
  });
  const lifecycle = new SessionLifecycleManager(registry, backend, {
    idleTimeoutMs: options.idleTimeoutMs,
    sweepIntervalMs: options.sweepIntervalMs,
    clock: options.clock,
  });
  const handler = new ProtocolHandler({
    registry,
    router,
    backend,
    lifecycle,
    attachOnCreate: options.attachOnCreate,
  });

  return {
    backend,
    router,
    registry,
    lifecycle,
    handler,
    shutdown: async () => {
      lifecycle.stop();
      await registry.destroyAll("shutdown");
    },
  };
}
