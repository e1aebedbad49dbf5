/**
 * Type definitions for the API router.
 */

import type { TerminalBackend } from "../backend/types.js";
import type { SessionLifecycleManager } from "../gateway/lifecycle-manager.js";
import type { SessionRegistry } from "../gateway/session-registry.js";

export interface RouterDependencies {
  registry: SessionRegistry;
  lifecycle: SessionLifecycleManager;
  backend: TerminalBackend;
  /** WebSocket URL that attaches to a session; throws for unknown ids */
  getSessionUrl: (sessionId: string) => string;
}
