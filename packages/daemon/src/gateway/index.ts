/**
 * PTY Gateway
 *
 * Provides:
 * - Session registry with capped, race-free lifecycle
 * - One output pump per session
 * - Room-based routing of output to attached connections
 * - Heartbeats and idle sweeping
 * - WebSocket transport for the event protocol
 */

// Main server
export { GatewayServer, WsConnection, CLOSE_CODES, sessionIdFromUrl } from "./gateway-server.js";

// Session model
export {
  createSessionRecord,
  toSessionInfo,
  type BackendHandle,
  type BackendPlatform,
  type SessionCloseReason,
  type SessionInfo,
  type TerminalSession,
} from "./session.js";

// Core components
export {
  SessionRegistry,
  type SessionClosedEvent,
  type SessionClosedListener,
  type SessionRegistryOptions,
} from "./session-registry.js";
export { OutputPump, type PumpOutcome, type OutputPumpOptions } from "./output-pump.js";
export { Router, type Connection } from "./router.js";
export {
  SessionLifecycleManager,
  type SessionLifecycleOptions,
  type SweptSession,
} from "./lifecycle-manager.js";
export { ProtocolHandler, type ProtocolHandlerDeps } from "./protocol-handler.js";

// Protocol
export {
  ClientMessageSchema,
  CreateSessionParamsSchema,
  ResizeParamsSchema,
  parseClientMessage,
  serializeServerMessage,
  type ClientMessage,
  type CreateSessionParams,
  type ServerMessage,
  type RequestId,
} from "./protocol.js";
