/**
 * Gateway and API server configuration.
 */

import { parsePositiveInt, readEnvString } from "./helpers.js";

/** Host both servers bind to */
export const GATEWAY_HOST = readEnvString(process.env.PTYHUB_HOST, "127.0.0.1");

/** Port for the WebSocket gateway (0 picks a free port) */
export const GATEWAY_PORT = parsePositiveInt(process.env.PTYHUB_PORT, 4460, 0);

/** Path the WebSocket gateway accepts upgrades on */
export const GATEWAY_PATH = "/pty";

/** Port for the HTTP API */
export const API_PORT = parsePositiveInt(process.env.PTYHUB_API_PORT, 4461);

/** Maximum time to wait for graceful shutdown (ms) */
export const SHUTDOWN_TIMEOUT_MS = parsePositiveInt(process.env.PTYHUB_SHUTDOWN_TIMEOUT_MS, 5000);

/**
 * Construct the WebSocket URL a client uses to attach to a session.
 */
export function getGatewayUrl(host: string, port: number, sessionId?: string): string {
  const base = `ws://${host}:${port}${GATEWAY_PATH}`;
  return sessionId ? `${base}?session_id=${encodeURIComponent(sessionId)}` : base;
}
