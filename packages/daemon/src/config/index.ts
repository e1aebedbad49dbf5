/**
 * Centralized configuration for the daemon.
 * All tunable constants and environment variables are defined here.
 *
 * This module re-exports from domain-specific config files:
 * - pty.ts: PTY backend and session limits
 * - server.ts: Gateway/API binding and shutdown
 * - timeouts.ts: Idle timeout and sweep interval
 * - telemetry.ts: OpenTelemetry export
 */

// Helpers (also exported for use by other modules)
export { parsePositiveInt, readEnvString } from "./helpers.js";

// PTY
export {
  MAX_SESSIONS,
  PTY_DEFAULT_ROWS,
  PTY_DEFAULT_COLS,
  PTY_TERM_NAME,
  PTY_POLL_TIMEOUT_MS,
  PTY_READ_CHUNK_CHARS,
  PTY_TERMINATE_GRACE_MS,
  SESSION_ID_LENGTH,
} from "./pty.js";

// Server lifecycle
export {
  GATEWAY_HOST,
  GATEWAY_PORT,
  GATEWAY_PATH,
  API_PORT,
  SHUTDOWN_TIMEOUT_MS,
  getGatewayUrl,
} from "./server.js";

// Timeouts
export { SESSION_IDLE_TIMEOUT_MS, SESSION_SWEEP_INTERVAL_MS } from "./timeouts.js";

// Telemetry
export { TELEMETRY_CONFIG } from "./telemetry.js";
