/**
 * Configuration validation - checks the effective settings on startup.
 * Fails fast with clear error messages rather than silent runtime failures.
 */

import {
  MAX_SESSIONS,
  PTY_POLL_TIMEOUT_MS,
  PTY_READ_CHUNK_CHARS,
  PTY_TERMINATE_GRACE_MS,
} from "./pty.js";
import { API_PORT, GATEWAY_HOST, GATEWAY_PORT, SHUTDOWN_TIMEOUT_MS } from "./server.js";
import { SESSION_IDLE_TIMEOUT_MS, SESSION_SWEEP_INTERVAL_MS } from "./timeouts.js";

export interface ConfigError {
  field: string;
  message: string;
}

/** The settings validated at startup. */
export interface ConfigSnapshot {
  host: string;
  port: number;
  apiPort: number;
  maxSessions: number;
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  pollTimeoutMs: number;
  readChunkChars: number;
  terminateGraceMs: number;
  shutdownTimeoutMs: number;
}

const MAX_PORT = 65535;

/**
 * Snapshot of the configuration loaded from the environment.
 */
export function currentConfig(): ConfigSnapshot {
  return {
    host: GATEWAY_HOST,
    port: GATEWAY_PORT,
    apiPort: API_PORT,
    maxSessions: MAX_SESSIONS,
    idleTimeoutMs: SESSION_IDLE_TIMEOUT_MS,
    sweepIntervalMs: SESSION_SWEEP_INTERVAL_MS,
    pollTimeoutMs: PTY_POLL_TIMEOUT_MS,
    readChunkChars: PTY_READ_CHUNK_CHARS,
    terminateGraceMs: PTY_TERMINATE_GRACE_MS,
    shutdownTimeoutMs: SHUTDOWN_TIMEOUT_MS,
  };
}

/**
 * Validate configuration.
 * @returns Array of configuration errors (empty if valid)
 */
export function validateConfig(config: ConfigSnapshot = currentConfig()): ConfigError[] {
  const errors: ConfigError[] = [];

  if (config.port > MAX_PORT) {
    errors.push({ field: "PTYHUB_PORT", message: `Port out of range: ${config.port}` });
  }
  if (config.apiPort > MAX_PORT) {
    errors.push({ field: "PTYHUB_API_PORT", message: `Port out of range: ${config.apiPort}` });
  }
  if (config.port !== 0 && config.port === config.apiPort) {
    errors.push({
      field: "PTYHUB_API_PORT",
      message: `API port must differ from the gateway port (${config.port})`,
    });
  }
  if (config.sweepIntervalMs > config.idleTimeoutMs) {
    errors.push({
      field: "PTYHUB_SWEEP_INTERVAL_MS",
      message: `Sweep interval (${config.sweepIntervalMs}ms) exceeds idle timeout (${config.idleTimeoutMs}ms)`,
    });
  }
  if (config.pollTimeoutMs >= config.idleTimeoutMs) {
    errors.push({
      field: "PTYHUB_POLL_TIMEOUT_MS",
      message: `Poll timeout (${config.pollTimeoutMs}ms) must be shorter than the idle timeout`,
    });
  }

  return errors;
}

/**
 * Validate configuration or throw with detailed error message.
 * Call this early in startup to fail fast.
 */
export function validateConfigOrThrow(config: ConfigSnapshot = currentConfig()): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    const messages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Configuration validation failed:\n${messages}`);
  }
}

/**
 * Log configuration summary for debugging.
 */
export function logConfigSummary(config: ConfigSnapshot = currentConfig()): void {
  console.log("[CONFIG] Effective settings:");
  console.log(`  - gateway: ${config.host}:${config.port === 0 ? "auto" : config.port}`);
  console.log(`  - api port: ${config.apiPort}`);
  console.log(`  - max sessions: ${config.maxSessions}`);
  console.log(`  - idle timeout: ${config.idleTimeoutMs}ms (sweep every ${config.sweepIntervalMs}ms)`);
}
