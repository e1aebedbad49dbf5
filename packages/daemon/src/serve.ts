#!/usr/bin/env node
/**
 * ptyhub daemon
 *
 * Starts the PTY gateway (WebSocket) and the REST API, and tears every
 * session down on SIGINT/SIGTERM.
 */

import "./instrument.js";

import { serve } from "@hono/node-server";
import { shutdownTelemetry } from "./telemetry/index.js";
import { logConfigSummary, validateConfigOrThrow } from "./config/validation.js";
import { API_PORT, GATEWAY_HOST, SHUTDOWN_TIMEOUT_MS } from "./config/index.js";
import { createApiRouter } from "./api/router.js";
import { GatewayServer } from "./gateway/gateway-server.js";
import { createPtyHub } from "./hub.js";
import { colors, paint } from "./utils/colors.js";
import { getErrorMessage } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";
import { withTimeout } from "./utils/timeout.js";

const logger = createLogger("SERVE");

async function main(): Promise<void> {
  validateConfigOrThrow();
  logConfigSummary();

  const hub = createPtyHub();
  const gateway = new GatewayServer({ handler: hub.handler, registry: hub.registry });
  const gatewayPort = await gateway.start();
  hub.lifecycle.start();

  hub.registry.onSessionClosed(({ sessionId, exitCode, reason }) => {
    logger.info(`Session ${sessionId} ended (${reason}, exit code ${exitCode ?? "n/a"})`);
  });

  const app = createApiRouter({
    registry: hub.registry,
    lifecycle: hub.lifecycle,
    backend: hub.backend,
    getSessionUrl: (sessionId) => gateway.getSessionUrl(sessionId),
  });

  const apiServer = serve({
    fetch: app.fetch,
    port: API_PORT,
    hostname: GATEWAY_HOST,
  });

  console.log(`Gateway: ${paint("cyan", `ws://${GATEWAY_HOST}:${gatewayPort}/pty`)}`);
  console.log(`API:     ${paint("cyan", `http://${GATEWAY_HOST}:${API_PORT}`)}`);
  console.log(`${colors.green}✓${colors.reset} Ready (${hub.backend.platform} backend)`);
  console.log(`${colors.dim}Press Ctrl+C to exit${colors.reset}`);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log();
    logger.info(`${signal} received, shutting down...`);

    let exitCode = 0;
    try {
      await withTimeout(
        (async () => {
          await hub.shutdown();
          await gateway.stop();
          apiServer.close();
          await shutdownTelemetry();
        })(),
        SHUTDOWN_TIMEOUT_MS,
        "Shutdown"
      );
    } catch (error) {
      logger.error("Shutdown did not complete cleanly", error);
      exitCode = 1;
    } finally {
      process.exit(exitCode);
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error(`Fatal error during shutdown: ${getErrorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
