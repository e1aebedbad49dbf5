/**
 * OpenTelemetry SDK initialization for the daemon.
 *
 * Exports traces and metrics to an OTLP/HTTP collector.
 * Must be called at the very start of the application, before other imports.
 */

import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";
import { createLogger } from "../utils/logger.js";

// Use string literals for semantic conventions to avoid version incompatibilities
const ATTR_SERVICE_NAME = "service.name";
const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment";
const ATTR_SERVICE_VERSION = "service.version";

const logger = createLogger("TELEMETRY");

let sdk: NodeSDK | null = null;
let initialized = false;

/**
 * Initialize the OpenTelemetry SDK.
 *
 * Call this at the very start of your application, before other imports
 * that might need instrumentation (e.g., http).
 */
export function initTelemetry(): void {
  if (initialized) {
    logger.debug("Telemetry already initialized");
    return;
  }

  const endpoint = TELEMETRY_CONFIG.enabled() ? TELEMETRY_CONFIG.getEndpoint() : undefined;
  if (!endpoint) {
    logger.info(`Telemetry disabled (${TELEMETRY_CONFIG.endpointEnvVar} not set)`);
    initialized = true;
    return;
  }

  const token = TELEMETRY_CONFIG.getToken();
  const headers: Record<string, string> = token ? { Authorization: token } : {};

  const traceExporter = new OTLPTraceExporter({
    url: `${endpoint}/v1/traces`,
    headers,
  });

  const metricExporter = new OTLPMetricExporter({
    url: `${endpoint}/v1/metrics`,
    headers,
  });

  const metricReader = new PeriodicExportingMetricReader({
    exporter: metricExporter,
    exportIntervalMillis: TELEMETRY_CONFIG.metricsIntervalMs,
  });

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: TELEMETRY_CONFIG.serviceName,
    [ATTR_DEPLOYMENT_ENVIRONMENT]: TELEMETRY_CONFIG.getEnvironment(),
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version || "0.0.0",
  });

  sdk = new NodeSDK({
    resource,
    traceExporter,
    metricReader,
    instrumentations: [
      new HttpInstrumentation({
        // Health checks would drown out real traffic
        ignoreIncomingRequestHook: (req) => req.url === "/health",
      }),
    ],
  });

  sdk.start();
  initialized = true;

  logger.info(
    `Telemetry initialized for service: ${TELEMETRY_CONFIG.serviceName} (${TELEMETRY_CONFIG.getEnvironment()})`
  );
}

/**
 * Gracefully shutdown the OpenTelemetry SDK, flushing pending data.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }

  try {
    await sdk.shutdown();
    logger.info("Telemetry shutdown complete");
  } catch (error) {
    logger.error("Error shutting down telemetry", error);
  } finally {
    sdk = null;
  }
}

// Re-export span helpers and metrics
export { withSpan, withSpanSync, recordError, addPtyAttributes } from "./spans.js";
export {
  getMetrics,
  recordSessionsActive,
  recordGatewayConnections,
  recordError as recordErrorMetric,
} from "./metrics.js";
