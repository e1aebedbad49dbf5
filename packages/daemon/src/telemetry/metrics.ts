/**
 * Custom metrics for daemon observability.
 */

import { metrics, type Meter, type Counter, type ObservableGauge } from "@opentelemetry/api";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";

let meter: Meter | null = null;

// Metric instruments (lazily initialized)
let sessionsActiveGauge: ObservableGauge | null = null;
let gatewayConnectionsGauge: ObservableGauge | null = null;
let errorsCounter: Counter | null = null;

// Observable values (updated externally)
let activeSessionsCount = 0;
let gatewayConnectionsCount = 0;

/**
 * Get or create the metrics instance.
 */
export function getMetrics(): Meter {
  if (!meter) {
    meter = metrics.getMeter(TELEMETRY_CONFIG.serviceName);
    initializeMetrics(meter);
  }
  return meter;
}

function initializeMetrics(m: Meter): void {
  // Observable gauges - values are read at collection time
  sessionsActiveGauge = m.createObservableGauge("ptyhub.sessions.active", {
    description: "Number of hosted PTY sessions",
    unit: "{sessions}",
  });
  sessionsActiveGauge.addCallback((result) => {
    result.observe(activeSessionsCount);
  });

  gatewayConnectionsGauge = m.createObservableGauge("ptyhub.gateway.connections", {
    description: "Number of open WebSocket connections",
    unit: "{connections}",
  });
  gatewayConnectionsGauge.addCallback((result) => {
    result.observe(gatewayConnectionsCount);
  });

  errorsCounter = m.createCounter("ptyhub.errors.count", {
    description: "Total number of errors by type",
    unit: "{errors}",
  });
}

/**
 * Update the hosted sessions count.
 */
export function recordSessionsActive(count: number): void {
  getMetrics();
  activeSessionsCount = count;
}

/**
 * Update the gateway connections count.
 */
export function recordGatewayConnections(count: number): void {
  getMetrics();
  gatewayConnectionsCount = count;
}

/**
 * Record an error occurrence.
 */
export function recordError(errorType: string, attributes?: Record<string, string>): void {
  getMetrics();
  errorsCounter?.add(1, { error_type: errorType, ...attributes });
}
