/**
 * Telemetry configuration for OpenTelemetry export over OTLP/HTTP.
 *
 * Export is enabled only when PTYHUB_OTLP_ENDPOINT is set.
 */

/** Internal flag to avoid repeated warnings (mutable) */
let _warnedDisabled = false;

export const TELEMETRY_CONFIG = {
  /** Service name reported to the collector */
  serviceName: "ptyhub-daemon",

  /** Environment variable holding the collector base URL */
  endpointEnvVar: "PTYHUB_OTLP_ENDPOINT",

  /** Environment variable holding an optional Authorization header value */
  tokenEnvVar: "PTYHUB_OTLP_TOKEN",

  /** Check if telemetry should be enabled (logs once if disabled) */
  enabled: (): boolean => {
    const hasEndpoint = !!process.env.PTYHUB_OTLP_ENDPOINT;
    if (!hasEndpoint && !_warnedDisabled) {
      console.warn("[TELEMETRY] PTYHUB_OTLP_ENDPOINT not set - telemetry disabled");
      _warnedDisabled = true;
    }
    return hasEndpoint;
  },

  /** Get the collector base URL without a trailing slash */
  getEndpoint: (): string | undefined => process.env.PTYHUB_OTLP_ENDPOINT?.replace(/\/+$/, ""),

  /** Get the optional auth token */
  getToken: (): string | undefined => process.env.PTYHUB_OTLP_TOKEN,

  /** Get deployment environment name */
  getEnvironment: (): string => process.env.NODE_ENV || "local",

  /** Metric collection interval (ms) */
  metricsIntervalMs: 60000,
} as const;
