/**
 * Session lifetime constants (milliseconds).
 */

import { parsePositiveInt } from "./helpers.js";

/** Time without activity or heartbeat before a session is destroyed (1 hour) */
export const SESSION_IDLE_TIMEOUT_MS = parsePositiveInt(
  process.env.PTYHUB_IDLE_TIMEOUT_MS,
  60 * 60 * 1000
);

/** Interval between idle/dead session sweeps (1 minute) */
export const SESSION_SWEEP_INTERVAL_MS = parsePositiveInt(
  process.env.PTYHUB_SWEEP_INTERVAL_MS,
  60 * 1000
);
