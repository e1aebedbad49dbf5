/**
 * Process bootstrap: load .env, then start telemetry. Imported first by the
 * daemon entry so both happen before the config modules read the environment.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import { initTelemetry } from "./telemetry/index.js";

// Load .env from the repository root (handles both src and dist execution)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPaths = [
  path.resolve(__dirname, "../../../.env"), // from packages/daemon/src/
  path.resolve(__dirname, "../../../../.env"), // from dist/daemon/src/
  path.resolve(process.cwd(), ".env"),
];
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

// Reads its settings at call time, after .env is applied
initTelemetry();
