/**
 * Public entry of the daemon package for embedding the hub in another
 * Node.js process.
 */

export { createPtyHub, type PtyHub, type PtyHubOptions } from "./hub.js";
export { createApiRouter } from "./api/router.js";
export type { RouterDependencies } from "./api/types.js";
export * from "./backend/index.js";
export * from "./gateway/index.js";
export * from "./utils/errors.js";
export { createLogger, type Logger } from "./utils/logger.js";
