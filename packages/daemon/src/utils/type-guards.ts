/**
 * Type guards for safer type narrowing.
 *
 * These replace type assertions (as X) with runtime checks.
 */

/**
 * Check if a value is a plain object (Record<string, unknown>)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a Node.js system error carrying an errno code (e.g. ESRCH).
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
