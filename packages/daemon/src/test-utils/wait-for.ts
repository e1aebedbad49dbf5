/**
 * Event waiting utilities for asynchronous testing.
 */

/**
 * Wait for a condition to become true.
 *
 * @param condition - Function that returns true when condition is met
 * @param options - Timeout and polling interval options
 * @throws Error if timeout is reached
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: { timeout?: number; interval?: number; message?: string } = {}
): Promise<void> {
  const { timeout = 2000, interval = 5, message = "Condition not met" } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    const result = await condition();
    if (result) return;
    await sleep(interval);
  }

  throw new Error(`Timeout after ${timeout}ms: ${message}`);
}

/**
 * Wait for a specific duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
