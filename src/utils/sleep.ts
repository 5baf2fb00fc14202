/**
 * Waits for the given number of milliseconds.
 *
 * Used for retry backoff and rate-limit pacing; tests mock this module to skip the wait.
 *
 * @example
 * await sleep(1_500);
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
