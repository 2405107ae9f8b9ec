/**
 * Delay utilities for request pacing
 */

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for a fixed number of milliseconds (no-op for 0 or less)
 */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
