/** Resolves after `ms` milliseconds. Injected wherever tests need to skip the wait. */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
