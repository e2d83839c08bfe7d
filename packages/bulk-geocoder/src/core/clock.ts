/**
 * Time source used by rate limiters and retry backoff.
 * Injected so tests can advance time without real waits.
 */
export interface Clock {
  /** Milliseconds since an arbitrary origin, non-decreasing */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) =>
    ms <= 0 ? Promise.resolve() : new Promise((resolve) => setTimeout(resolve, ms)),
};
