/** Counter state right after a hit has been recorded. */
export interface RateLimitHit {
  /** Hits in the current window, including this one */
  count: number;
  /** Milliseconds until the current window closes */
  resetInMs: number;
}

/**
 * Counter backend for fixed-window rate limiting.
 *
 * `hit` must open a window if none is active and increment its counter
 * as one atomic step, so concurrent requests for the same key never
 * lose an increment.
 */
export interface RateLimitStore {
  hit(key: string, windowMs: number): Promise<RateLimitHit>;
}
