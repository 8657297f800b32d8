/** Metadata key written by @Throttle() and read by ThrottleGuard */
export const THROTTLE_PROFILE_KEY = 'throttle:profile';

/** Injection token for the active RateLimitStore implementation */
export const RATE_LIMIT_STORE = 'RATE_LIMIT_STORE';

/**
 * Route groups with their own budget:
 * - auth: anonymous register/login, strict, keyed by IP
 * - api:  authenticated traffic, keyed by user id (IP fallback)
 */
export type ThrottleProfileName = 'auth' | 'api';

export interface ThrottleProfile {
  limit: number;
  windowSeconds: number;
}
