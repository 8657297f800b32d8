/**
 * Injection token for the shared ioredis connection.
 *
 * String-based so consumers can inject the raw client with
 * `@Inject(REDIS_CLIENT)` without depending on a wrapper class.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';
