/**
 * Shared Redis infrastructure for the task API.
 *
 * Exports:
 *   - RedisModule.forRoot()  import into any NestJS module
 *   - REDIS_CLIENT           ioredis injection token
 */
export { RedisModule } from './redis.module';
export { REDIS_CLIENT } from './redis.constants';
