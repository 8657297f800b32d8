import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';
import { RedisModule, REDIS_CLIENT } from '@taskapi/redis';
import { RATE_LIMIT_STORE } from './throttle.constants';
import { RateLimiterService } from './rate-limiter.service';
import { ThrottleGuard } from './throttle.guard';
import { MemoryRateLimitStore } from './stores/memory-rate-limit.store';
import { RedisRateLimitStore } from './stores/redis-rate-limit.store';
import type { RateLimitStore } from './stores/rate-limit-store.interface';

/**
 * ThrottleModule: fixed-window rate limiting for route groups.
 *
 * The counter store is chosen by RATE_LIMIT_STORE:
 * - `redis` (default): shared across instances, atomic MULTI/INCR
 * - `memory`: per-process Map, for single-instance runs and tests
 *
 * Import this module wherever a controller uses ThrottleGuard.
 */
@Module({
  imports: [RedisModule.forRoot()],
  providers: [
    {
      provide: RATE_LIMIT_STORE,
      inject: [ConfigService, REDIS_CLIENT],
      useFactory: (configService: ConfigService, redis: Redis): RateLimitStore => {
        const kind = configService.get<string>('RATE_LIMIT_STORE', 'redis');
        new Logger(ThrottleModule.name).log(`Rate limit store: ${kind}`);
        return kind === 'memory' ? new MemoryRateLimitStore() : new RedisRateLimitStore(redis);
      },
    },
    RateLimiterService,
    ThrottleGuard,
  ],
  exports: [RateLimiterService, ThrottleGuard],
})
export class ThrottleModule {}
