export { ThrottleModule } from './throttle.module';
export { ThrottleGuard } from './throttle.guard';
export { Throttle } from './throttle.decorator';
export { RateLimiterService } from './rate-limiter.service';
export type { RateLimitDecision } from './rate-limiter.service';
export { RATE_LIMIT_STORE } from './throttle.constants';
export type { ThrottleProfileName } from './throttle.constants';
export { MemoryRateLimitStore } from './stores/memory-rate-limit.store';
export type { RateLimitStore, RateLimitHit } from './stores/rate-limit-store.interface';
