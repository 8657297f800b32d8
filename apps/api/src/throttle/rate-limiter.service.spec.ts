import { ConfigService } from '@nestjs/config';
import { RateLimiterService } from './rate-limiter.service';
import { MemoryRateLimitStore } from './stores/memory-rate-limit.store';

describe('RateLimiterService', () => {
  let now: number;
  let limiter: RateLimiterService;

  beforeEach(() => {
    now = 0;
    limiter = new RateLimiterService(
      new MemoryRateLimitStore(() => now),
      new ConfigService({ THROTTLE_AUTH_LIMIT: '2', THROTTLE_AUTH_TTL_SECONDS: '30' }),
    );
  });

  it('reads profile budgets from configuration, with defaults', () => {
    expect(limiter.profile('auth')).toEqual({ limit: 2, windowSeconds: 30 });
    expect(limiter.profile('api')).toEqual({ limit: 60, windowSeconds: 60 });
  });

  it('admits up to the limit and reports what is left', async () => {
    expect(await limiter.checkAndIncrement('k', 2, 30)).toEqual({
      allowed: true,
      limit: 2,
      remaining: 1,
    });
    expect(await limiter.checkAndIncrement('k', 2, 30)).toEqual({
      allowed: true,
      limit: 2,
      remaining: 0,
    });
  });

  it('rejects the request after the limit with the seconds left in the window', async () => {
    await limiter.checkAndIncrement('k', 2, 30);
    await limiter.checkAndIncrement('k', 2, 30);
    now = 12_500;

    expect(await limiter.checkAndIncrement('k', 2, 30)).toEqual({
      allowed: false,
      limit: 2,
      retryAfterSeconds: 18,
    });
  });

  it('never asks a client to wait less than a second', async () => {
    await limiter.checkAndIncrement('k', 1, 30);
    now = 29_999;

    expect(await limiter.checkAndIncrement('k', 1, 30)).toEqual({
      allowed: false,
      limit: 1,
      retryAfterSeconds: 1,
    });
  });
});
