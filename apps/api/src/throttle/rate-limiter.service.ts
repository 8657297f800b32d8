import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RATE_LIMIT_STORE, ThrottleProfile, ThrottleProfileName } from './throttle.constants';
import type { RateLimitStore } from './stores/rate-limit-store.interface';
import { getNumber } from '../common/config/config-values';

export type RateLimitDecision =
  | { allowed: true; limit: number; remaining: number }
  | { allowed: false; limit: number; retryAfterSeconds: number };

/**
 * RateLimiterService: fixed-window admission decisions.
 *
 * Budgets per profile come from configuration:
 *   THROTTLE_AUTH_LIMIT / THROTTLE_AUTH_TTL_SECONDS  (default 5 per 60 s)
 *   THROTTLE_API_LIMIT  / THROTTLE_API_TTL_SECONDS   (default 60 per 60 s)
 */
@Injectable()
export class RateLimiterService {
  private readonly profiles: Record<ThrottleProfileName, ThrottleProfile>;

  constructor(
    @Inject(RATE_LIMIT_STORE)
    private readonly store: RateLimitStore,
    configService: ConfigService,
  ) {
    this.profiles = {
      auth: {
        limit: getNumber(configService, 'THROTTLE_AUTH_LIMIT', 5),
        windowSeconds: getNumber(configService, 'THROTTLE_AUTH_TTL_SECONDS', 60),
      },
      api: {
        limit: getNumber(configService, 'THROTTLE_API_LIMIT', 60),
        windowSeconds: getNumber(configService, 'THROTTLE_API_TTL_SECONDS', 60),
      },
    };
  }

  profile(name: ThrottleProfileName): ThrottleProfile {
    return this.profiles[name];
  }

  /**
   * Records one request for `key` and decides whether it is admitted.
   * The (limit + 1)th request inside a window is the first one rejected.
   */
  async checkAndIncrement(
    key: string,
    limit: number,
    windowSeconds: number,
  ): Promise<RateLimitDecision> {
    const { count, resetInMs } = await this.store.hit(key, windowSeconds * 1000);

    if (count > limit) {
      return {
        allowed: false,
        limit,
        retryAfterSeconds: Math.max(1, Math.ceil(resetInMs / 1000)),
      };
    }

    return { allowed: true, limit, remaining: limit - count };
  }
}
