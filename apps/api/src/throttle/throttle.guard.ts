import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { RateLimiterService } from './rate-limiter.service';
import { THROTTLE_PROFILE_KEY, ThrottleProfileName } from './throttle.constants';
import { RateLimitExceededException } from './exceptions';
import type { RequestUser } from '../auth/interfaces';

/**
 * ThrottleGuard: admits or rejects a request against its route group budget.
 *
 * The counter key is `throttle:<profile>:user:<id>` once a bearer guard has
 * resolved the principal, otherwise `throttle:<profile>:ip:<address>`.
 * For per-user limits, list this guard after BearerAuthGuard; requests that
 * fail authentication there are charged by address via chargeUnauthenticated.
 *
 * Sets X-RateLimit-Limit / X-RateLimit-Remaining on admitted requests and
 * Retry-After on rejected ones.
 */
@Injectable()
export class ThrottleGuard implements CanActivate {
  private readonly logger = new Logger(ThrottleGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request & { user?: RequestUser }>();
    await this.admit(context, this.principalKey(request));
    return true;
  }

  /**
   * Counts a request that failed bearer authentication against the route's
   * budget under the caller's address. Throws RateLimitExceededException
   * once that budget is spent.
   */
  async chargeUnauthenticated(context: ExecutionContext): Promise<void> {
    const request = context.switchToHttp().getRequest<Request>();
    await this.admit(context, this.addressKey(request));
  }

  private async admit(context: ExecutionContext, principalKey: string): Promise<void> {
    const profileName = this.reflector.getAllAndOverride<ThrottleProfileName | undefined>(
      THROTTLE_PROFILE_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!profileName) {
      return;
    }

    const response = context.switchToHttp().getResponse<Response>();

    const { limit, windowSeconds } = this.rateLimiter.profile(profileName);
    const key = `throttle:${profileName}:${principalKey}`;
    const decision = await this.rateLimiter.checkAndIncrement(key, limit, windowSeconds);

    response.setHeader('X-RateLimit-Limit', String(decision.limit));

    if (!decision.allowed) {
      response.setHeader('X-RateLimit-Remaining', '0');
      response.setHeader('Retry-After', String(decision.retryAfterSeconds));
      this.logger.warn(`Rate limit exceeded for ${key}, retry in ${decision.retryAfterSeconds}s`);
      throw new RateLimitExceededException(decision.retryAfterSeconds);
    }

    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));
  }

  private principalKey(request: Request & { user?: RequestUser }): string {
    if (request.user) {
      return `user:${request.user.userId}`;
    }
    return this.addressKey(request);
  }

  private addressKey(request: Request): string {
    return `ip:${request.ip ?? request.socket.remoteAddress ?? 'unknown'}`;
  }
}
