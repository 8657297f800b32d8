import { ExecutionContext, Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { isObservable, lastValueFrom } from 'rxjs';
import { ThrottleGuard } from '../../throttle';

const BEARER_HEADER = /^Bearer\s+\S+$/i;

/**
 * Bearer Authentication Guard: protects routes that require a principal.
 *
 * Usage:
 * ```ts
 * @UseGuards(BearerAuthGuard, ThrottleGuard)
 * @Get()
 * list(@CurrentUser() user: RequestUser) { ... }
 * ```
 *
 * Only the `Authorization: Bearer <token>` header is read; an `access_token`
 * query or body field is not a credential here. A failed attempt counts
 * against the route's throttle budget under the caller's address, so it
 * ends in 429 once that budget is spent.
 *
 * Overrides handleRequest so a missing token and a rejected token get
 * distinct messages instead of Passport's bare "Unauthorized".
 */
@Injectable()
export class BearerAuthGuard extends AuthGuard('bearer') {
  private readonly logger = new Logger(BearerAuthGuard.name);

  constructor(private readonly throttleGuard: ThrottleGuard) {
    super();
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    try {
      const request = context.switchToHttp().getRequest<Request>();
      if (!BEARER_HEADER.test(request.headers.authorization ?? '')) {
        throw new UnauthorizedException('Authentication token is missing');
      }

      const result = super.canActivate(context);
      return isObservable(result) ? await lastValueFrom(result) : await result;
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        await this.throttleGuard.chargeUnauthenticated(context);
      }
      throw error;
    }
  }

  handleRequest<TUser>(err: unknown, user: TUser | false): TUser {
    if (err) {
      const message = err instanceof Error ? err.message : 'Authentication failed';
      this.logger.debug(`Bearer auth rejected: ${message}`);
      throw err instanceof UnauthorizedException ? err : new UnauthorizedException(message);
    }

    if (!user) {
      throw new UnauthorizedException('Authentication token is missing');
    }

    return user;
  }
}
