import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy } from 'passport-http-bearer';
import { AccessTokenService } from '../tokens/access-token.service';
import type { RequestUser } from '../interfaces';

/**
 * Bearer Strategy: validates opaque tokens on protected routes.
 *
 * Flow:
 * 1. Passport extracts the token from `Authorization: Bearer <token>`
 * 2. validate() looks up the token digest (one lookup per request)
 * 3. The owning user is attached to request.user as a RequestUser
 *
 * Requests without a Bearer Authorization header never reach Passport:
 * BearerAuthGuard answers them with a 401 first. A request that also sends
 * an `access_token` field carries two tokens, which Passport fails.
 */
@Injectable()
export class BearerStrategy extends PassportStrategy(Strategy, 'bearer') {
  private readonly logger = new Logger(BearerStrategy.name);

  constructor(private readonly accessTokenService: AccessTokenService) {
    super();
  }

  async validate(plainTextToken: string): Promise<RequestUser> {
    const result = await this.accessTokenService.validate(plainTextToken);

    if (!result) {
      this.logger.debug('Bearer validation failed: unknown, revoked or expired token');
      throw new UnauthorizedException('Invalid or revoked authentication token');
    }

    return {
      userId: result.user.id,
      email: result.user.email,
      tokenId: result.token.id,
    };
  }
}
