import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Not, Repository } from 'typeorm';
import { createHash, randomBytes } from 'crypto';
import { AccessToken, User } from '@taskapi/database';
import { getNumber } from '../../common/config/config-values';

/** Random bytes per token; 40 bytes → 54 base64url characters */
const TOKEN_BYTES = 40;

/** Label stored on tokens issued by the login endpoint */
export const LOGIN_TOKEN_NAME = 'auth_token';

export interface IssuedToken {
  /** Returned to the client once; only its digest is stored */
  plainTextToken: string;
  token: AccessToken;
  /** Seconds until expiry, or null when tokens live until revoked */
  expiresIn: number | null;
}

export interface ValidatedToken {
  user: User;
  token: AccessToken;
}

/** SHA-256 hex digest, the only form in which a token is persisted. */
export function hashToken(plainTextToken: string): string {
  return createHash('sha256').update(plainTextToken).digest('hex');
}

/**
 * AccessTokenService: issues, validates and revokes opaque bearer tokens.
 *
 * Lifecycle: Issued → Valid → Revoked (row deleted). When TOKEN_TTL_SECONDS
 * is greater than zero tokens also expire; with the default of 0 they stay
 * valid until revoked.
 */
@Injectable()
export class AccessTokenService {
  private readonly logger = new Logger(AccessTokenService.name);
  private readonly ttlSeconds: number;

  constructor(
    @InjectRepository(AccessToken)
    private readonly tokenRepository: Repository<AccessToken>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    configService: ConfigService,
  ) {
    this.ttlSeconds = getNumber(configService, 'TOKEN_TTL_SECONDS', 0);
  }

  async issue(user: Pick<User, 'id'>, name: string = LOGIN_TOKEN_NAME): Promise<IssuedToken> {
    const plainTextToken = randomBytes(TOKEN_BYTES).toString('base64url');
    const expiresAt =
      this.ttlSeconds > 0 ? new Date(Date.now() + this.ttlSeconds * 1000) : null;

    const token = await this.tokenRepository.save(
      this.tokenRepository.create({
        userId: user.id,
        name,
        tokenHash: hashToken(plainTextToken),
        lastUsedAt: null,
        expiresAt,
      }),
    );

    this.logger.debug(`Issued token ${token.id} for user ${user.id}`);

    return {
      plainTextToken,
      token,
      expiresIn: this.ttlSeconds > 0 ? this.ttlSeconds : null,
    };
  }

  /**
   * Resolves a plaintext token to its live owner.
   * Returns null for unknown, revoked or expired tokens and for tokens
   * whose user no longer exists.
   */
  async validate(plainTextToken: string): Promise<ValidatedToken | null> {
    if (!plainTextToken) {
      return null;
    }

    const token = await this.tokenRepository.findOne({
      where: { tokenHash: hashToken(plainTextToken) },
    });

    if (!token) {
      return null;
    }

    if (token.expiresAt && token.expiresAt.getTime() <= Date.now()) {
      this.logger.debug(`Token ${token.id} expired, pruning`);
      await this.tokenRepository.delete({ id: token.id });
      return null;
    }

    const user = await this.userRepository.findOne({ where: { id: token.userId } });
    if (!user) {
      this.logger.warn(`Token ${token.id} belongs to missing user ${token.userId}`);
      return null;
    }

    const lastUsedAt = new Date();
    await this.tokenRepository.update({ id: token.id }, { lastUsedAt });
    token.lastUsedAt = lastUsedAt;

    return { user, token };
  }

  /** Deletes a token. Revoking an unknown or already revoked token is a no-op. */
  async revoke(tokenId: string): Promise<void> {
    const result = await this.tokenRepository.delete({ id: tokenId });
    if (result.affected) {
      this.logger.debug(`Revoked token ${tokenId}`);
    }
  }

  /**
   * Revokes every token of a user, optionally sparing the one in use.
   * @returns number of tokens revoked
   */
  async revokeAllForUser(userId: string, exceptTokenId?: string): Promise<number> {
    const result = await this.tokenRepository.delete(
      exceptTokenId ? { userId, id: Not(exceptTokenId) } : { userId },
    );
    const revoked = result.affected ?? 0;
    this.logger.log(`Revoked ${revoked} token(s) for user ${userId}`);
    return revoked;
  }
}
