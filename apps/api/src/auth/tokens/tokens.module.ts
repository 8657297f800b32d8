import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@taskapi/database';
import { AccessTokenService } from './access-token.service';

/**
 * TokensModule: the token issuer/validator, shared by AuthModule
 * (login, logout, bearer strategy) and UsersModule (password change).
 */
@Module({
  imports: [ConfigModule, DatabaseModule.forFeature()],
  providers: [AccessTokenService],
  exports: [AccessTokenService],
})
export class TokensModule {}
