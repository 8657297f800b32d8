import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { UsersModule } from '../users/users.module';
import { ThrottleModule } from '../throttle';
import { avatarUploadModule } from '../users/avatar/avatar-upload.module';
import { TokensModule } from './tokens/tokens.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { BearerStrategy } from './strategies/bearer.strategy';

/**
 * AuthModule: encapsulates authentication.
 *
 * Provides:
 * - Opaque bearer token issuing and revocation (via TokensModule)
 * - Passport bearer strategy for route protection
 * - REST endpoints for register/login/logout
 *
 * The BearerStrategy is registered here but works globally via Passport:
 * any module can use @UseGuards(BearerAuthGuard) without importing AuthModule.
 */
@Module({
  imports: [
    UsersModule,
    TokensModule,
    ThrottleModule,
    PassportModule.register({ defaultStrategy: 'bearer' }),
    avatarUploadModule(),
  ],
  controllers: [AuthController],
  providers: [AuthService, BearerStrategy],
  exports: [AuthService, PassportModule],
})
export class AuthModule {}
