import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@taskapi/database';
import { StorageModule } from '../storage/storage.module';
import { TokensModule } from '../auth/tokens/tokens.module';
import { ThrottleModule } from '../throttle';
import { avatarUploadModule } from './avatar/avatar-upload.module';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

/**
 * UsersModule: credential store and the /user profile routes.
 *
 * Exports UsersService so AuthModule can register and authenticate
 * through it.
 */
@Module({
  imports: [
    ConfigModule,
    DatabaseModule.forFeature(),
    StorageModule,
    TokensModule,
    ThrottleModule,
    avatarUploadModule(),
  ],
  controllers: [UsersController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
