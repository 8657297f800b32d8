import { DynamicModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { getNumber } from '../../common/config/config-values';
import { DEFAULT_AVATAR_MAX_SIZE_KB } from './avatar-image';

/**
 * Multer settings for routes that accept an `avatar` file.
 *
 * Memory storage keeps the buffer in RAM so it flows straight to MinIO.
 * The fileSize limit aborts an oversized upload while it is still
 * streaming (HTTP 413) instead of buffering it whole; AVATAR_MAX_SIZE_KB
 * sets it. Import into every module whose controller uses
 * `FileInterceptor('avatar')`.
 */
export function avatarUploadModule(): DynamicModule {
  return MulterModule.registerAsync({
    imports: [ConfigModule],
    inject: [ConfigService],
    useFactory: (configService: ConfigService) => ({
      storage: memoryStorage(),
      limits: {
        fileSize:
          getNumber(configService, 'AVATAR_MAX_SIZE_KB', DEFAULT_AVATAR_MAX_SIZE_KB) * 1024,
        files: 1,
      },
    }),
  });
}
