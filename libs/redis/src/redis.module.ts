import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisConnectionService } from './redis-connection.service';

/**
 * RedisModule: provides one shared ioredis connection.
 *
 * Usage:
 *   RedisModule.forRoot()  in any feature module that needs Redis
 *
 * Exports:
 *   - REDIS_CLIENT: the raw ioredis instance, for atomic counters and
 *     MULTI pipelines
 */
@Module({})
export class RedisModule {
  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<string | number>('REDIS_PORT', 6379)),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: true,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider, RedisConnectionService],
      exports: [REDIS_CLIENT],
      global: false,
    };
  }
}
