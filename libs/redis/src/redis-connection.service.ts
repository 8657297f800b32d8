import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisConnectionService: owns the lifecycle of the shared connection.
 *
 * The client is created with `lazyConnect`, so processes that never issue
 * a command (e.g. when rate limiting runs on the in-memory store) never
 * open a socket. On shutdown a connected client is closed with QUIT so
 * pending replies are flushed; an unused one is simply dropped.
 */
@Injectable()
export class RedisConnectionService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisConnectionService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  async onModuleDestroy(): Promise<void> {
    if (this.client.status === 'wait' || this.client.status === 'end') {
      this.client.disconnect();
      return;
    }

    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
