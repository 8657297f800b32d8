import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RedisModule } from '@taskapi/redis';
import { HealthController } from './health.controller';
import { RedisHealthIndicator } from './redis.health';

@Module({
  imports: [TerminusModule, RedisModule.forRoot()],
  controllers: [HealthController],
  providers: [RedisHealthIndicator],
})
export class HealthModule {}
