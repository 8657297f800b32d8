import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckService,
  HealthIndicatorFunction,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { RedisHealthIndicator } from './redis.health';

/**
 * GET /api/health: unauthenticated liveness probe.
 *
 * Checks the database, and Redis when it backs the rate limiter.
 */
@Controller('health')
export class HealthController {
  private readonly checks: HealthIndicatorFunction[];

  constructor(
    private readonly health: HealthCheckService,
    db: TypeOrmHealthIndicator,
    redis: RedisHealthIndicator,
    configService: ConfigService,
  ) {
    this.checks = [() => db.pingCheck('database', { timeout: 3000 })];

    if (configService.get<string>('RATE_LIMIT_STORE', 'redis') === 'redis') {
      this.checks.push(() => redis.pingCheck('redis'));
    }
  }

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check(this.checks);
  }
}
