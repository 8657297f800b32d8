import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@taskapi/database';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { TasksModule } from './tasks/tasks.module';
import { getBoolean, getNumber } from './common/config/config-values';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: getNumber(configService, 'POSTGRES_PORT', 5432),
        username: configService.get<string>('POSTGRES_USER', 'taskapi'),
        password: configService.get<string>('POSTGRES_PASSWORD', 'taskapi_secret'),
        database: configService.get<string>('POSTGRES_DB', 'taskapi'),
        entities: DatabaseModule.entities,
        migrations: DatabaseModule.migrations,
        migrationsRun: getBoolean(configService, 'DB_MIGRATIONS_RUN', false),
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    UsersModule,
    TasksModule,
  ],
})
export class AppModule {}
