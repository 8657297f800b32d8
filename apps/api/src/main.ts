import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp, GLOBAL_PREFIX } from './app.setup';
import { getNumber } from './common/config/config-values';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);
  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>('API_CORS_ORIGIN', 'http://localhost:3000');
  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = getNumber(configService, 'API_PORT', 4000);
  await app.listen(port);

  logger.log(`Task API running on http://localhost:${port}/${GLOBAL_PREFIX}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
