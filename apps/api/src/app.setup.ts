import type { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { createValidationPipe } from './common/validation';
import { getBoolean } from './common/config/config-values';

export const GLOBAL_PREFIX = 'api';

/**
 * Applies the HTTP-level setup shared by the server entry point and the
 * end-to-end tests: route prefix, global validation and proxy trust.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  const configService = app.get(ConfigService);

  app.setGlobalPrefix(GLOBAL_PREFIX);
  app.useGlobalPipes(createValidationPipe());

  // Behind a reverse proxy request.ip must come from X-Forwarded-For,
  // otherwise every client shares the proxy's throttle budget.
  if (getBoolean(configService, 'API_TRUST_PROXY', false)) {
    app.set('trust proxy', 1);
  }

  return app;
}
