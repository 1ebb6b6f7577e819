import { INestApplication, Logger, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import type { Environment } from './config/environment.schema';
import { getHelmetConfig } from './config/helmet.config';
import { contextOf } from './modules/common/context/request-context';
import { AppValidationPipe } from './modules/common/pipes/app-validation.pipe';
import { CORRELATION_ID_HEADER } from './modules/common/utils/correlation-id.utils';
import {
  API_VERSION_HEADER,
  SUPPORTED_VERSIONS_HEADER,
} from './modules/common/versioning/api-version';

/**
 * Application-level configuration shared by main.ts and the integration tests
 *
 * Everything that cannot be expressed as a module provider lives here:
 * versioning, the global validation pipe, CORS and security headers.
 */
export function configureApp(
  app: INestApplication,
  config: ConfigService<Environment, true>,
): void {
  const logger = new Logger('AppSetup');

  // ApiVersionMiddleware has already resolved the version; routing only reads it
  app.enableVersioning({
    type: VersioningType.CUSTOM,
    extractor: (request: unknown): string => contextOf(request)?.apiVersion ?? '',
  });

  app.useGlobalPipes(new AppValidationPipe());

  const allowedOrigins = config.get('APP_CORS_ALLOWED_ORIGINS', { infer: true });
  const allowAllOrigins = allowedOrigins.length === 1 && allowedOrigins[0] === '*';

  app.enableCors({
    origin: allowAllOrigins ? true : allowedOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_ID_HEADER, API_VERSION_HEADER],
    exposedHeaders: [CORRELATION_ID_HEADER, SUPPORTED_VERSIONS_HEADER, 'Location'],
  });

  if (allowAllOrigins) {
    logger.warn('CORS configured to allow all origins - use only in development');
  }

  if (config.get('APP_ENABLE_HELMET', { infer: true })) {
    app.use(helmet(getHelmetConfig(config.get('APP_SWAGGER_ENABLED', { infer: true }))));
  } else {
    logger.warn('Helmet security headers DISABLED - not recommended for production');
  }
}
