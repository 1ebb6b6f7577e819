import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { Environment } from './config/environment.schema';
import { setupSwagger } from './config/swagger.config';

async function bootstrap() {
  // Environment validation is handled by ConfigModule.forRoot({ validate })
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService<Environment, true>);
  const logger = new Logger('Bootstrap');

  configureApp(app, configService);

  const swaggerEnabled = configService.get('APP_SWAGGER_ENABLED', { infer: true });

  if (swaggerEnabled) {
    const paths = setupSwagger(app, configService.get('APP_SWAGGER_SERVER_URL', { infer: true }));
    logger.log(`Swagger documentation enabled at ${paths.map((path) => `/${path}`).join(', ')}`);
  } else {
    logger.log('Swagger documentation disabled');
  }

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
}

/**
 * Errors that escape bootstrap() and the exception boundary
 *
 * Both handlers exit with code 1 so the process supervisor restarts the service.
 */
process.on('unhandledRejection', (reason: unknown) => {
  const logger = new Logger('Process');
  logger.error(
    `Unhandled Promise Rejection: ${reason instanceof Error ? reason.message : String(reason)}`,
  );

  if (reason instanceof Error && reason.stack) {
    logger.error(`Stack trace:\n${reason.stack}`);
  }

  process.exit(1);
});

process.on('uncaughtException', (error: Error) => {
  const logger = new Logger('Process');
  logger.error(`Uncaught Exception: ${error.message}`);

  if (error.stack) {
    logger.error(`Stack trace:\n${error.stack}`);
  }

  process.exit(1);
});

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');

  const errorName = error instanceof Error ? error.name : 'Unknown';
  const errorMessage = error instanceof Error ? error.message : String(error);

  logger.error(`Fatal error during application bootstrap - ${errorName}: ${errorMessage}`);

  if (errorMessage.includes('EADDRINUSE')) {
    logger.error('Port already in use - stop the other process or change PORT in .env');
  }

  if (error instanceof Error && error.stack) {
    logger.error(`Stack trace:\n${error.stack}`);
  }

  process.exit(1);
});
