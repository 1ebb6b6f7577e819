import { Inject, Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GlobalExceptionFilter } from './filters/global-exception.filter';
import {
  PIPELINE_OPTIONS,
  PipelineOptionsProvider,
  type PipelineOptions,
} from './config/pipeline-options';
import { orderPipelineStages } from './middleware/pipeline-order';

/**
 * Common Module
 *
 * The request pipeline shared by every feature module.
 *
 * Request Pipeline Order:
 * 1. GlobalExceptionFilter (APP_FILTER) - wraps everything below
 * 2. RequestContextMiddleware - per-request context, abort signal
 * 3. IdentityMiddleware / CorrelationIdMiddleware - order set by
 *    APP_CORRELATION_PLACEMENT (identity first by default)
 * 4. ApiVersionMiddleware - selects the API version for versioned resources
 * 5. AppValidationPipe (global pipe, see configureApp) - DTO validation
 * 6. Controllers - business logic
 */
@Module({
  providers: [
    PipelineOptionsProvider,
    {
      provide: APP_FILTER,
      useClass: GlobalExceptionFilter,
    },
  ],
  exports: [PIPELINE_OPTIONS],
})
export class CommonModule implements NestModule {
  constructor(@Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions) {}

  /**
   * Middleware executes BEFORE pipes and controllers; applied to all routes
   */
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(...orderPipelineStages(this.options.correlationPlacement))
      .forRoutes('*');
  }
}
