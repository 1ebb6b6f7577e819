import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment, shouldExposeErrorDetails } from '../../../config/environment.schema';
import type { VersionPrecedence } from '../versioning/api-version';

export type CorrelationPlacement = 'after-identity' | 'before-identity';

/**
 * Request pipeline settings, resolved once from the validated environment
 */
export interface PipelineOptions {
  defaultVersion: string;
  precedence: VersionPrecedence;
  correlationPlacement: CorrelationPlacement;
  requestTimeoutMs: number;
  exposeErrorDetails: boolean;
}

/**
 * Pipeline Options Provider Token
 *
 * Injected by the pipeline middleware, the exception boundary and CommonModule.
 * Tests replace the provider to exercise other settings without touching the
 * process environment.
 */
export const PIPELINE_OPTIONS = Symbol('PIPELINE_OPTIONS');

export function buildPipelineOptions(config: ConfigService<Environment, true>): PipelineOptions {
  return {
    defaultVersion: config.get('APP_DEFAULT_API_VERSION', { infer: true }),
    precedence: config.get('APP_VERSION_PRECEDENCE', { infer: true }),
    correlationPlacement: config.get('APP_CORRELATION_PLACEMENT', { infer: true }),
    requestTimeoutMs: config.get('APP_REQUEST_TIMEOUT', { infer: true }),
    exposeErrorDetails: shouldExposeErrorDetails({
      NODE_ENV: config.get('NODE_ENV', { infer: true }),
      APP_EXPOSE_ERROR_DETAILS: config.get('APP_EXPOSE_ERROR_DETAILS', { infer: true }),
    }),
  };
}

export const PipelineOptionsProvider: Provider = {
  provide: PIPELINE_OPTIONS,
  useFactory: buildPipelineOptions,
  inject: [ConfigService],
};
