import { NestMiddleware, Type } from '@nestjs/common';
import type { CorrelationPlacement } from '../config/pipeline-options';
import { RequestContextMiddleware } from './request-context.middleware';
import { IdentityMiddleware } from './identity.middleware';
import { CorrelationIdMiddleware } from './correlation-id.middleware';
import { ApiVersionMiddleware } from './api-version.middleware';

/**
 * Ordered middleware stages of the request pipeline
 *
 * The context middleware always runs first and the route resolver always runs
 * last; identity and correlation swap according to the configured placement.
 * Validation and the handler follow inside the router.
 */
export function orderPipelineStages(placement: CorrelationPlacement): Type<NestMiddleware>[] {
  const identityAndCorrelation =
    placement === 'before-identity'
      ? [CorrelationIdMiddleware, IdentityMiddleware]
      : [IdentityMiddleware, CorrelationIdMiddleware];

  return [RequestContextMiddleware, ...identityAndCorrelation, ApiVersionMiddleware];
}
