import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { RequestContext, requireRequestContext } from '../context/request-context';

/**
 * Request Context Parameter Decorator
 *
 * Injects the RequestContext created by the pipeline middleware, giving the
 * handler its correlation ID, API version, AbortSignal and request logger.
 *
 * @example
 * ```typescript
 * @Post()
 * create(@Body() dto: CreateIncidentDto, @ReqContext() context: RequestContext) {
 *   return this.service.create(dto, context);
 * }
 * ```
 */
export const ReqContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return requireRequestContext(request);
  },
);
