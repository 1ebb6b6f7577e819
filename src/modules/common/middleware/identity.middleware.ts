import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ANONYMOUS_PRINCIPAL, requireRequestContext } from '../context/request-context';
import { extractBearerToken, maskCredential } from '../utils/auth.utils';

/**
 * Identity Middleware (authentication + authorization stage)
 *
 * Pass-through: records who the caller claims to be and lets every request
 * continue. It exists to fix the position of identity in the pipeline relative
 * to the correlation stage.
 */
@Injectable()
export class IdentityMiddleware implements NestMiddleware {
  use(req: Request, _res: Response, next: NextFunction): void {
    const context = requireRequestContext(req);
    const token = extractBearerToken(req);

    context.principal = token
      ? { kind: 'bearer', credential: maskCredential(token) }
      : ANONYMOUS_PRINCIPAL;

    context.getLogger(IdentityMiddleware.name).debug('Caller identity recorded', {
      principal: context.principal.kind,
    });

    next();
  }
}
