/**
 * Correlation ID Middleware
 *
 * Source of the correlation ID for every request that reaches the pipeline.
 *
 * Responsibilities:
 * - Adopt X-Correlation-Id from the caller verbatim when present and non-empty
 * - Generate a UUID otherwise
 * - Assign it to the RequestContext (exactly once); the context's request
 *   logger carries it from here on
 * - Echo it on the response, including error responses
 * - Log "Request started" and, on every exit path, "Request completed"
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { requireRequestContext } from '../context/request-context';
import {
  CORRELATION_ID_HEADER,
  extractFromHeaders,
  generateCorrelationId,
} from '../utils/correlation-id.utils';

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const context = requireRequestContext(req);

    const existingId = extractFromHeaders(req);
    const correlationId = existingId ?? generateCorrelationId();

    context.assignCorrelationId(correlationId);
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const logger = context.getLogger(CorrelationIdMiddleware.name);
    const method = req.method;
    const path = req.originalUrl.split('?')[0];

    logger.log('Request started', {
      method,
      path,
      source: existingId ? 'upstream-header' : 'generated',
    });

    // 'finish' for sent responses, 'close' for aborted ones; log once either way
    let completed = false;
    const logCompletion = (): void => {
      if (completed) return;
      completed = true;

      logger.log('Request completed', {
        method,
        path,
        statusCode: res.statusCode,
        durationMs: context.elapsedMs(),
        finished: res.writableFinished,
      });
    };
    res.once('finish', logCompletion);
    res.once('close', logCompletion);

    next();
  }
}
