import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { RequestContext } from '../context/request-context';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';

/**
 * Request Context Middleware (dispatcher entry)
 *
 * First middleware of every request. Creates the RequestContext and arms its
 * AbortSignal: it fires when the client disconnects before the response is
 * finished, or when APP_REQUEST_TIMEOUT elapses.
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(@Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const context = new RequestContext();
    req.context = context;

    const deadline = setTimeout(
      () => context.abort('deadline-exceeded'),
      this.options.requestTimeoutMs,
    );
    deadline.unref();

    res.once('finish', () => clearTimeout(deadline));
    res.once('close', () => {
      clearTimeout(deadline);
      if (!res.writableFinished) {
        context.abort('client-disconnected');
      }
    });

    next();
  }
}
