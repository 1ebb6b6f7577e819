import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  createErrorEnvelope,
  createValidationEnvelope,
  describeFault,
  PROBLEM_CONTENT_TYPE,
  type ErrorEnvelope,
  type ValidationEnvelope,
} from '../../../schemas/error-envelope.schema';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../config/pipeline-options';
import {
  CORRELATION_ID_HEADER,
  extractFromRequest,
  generateCorrelationId,
} from '../utils/correlation-id.utils';
import { ExceptionHandlerRegistry, type ClassifiedFault } from './exception-handlers.registry';

/**
 * Written when the boundary itself fails; contains nothing that could throw
 */
export const FALLBACK_ERROR_BODY =
  '{"status":500,"title":"Internal Server Error","detail":"An unexpected error occurred."}';

/**
 * Global Exception Filter (exception boundary)
 *
 * Outermost stage: every fault escaping middleware, the router, pipes or
 * handlers ends here and is rendered as exactly one ErrorEnvelope. It never
 * re-throws; if building the envelope fails, a hardcoded minimal 500 body is
 * written instead.
 *
 * Flow:
 * 1. Resolve the correlation ID (generating a fallback when the correlation
 *    stage never ran, e.g. body-parser failures)
 * 2. Classify the exception via ExceptionHandlerRegistry
 * 3. Render the envelope for the fault kind (validation faults get the
 *    validation envelope)
 * 4. Log 4xx as warnings and 5xx as errors, with the correlation ID
 */
@Catch()
@Injectable()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(@Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    try {
      const correlationId = this.getCorrelationId(request, response);
      const fault = ExceptionHandlerRegistry.classify(exception, request.context);
      const envelope = this.buildEnvelope(fault, exception, request, correlationId);

      this.logException(exception, fault, envelope, request);

      if (response.headersSent) {
        this.logger.warn('Response already started - error envelope not sent', {
          correlationId,
          status: envelope.status,
        });
        response.end();
        return;
      }

      response.status(envelope.status).type(PROBLEM_CONTENT_TYPE).json(envelope);
    } catch (boundaryError) {
      this.writeFallback(response, exception, boundaryError);
    }
  }

  /**
   * Correlation ID of the request, or a freshly assigned fallback
   *
   * Body-parser errors are raised before the pipeline middleware runs, so those
   * requests reach the boundary without an ID.
   */
  private getCorrelationId(request: Request, response: Response): string {
    const id = extractFromRequest(request);
    if (id) {
      return id;
    }

    const generatedId = generateCorrelationId();
    request.context?.assignCorrelationId(generatedId);
    if (!response.headersSent) {
      response.setHeader(CORRELATION_ID_HEADER, generatedId);
    }

    this.logger.warn('Correlation ID missing at exception boundary - generating fallback', {
      correlationId: generatedId,
      method: request.method,
      path: this.instanceOf(request),
    });

    return generatedId;
  }

  private buildEnvelope(
    fault: ClassifiedFault,
    exception: unknown,
    request: Request,
    correlationId: string,
  ): ErrorEnvelope | ValidationEnvelope {
    const diagnostics = this.diagnosticsOf(exception);
    const instance = this.instanceOf(request);

    if (fault.fieldErrors) {
      return createValidationEnvelope({
        detail: fault.message ?? '',
        instance,
        correlationId,
        errors: fault.fieldErrors,
        ...diagnostics,
      });
    }

    const descriptor = describeFault(fault.kind);
    const detail =
      descriptor.exposesMessage && fault.message ? fault.message : descriptor.fallbackDetail;

    return createErrorEnvelope({
      status: descriptor.status,
      title: descriptor.title,
      detail,
      instance,
      correlationId,
      ...diagnostics,
    });
  }

  /**
   * Exception type and stack trace, only when error details are exposed
   */
  private diagnosticsOf(exception: unknown): { exceptionType?: string; stackTrace?: string } {
    if (!this.options.exposeErrorDetails) {
      return {};
    }

    if (exception instanceof Error) {
      return { exceptionType: exception.constructor.name, stackTrace: exception.stack };
    }

    return { exceptionType: typeof exception };
  }

  private instanceOf(request: Request): string {
    return (request.originalUrl ?? request.url ?? '').split('?')[0];
  }

  /**
   * Log client errors (4xx) as warnings, server errors (5xx) as errors
   */
  private logException(
    exception: unknown,
    fault: ClassifiedFault,
    envelope: ErrorEnvelope,
    request: Request,
  ): void {
    const logContext = {
      correlationId: envelope.correlationId,
      method: request.method,
      path: envelope.instance,
      statusCode: envelope.status,
      faultKind: fault.kind,
    };

    if (fault.fieldErrors) {
      this.logger.warn('Model validation failed', {
        ...logContext,
        fieldErrors: fault.fieldErrors,
      });
      return;
    }

    const name = exception instanceof Error ? exception.constructor.name : typeof exception;
    const message = exception instanceof Error ? exception.message : String(exception);

    if (envelope.status >= 500) {
      this.logger.error(`HTTP ${envelope.status} ${envelope.title}: ${message}`, {
        ...logContext,
        exception: {
          name,
          message,
          stack: exception instanceof Error ? exception.stack : undefined,
        },
      });
    } else {
      this.logger.warn(`HTTP ${envelope.status} ${envelope.title}: ${message}`, {
        ...logContext,
        exception: { name, message },
      });
    }
  }

  private writeFallback(response: Response, exception: unknown, boundaryError: unknown): void {
    this.logger.error('Exception boundary failed to render an error envelope', {
      original: exception instanceof Error ? exception.message : String(exception),
      boundaryError: boundaryError instanceof Error ? boundaryError.message : String(boundaryError),
    });

    if (response.headersSent) {
      response.end();
      return;
    }

    response.status(500).type('application/json').send(FALLBACK_ERROR_BODY);
  }
}
