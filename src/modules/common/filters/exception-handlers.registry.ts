import { HttpException } from '@nestjs/common';
import { ZodError } from 'zod';
import type { FaultKind } from '../../../schemas/error-envelope.schema';
import { BusinessException } from '../../../common/exceptions/business-exceptions';
import { ValidationException, type FieldErrors } from '../exceptions/validation.exception';
import type { RequestContext } from '../context/request-context';
import { isTimeoutError, toHttpErrorLike } from '../utils/error-detection.utils';

/**
 * Fault produced by classification
 *
 * `message` is the fault's own text; the boundary shows it only for kinds
 * whose descriptor allows it. `fieldErrors` marks a validation fault.
 */
export interface ClassifiedFault {
  kind: FaultKind;
  message?: string;
  fieldErrors?: FieldErrors;
}

/**
 * Exception Handler Strategy Pattern
 *
 * Each handler detects whether it can classify an exception (canHandle) and
 * turns it into a ClassifiedFault (handle). Handlers run in priority order
 * (lowest number first); the first match wins, so specific handlers
 * (BusinessException, ValidationException) sit before generic ones
 * (HttpException, Error).
 */
export interface ExceptionHandler {
  canHandle(exception: unknown, context?: RequestContext): boolean;

  handle(exception: unknown): ClassifiedFault;

  /** Execution priority (lower = higher priority) */
  priority: number;

  name: string;
}

/**
 * Map an HTTP status raised by the framework or a library to a fault kind
 */
export function kindForStatus(status: number): FaultKind {
  switch (status) {
    case 400:
    case 422:
      return 'InvalidInput';
    case 401:
    case 403:
      return 'AccessDenied';
    case 404:
    case 405:
      return 'NotFound';
    case 408:
      return 'Timeout';
    case 409:
      return 'OperationNotAllowed';
    case 503:
      return 'ServiceUnavailable';
    default:
      return status >= 500 ? 'Unexpected' : 'InvalidInput';
  }
}

/**
 * BusinessException already carries its kind
 */
export class BusinessExceptionHandler implements ExceptionHandler {
  priority = 1;
  name = 'BusinessExceptionHandler';

  canHandle(exception: unknown): boolean {
    return exception instanceof BusinessException;
  }

  handle(exception: unknown): ClassifiedFault {
    if (!(exception instanceof BusinessException)) {
      return { kind: 'Unexpected' };
    }
    return { kind: exception.kind, message: exception.message };
  }
}

export class ValidationExceptionHandler implements ExceptionHandler {
  priority = 2;
  name = 'ValidationExceptionHandler';

  canHandle(exception: unknown): boolean {
    return exception instanceof ValidationException;
  }

  handle(exception: unknown): ClassifiedFault {
    if (!(exception instanceof ValidationException)) {
      return { kind: 'Unexpected' };
    }
    return {
      kind: 'InvalidInput',
      message: exception.message,
      fieldErrors: exception.fieldErrors,
    };
  }
}

/**
 * Remaining NestJS HttpExceptions (NotFoundException from the router,
 * ParseUUIDPipe failures, ServiceUnavailableException from health checks...)
 */
export class HttpExceptionHandler implements ExceptionHandler {
  priority = 3;
  name = 'HttpExceptionHandler';

  canHandle(exception: unknown): boolean {
    return exception instanceof HttpException;
  }

  handle(exception: unknown): ClassifiedFault {
    if (!(exception instanceof HttpException)) {
      return { kind: 'Unexpected' };
    }
    return { kind: kindForStatus(exception.getStatus()), message: exception.message };
  }
}

export class ZodErrorHandler implements ExceptionHandler {
  priority = 4;
  name = 'ZodErrorHandler';

  canHandle(exception: unknown): boolean {
    return exception instanceof ZodError;
  }

  handle(exception: unknown): ClassifiedFault {
    if (!(exception instanceof ZodError)) {
      return { kind: 'Unexpected' };
    }
    const message = exception.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { kind: 'InvalidInput', message };
  }
}

/**
 * Cancellation and deadline faults
 *
 * Anything raised after the request's AbortSignal fired is treated as a
 * timeout, whatever the awaited operation threw.
 */
export class TimeoutErrorHandler implements ExceptionHandler {
  priority = 5;
  name = 'TimeoutErrorHandler';

  canHandle(exception: unknown, context?: RequestContext): boolean {
    return isTimeoutError(exception) || context?.aborted === true;
  }

  handle(): ClassifiedFault {
    return { kind: 'Timeout' };
  }
}

/**
 * HTTP-error-like objects raised outside NestJS (body parser)
 */
export class HttpErrorLikeHandler implements ExceptionHandler {
  priority = 6;
  name = 'HttpErrorLikeHandler';

  canHandle(exception: unknown): boolean {
    const httpError = toHttpErrorLike(exception);
    return httpError !== undefined && httpError.status < 500;
  }

  handle(exception: unknown): ClassifiedFault {
    const httpError = toHttpErrorLike(exception);
    if (!httpError) {
      return { kind: 'Unexpected' };
    }
    return {
      kind: kindForStatus(httpError.status),
      message: httpError.expose ? httpError.message : undefined,
    };
  }
}

/**
 * Fallback for everything else (lowest priority)
 */
export class UnknownExceptionHandler implements ExceptionHandler {
  priority = 99;
  name = 'UnknownExceptionHandler';

  canHandle(): boolean {
    return true;
  }

  handle(): ClassifiedFault {
    return { kind: 'Unexpected' };
  }
}

/**
 * Exception Handler Registry
 *
 * Central, priority-sorted list of handlers used by GlobalExceptionFilter.
 */
export class ExceptionHandlerRegistry {
  private static readonly handlers: readonly ExceptionHandler[] = [
    new BusinessExceptionHandler(),
    new ValidationExceptionHandler(),
    new HttpExceptionHandler(),
    new ZodErrorHandler(),
    new TimeoutErrorHandler(),
    new HttpErrorLikeHandler(),
    new UnknownExceptionHandler(),
  ].sort((a, b) => a.priority - b.priority);

  static getAll(): ExceptionHandler[] {
    return [...this.handlers];
  }

  /**
   * Find the first handler that can process the exception
   */
  static findHandler(exception: unknown, context?: RequestContext): ExceptionHandler {
    return (
      this.handlers.find((handler) => handler.canHandle(exception, context)) ??
      new UnknownExceptionHandler()
    );
  }

  static classify(exception: unknown, context?: RequestContext): ClassifiedFault {
    return this.findHandler(exception, context).handle(exception);
  }
}
