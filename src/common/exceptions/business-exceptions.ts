import { HttpException } from '@nestjs/common';
import {
  describeFault,
  MISSING_ARGUMENT_DETAIL,
  type FaultKind,
} from '../../schemas/error-envelope.schema';

/**
 * Business Exception
 *
 * Tagged fault raised by handlers and pipeline stages. Carries its FaultKind so
 * the exception boundary can render it without inspecting the class hierarchy.
 * The message of a BusinessException is safe to show to the caller.
 *
 * Usage:
 * ```typescript
 * throw BusinessException.notFound(`No incident exists with ID: ${id}`);
 * throw new BusinessException('Timeout', 'Enrichment did not finish in time');
 * ```
 */
export class BusinessException extends HttpException {
  public readonly kind: FaultKind;
  public readonly details?: Record<string, unknown>;

  constructor(kind: FaultKind, message?: string, details?: Record<string, unknown>) {
    const descriptor = describeFault(kind);
    super(message ?? descriptor.fallbackDetail, descriptor.status);

    this.kind = kind;
    this.details = details;
    this.name = 'BusinessException';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  static invalidInput(message: string, details?: Record<string, unknown>): BusinessException {
    return new BusinessException('InvalidInput', message, details);
  }

  /** A required argument was absent */
  static missingArgument(argumentName: string): BusinessException {
    return new BusinessException('InvalidInput', MISSING_ARGUMENT_DETAIL, { argumentName });
  }

  static operationNotAllowed(message?: string): BusinessException {
    return new BusinessException('OperationNotAllowed', message);
  }

  static accessDenied(message?: string): BusinessException {
    return new BusinessException('AccessDenied', message);
  }

  static notFound(message?: string): BusinessException {
    return new BusinessException('NotFound', message);
  }

  static timeout(message?: string): BusinessException {
    return new BusinessException('Timeout', message);
  }
}
