import { ValidationPipe, ValidationPipeOptions } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { ValidationExceptionFactory } from '../factories/validation-exception.factory';

/**
 * Options every request body/query DTO is validated with
 *
 * - whitelist + forbidNonWhitelisted: unknown properties are violations
 * - stopAtFirstError: false so the caller sees every violation at once
 * - validateCustomDecorators: false because @ReqContext() injects the request
 *   context, which is not a DTO
 */
export const DEFAULT_VALIDATION_OPTIONS: ValidationPipeOptions = {
  whitelist: true,
  forbidNonWhitelisted: true,
  transform: true,
  stopAtFirstError: false,
  forbidUnknownValues: true,
  validateCustomDecorators: false,
};

/**
 * AppValidationPipe
 *
 * ValidationPipe whose failures are always a structured ValidationException,
 * so the exception boundary renders one validation envelope format regardless
 * of which constraint (including whitelist checks) failed.
 *
 * Usage (in configureApp):
 * ```typescript
 * app.useGlobalPipes(new AppValidationPipe());
 * ```
 */
export class AppValidationPipe extends ValidationPipe {
  constructor(options?: ValidationPipeOptions) {
    super({
      ...DEFAULT_VALIDATION_OPTIONS,
      ...options,
      exceptionFactory: (errors: ValidationError[]) => ValidationExceptionFactory.create(errors),
    });
  }
}
