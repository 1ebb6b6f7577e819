import { ValidationError } from 'class-validator';
import {
  ValidationException,
  type ValidationErrorDetail,
} from '../exceptions/validation.exception';

const PRESENCE_CONSTRAINTS: ReadonlySet<string> = new Set(['isDefined', 'isNotEmpty']);

/**
 * ValidationExceptionFactory
 *
 * Creates a structured ValidationException from class-validator errors.
 * Every violated constraint becomes one detail, in the order the constraints
 * are declared on the DTO; nested properties use dotted paths. A missing value
 * reports only its presence constraint.
 *
 * Used as exceptionFactory in AppValidationPipe:
 * ```typescript
 * new ValidationPipe({
 *   exceptionFactory: (errors) => ValidationExceptionFactory.create(errors),
 * })
 * ```
 */
export class ValidationExceptionFactory {
  static create(errors: ValidationError[]): ValidationException {
    return new ValidationException(this.extractValidationErrors(errors));
  }

  /**
   * Flatten class-validator errors (including nested children) into details
   */
  static extractValidationErrors(
    errors: ValidationError[],
    parentPath = '',
  ): ValidationErrorDetail[] {
    const details: ValidationErrorDetail[] = [];

    for (const error of errors) {
      const property = parentPath ? `${parentPath}.${error.property}` : error.property;

      for (const [constraint, message] of this.declaredConstraints(error)) {
        details.push({ property, value: error.value, constraint, message });
      }

      if (error.children && error.children.length > 0) {
        details.push(...this.extractValidationErrors(error.children, property));
      }
    }

    return details;
  }

  /**
   * Violated constraints in declaration order
   *
   * Stacked decorators register bottom-up, so class-validator reports them in
   * reverse. When a presence constraint failed, the others are noise.
   */
  private static declaredConstraints(error: ValidationError): [string, string][] {
    const entries = Object.entries(error.constraints ?? {}).reverse();
    const presence = entries.filter(([constraint]) => PRESENCE_CONSTRAINTS.has(constraint));
    return presence.length > 0 ? presence : entries;
  }
}
