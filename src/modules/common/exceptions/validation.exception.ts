import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Single violated constraint on a bound field
 */
export interface ValidationErrorDetail {
  /** Dotted path of the field, e.g. "shippingAddress" or "items.0.quantity" */
  property: string;
  value: unknown;
  constraint: string;
  message: string;
}

/**
 * Field name -> ordered, distinct violation messages
 */
export type FieldErrors = Record<string, string[]>;

export type ValidationResult =
  | { valid: true }
  | { valid: false; fieldErrors: FieldErrors };

/**
 * ValidationException
 *
 * Raised by AppValidationPipe when a bound DTO violates its constraints.
 * The exception boundary renders it as a validation envelope (400).
 */
export class ValidationException extends HttpException {
  public readonly fieldErrors: FieldErrors;

  constructor(public readonly validationErrors: ValidationErrorDetail[]) {
    const fieldErrors = groupByField(validationErrors);
    super(summarize(fieldErrors), HttpStatus.BAD_REQUEST);

    this.fieldErrors = fieldErrors;
    this.name = 'ValidationException';
  }

  toResult(): ValidationResult {
    return { valid: false, fieldErrors: this.fieldErrors };
  }
}

function groupByField(details: ValidationErrorDetail[]): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const detail of details) {
    const messages = (fieldErrors[detail.property] ??= []);
    if (!messages.includes(detail.message)) {
      messages.push(detail.message);
    }
  }
  return fieldErrors;
}

function summarize(fieldErrors: FieldErrors): string {
  const messages = Object.values(fieldErrors).flat();
  return messages.length > 0 ? messages.join(' ') : 'Validation failed.';
}
