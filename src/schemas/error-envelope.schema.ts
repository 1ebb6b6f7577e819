import { z } from 'zod';

/**
 * Error envelope schemas (problem-details shape, served as application/problem+json)
 *
 * Every failed request produces exactly one envelope, built at the exception
 * boundary. Envelopes are parsed through these schemas before they are written,
 * so a malformed envelope surfaces as a ZodError inside the boundary instead of
 * reaching the client.
 */

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export const VALIDATION_PROBLEM_TYPE = 'https://tools.ietf.org/html/rfc7231#section-6.5.1';
export const VALIDATION_PROBLEM_TITLE = 'One or more validation errors occurred.';

/**
 * Fault taxonomy. Each kind maps to exactly one status and title.
 */
export const FAULT_KINDS = [
  'InvalidInput',
  'OperationNotAllowed',
  'AccessDenied',
  'NotFound',
  'Timeout',
  'ServiceUnavailable',
  'Unexpected',
] as const;

export type FaultKind = (typeof FAULT_KINDS)[number];

export interface FaultDescriptor {
  status: number;
  title: string;
  /** Detail used when the fault carries no public message */
  fallbackDetail: string;
  /** Whether the fault's own message may be shown to the caller */
  exposesMessage: boolean;
}

export const MISSING_ARGUMENT_DETAIL = 'A required parameter was not provided.';

/**
 * Status/title/detail policy per fault kind
 */
export function describeFault(kind: FaultKind): FaultDescriptor {
  switch (kind) {
    case 'InvalidInput':
      return {
        status: 400,
        title: 'Invalid Input',
        fallbackDetail: 'The request contains an invalid value.',
        exposesMessage: true,
      };
    case 'OperationNotAllowed':
      return {
        status: 409,
        title: 'Operation Not Allowed',
        fallbackDetail: 'The requested operation cannot be performed in the current state.',
        exposesMessage: false,
      };
    case 'AccessDenied':
      return {
        status: 403,
        title: 'Access Denied',
        fallbackDetail: 'You do not have permission to perform this action.',
        exposesMessage: false,
      };
    case 'NotFound':
      return {
        status: 404,
        title: 'Resource Not Found',
        fallbackDetail: 'The requested resource could not be found.',
        exposesMessage: true,
      };
    case 'Timeout':
      return {
        status: 408,
        title: 'Request Timeout',
        fallbackDetail: 'The operation took too long to complete.',
        exposesMessage: false,
      };
    case 'ServiceUnavailable':
      return {
        status: 503,
        title: 'Service Unavailable',
        fallbackDetail: 'The service is temporarily unavailable.',
        exposesMessage: false,
      };
    case 'Unexpected':
      return {
        status: 500,
        title: 'Internal Server Error',
        fallbackDetail:
          'An unexpected error occurred. Please contact support with the correlation ID.',
        exposesMessage: false,
      };
  }
}

export const ErrorEnvelopeSchema = z.object({
  status: z.number().int().min(400).max(599),
  title: z.string().min(1),
  detail: z.string(),
  instance: z.string(),
  correlationId: z.string().min(1),
  timestamp: z.string().datetime(),
  exceptionType: z.string().optional(),
  stackTrace: z.string().optional(),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

export const ValidationEnvelopeSchema = ErrorEnvelopeSchema.extend({
  type: z.literal(VALIDATION_PROBLEM_TYPE),
  status: z.literal(400),
  errors: z.record(z.string(), z.array(z.string())),
});

export type ValidationEnvelope = z.infer<typeof ValidationEnvelopeSchema>;

/**
 * Build and validate an ErrorEnvelope
 *
 * Optional diagnostic fields are dropped when undefined so the production
 * payload carries no exceptionType/stackTrace keys at all.
 */
export function createErrorEnvelope(
  input: Omit<ErrorEnvelope, 'timestamp'> & { timestamp?: string },
): ErrorEnvelope {
  const { exceptionType, stackTrace, ...rest } = input;
  return ErrorEnvelopeSchema.parse({
    ...rest,
    timestamp: input.timestamp ?? new Date().toISOString(),
    ...(exceptionType !== undefined && { exceptionType }),
    ...(stackTrace !== undefined && { stackTrace }),
  });
}

export function createValidationEnvelope(
  input: Omit<ValidationEnvelope, 'timestamp' | 'type' | 'status' | 'title'> & {
    timestamp?: string;
  },
): ValidationEnvelope {
  const { exceptionType, stackTrace, ...rest } = input;
  return ValidationEnvelopeSchema.parse({
    ...rest,
    type: VALIDATION_PROBLEM_TYPE,
    status: 400,
    title: VALIDATION_PROBLEM_TITLE,
    timestamp: input.timestamp ?? new Date().toISOString(),
    ...(exceptionType !== undefined && { exceptionType }),
    ...(stackTrace !== undefined && { stackTrace }),
  });
}
