/**
 * Type-safe error detection utilities
 *
 * Structured property checks (error.name, error.code, status) instead of
 * message parsing, so detection survives library message changes.
 */

/**
 * Node.js Error with code property
 * System errors (network, timers, streams) have error.code
 */
export interface NodeError extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
}

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && 'code' in error;
}

/**
 * Check if error signals cancellation or an exceeded deadline
 *
 * Covers:
 * - AbortError / ABORT_ERR: a timer or stream observed an aborted AbortSignal
 * - TimeoutError: AbortSignal.timeout() and request deadline reasons
 * - ETIMEDOUT: socket-level timeouts
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;

  return isNodeError(error) && (error.code === 'ABORT_ERR' || error.code === 'ETIMEDOUT');
}

/**
 * HTTP-error-like object raised outside NestJS (body-parser, raw-body)
 *
 * These carry `status`/`statusCode` plus `expose` telling whether the message
 * is safe to show to the client.
 */
export interface HttpErrorLike {
  status: number;
  message: string;
  expose: boolean;
  type?: string;
}

export function getHttpErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  const status =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;

  return status !== undefined && status >= 400 && status < 600 ? status : undefined;
}

export function toHttpErrorLike(error: unknown): HttpErrorLike | undefined {
  const status = getHttpErrorStatus(error);
  if (status === undefined || typeof error !== 'object' || error === null) {
    return undefined;
  }

  return {
    status,
    message: 'message' in error && typeof error.message === 'string' ? error.message : '',
    expose: 'expose' in error && error.expose === true,
    type: 'type' in error && typeof error.type === 'string' ? error.type : undefined,
  };
}
