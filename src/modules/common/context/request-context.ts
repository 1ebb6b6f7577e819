import { Request } from 'express';
import { RequestLogger } from './request-logger';

/**
 * Caller identity recorded by IdentityMiddleware. No credential is ever verified.
 */
export type Principal =
  | { kind: 'anonymous' }
  | { kind: 'bearer'; credential: string };

export const ANONYMOUS_PRINCIPAL: Principal = { kind: 'anonymous' };

export type AbortReason = 'client-disconnected' | 'deadline-exceeded';

/**
 * Reason attached to the request's AbortSignal when it fires
 */
export class RequestAbortedError extends Error {
  constructor(public readonly reason: AbortReason) {
    super(
      reason === 'deadline-exceeded'
        ? 'Request deadline exceeded'
        : 'Client disconnected before the response was sent',
    );
    this.name = reason === 'deadline-exceeded' ? 'TimeoutError' : 'AbortError';
  }
}

/**
 * Per-request scratch space
 *
 * Created by RequestContextMiddleware when a request enters the pipeline and
 * attached to the Express request; it is never shared between requests and is
 * dropped together with the request object.
 *
 * The correlation ID can be assigned exactly once. Later stages and handlers
 * read it from here and never regenerate it.
 */
export class RequestContext {
  readonly startedAt = Date.now();

  apiVersion?: string;
  principal: Principal = ANONYMOUS_PRINCIPAL;

  private assignedCorrelationId?: string;
  private readonly abortController = new AbortController();

  get correlationId(): string | undefined {
    return this.assignedCorrelationId;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get aborted(): boolean {
    return this.abortController.signal.aborted;
  }

  assignCorrelationId(correlationId: string): void {
    if (this.assignedCorrelationId !== undefined) {
      throw new Error(
        `Correlation ID already assigned for this request (${this.assignedCorrelationId})`,
      );
    }
    if (correlationId.length === 0) {
      throw new Error('Correlation ID must not be empty');
    }
    this.assignedCorrelationId = correlationId;
  }

  /**
   * Correlation ID for code that runs after the correlation stage
   */
  requireCorrelationId(): string {
    if (this.assignedCorrelationId === undefined) {
      throw new Error('Correlation ID read before the correlation stage ran');
    }
    return this.assignedCorrelationId;
  }

  abort(reason: AbortReason): void {
    if (!this.abortController.signal.aborted) {
      this.abortController.abort(new RequestAbortedError(reason));
    }
  }

  getLogger(scope: string): RequestLogger {
    return new RequestLogger(scope, () => this.assignedCorrelationId);
  }

  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      context?: RequestContext;
    }
  }
}

/**
 * Context of a request typed as unknown by a framework callback
 */
export function contextOf(request: unknown): RequestContext | undefined {
  if (typeof request !== 'object' || request === null || !('context' in request)) {
    return undefined;
  }
  return request.context instanceof RequestContext ? request.context : undefined;
}

/**
 * Context of a request that has passed RequestContextMiddleware
 *
 * A missing context means the middleware chain is misconfigured; the resulting
 * error surfaces as a 500 through the exception boundary.
 */
export function requireRequestContext(request: Request): RequestContext {
  const context = request.context;
  if (!context) {
    throw new Error('Request context missing - RequestContextMiddleware not executed');
  }
  return context;
}
