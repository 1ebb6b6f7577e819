/**
 * Correlation ID Utilities - Single Source of Truth
 *
 * Used by the correlation stage, the exception boundary and the request
 * logger. Generated IDs are random UUIDs (v4); IDs supplied by the caller are
 * trusted and reused verbatim.
 */

import { randomUUID } from 'node:crypto';
import { Request } from 'express';
import { readHeader, type HeaderSource } from './header.utils';

export const CORRELATION_ID_HEADER = 'X-Correlation-Id';

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Correlation ID supplied by the caller, or null when absent or empty
 */
export function extractFromHeaders(request: HeaderSource): string | null {
  const value = readHeader(request, CORRELATION_ID_HEADER);
  return value !== undefined && value.length > 0 ? value : null;
}

/**
 * Correlation ID assigned to this request by the correlation stage
 */
export function extractFromRequest(request: Request): string | null {
  return request.context?.correlationId ?? null;
}
