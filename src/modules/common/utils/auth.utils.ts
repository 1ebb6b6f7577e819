import { readHeader, type HeaderSource } from './header.utils';

/**
 * Authentication Utilities
 *
 * Credential extraction for the identity stage. Nothing here verifies a
 * credential; the pipeline only records who the caller claims to be.
 */

/**
 * Extract Bearer token from Authorization header
 *
 * @example
 * // Authorization: Bearer abc123def456
 * extractBearerToken(request) // returns 'abc123def456'
 */
export function extractBearerToken(request: HeaderSource): string | null {
  const authHeader = readHeader(request, 'authorization');

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }

  const token = authHeader.substring(7).trim();

  return token.length > 0 ? token : null;
}

/**
 * Mask a credential for logging
 *
 * Returns a constant placeholder; not even the length of a secret is logged.
 */
export function maskCredential(credential: string): string {
  if (!credential) {
    return '<missing>';
  }

  return '<redacted>';
}
