import { Request } from 'express';

export type HeaderSource = Pick<Request, 'rawHeaders' | 'headers'>;

/**
 * Read a request header by name
 *
 * Names compare case-insensitively. When a header is repeated, the last
 * occurrence wins (Node joins some repeated headers in `request.headers`, so
 * the raw header list is scanned instead).
 */
export function readHeader(request: HeaderSource, name: string): string | undefined {
  const target = name.toLowerCase();
  const raw = request.rawHeaders ?? [];

  let value: string | undefined;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    if (raw[i].toLowerCase() === target) {
      value = raw[i + 1];
    }
  }
  if (value !== undefined || raw.length > 0) {
    return value;
  }

  // Requests built without a raw header list (unit tests, synthetic requests)
  const parsed = request.headers?.[target];
  return Array.isArray(parsed) ? parsed[parsed.length - 1] : parsed;
}
