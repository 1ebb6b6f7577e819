import { readHeader, type HeaderSource } from '../../../src/modules/common/utils/header.utils';
import {
  extractFromHeaders,
  generateCorrelationId,
} from '../../../src/modules/common/utils/correlation-id.utils';
import { extractBearerToken, maskCredential } from '../../../src/modules/common/utils/auth.utils';

function withRawHeaders(...rawHeaders: string[]): HeaderSource {
  return { rawHeaders, headers: {} };
}

describe('readHeader', () => {
  it('should match header names case-insensitively', () => {
    expect(readHeader(withRawHeaders('x-CORRELATION-id', 'abc'), 'X-Correlation-Id')).toBe('abc');
  });

  it('should let the last occurrence win', () => {
    const request = withRawHeaders(
      'X-Correlation-Id',
      'first',
      'Accept',
      'application/json',
      'x-correlation-id',
      'last',
    );

    expect(readHeader(request, 'X-Correlation-Id')).toBe('last');
  });

  it('should return undefined for a missing header', () => {
    expect(readHeader(withRawHeaders('Accept', '*/*'), 'X-Version')).toBeUndefined();
  });

  it('should fall back to parsed headers without a raw list', () => {
    expect(readHeader({ rawHeaders: [], headers: { 'x-version': '2.0' } }, 'X-Version')).toBe('2.0');
  });
});

describe('Correlation ID utilities', () => {
  it('should adopt a supplied ID verbatim', () => {
    expect(extractFromHeaders(withRawHeaders('X-Correlation-Id', ' Spaced ID '))).toBe(' Spaced ID ');
  });

  it('should ignore an empty header', () => {
    expect(extractFromHeaders(withRawHeaders('X-Correlation-Id', ''))).toBeNull();
  });

  it('should generate distinct v4 UUIDs', () => {
    const first = generateCorrelationId();
    const second = generateCorrelationId();

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first).not.toBe(second);
  });
});

describe('Authentication utilities', () => {
  it('should extract a bearer token', () => {
    expect(extractBearerToken(withRawHeaders('Authorization', 'Bearer test-token'))).toBe(
      'test-token',
    );
  });

  it.each(['Basic dGVzdA==', 'Bearer ', 'bearer test-token'])(
    'should return null for %p',
    (value) => {
      expect(extractBearerToken(withRawHeaders('Authorization', value))).toBeNull();
    },
  );

  it('should never reveal a credential', () => {
    expect(maskCredential('test-token')).toBe('<redacted>');
    expect(maskCredential('')).toBe('<missing>');
  });
});
