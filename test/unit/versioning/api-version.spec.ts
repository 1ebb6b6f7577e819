import {
  parseApiVersion,
  resolveApiVersion,
  splitVersionedPath,
} from '../../../src/modules/common/versioning/api-version';
import {
  supportedVersionsFor,
  versionedPaths,
} from '../../../src/modules/common/versioning/versioned-resources';

const ORDERS = ['1.0', '2.0'];

describe('parseApiVersion', () => {
  it.each([
    ['2', '2.0'],
    ['2.0', '2.0'],
    ['v2', '2.0'],
    ['V1.5', '1.5'],
    [' 1 ', '1.0'],
    ['01.00', '1.0'],
  ])('should normalize %p to %p', (raw, expected) => {
    expect(parseApiVersion(raw)).toBe(expected);
  });

  it.each(['', 'latest', '2.0.0', 'v', '1.x', '-1'])('should reject %p', (raw) => {
    expect(parseApiVersion(raw)).toBeNull();
  });
});

describe('splitVersionedPath', () => {
  it('should separate the version segment from the resource', () => {
    expect(splitVersionedPath('/v2/orders/42')).toEqual({ version: '2', resource: 'orders' });
    expect(splitVersionedPath('/v1.0/Orders')).toEqual({ version: '1.0', resource: 'orders' });
  });

  it('should report no version for plain paths', () => {
    expect(splitVersionedPath('/incidents?severity=high')).toEqual({
      version: undefined,
      resource: 'incidents',
    });
  });

  it('should treat a v-prefixed word as a resource', () => {
    expect(splitVersionedPath('/vendors/1')).toEqual({ version: undefined, resource: 'vendors' });
  });
});

describe('resolveApiVersion', () => {
  it('should use the default version when no signal is present', () => {
    expect(resolveApiVersion({}, ORDERS, '1.0', 'header-first')).toEqual({
      ok: true,
      version: '1.0',
      source: 'default',
    });
  });

  it('should ignore empty signals', () => {
    expect(resolveApiVersion({ header: '  ' }, ORDERS, '1.0', 'header-first')).toEqual({
      ok: true,
      version: '1.0',
      source: 'default',
    });
  });

  it('should prefer the header under header-first precedence', () => {
    expect(resolveApiVersion({ path: '1', header: '2.0' }, ORDERS, '1.0', 'header-first')).toEqual(
      { ok: true, version: '2.0', source: 'header' },
    );
  });

  it('should prefer the path under path-first precedence', () => {
    expect(resolveApiVersion({ path: '1', header: '2.0' }, ORDERS, '1.0', 'path-first')).toEqual({
      ok: true,
      version: '1.0',
      source: 'path',
    });
  });

  it('should fall through to a supported signal when the preferred one is not registered', () => {
    expect(resolveApiVersion({ path: '3', header: '2' }, ORDERS, '1.0', 'path-first')).toEqual({
      ok: true,
      version: '2.0',
      source: 'header',
    });
  });

  it('should fail when no present signal is registered', () => {
    expect(resolveApiVersion({ header: '3.0' }, ORDERS, '1.0', 'header-first')).toEqual({
      ok: false,
      reason:
        "The requested API version '3.0' is not supported for this resource. Supported versions: 1.0, 2.0.",
    });
  });

  it('should fail on a malformed signal', () => {
    expect(resolveApiVersion({ header: 'two' }, ORDERS, '1.0', 'header-first')).toEqual({
      ok: false,
      reason: "The API version 'two' is not a valid version.",
    });
  });

  it('should fail when the default version is not served by the resource', () => {
    expect(resolveApiVersion({}, ['2.0'], '1.0', 'header-first')).toEqual({
      ok: false,
      reason: 'An API version is required for this resource. Supported versions: 2.0.',
    });
  });
});

describe('Versioned resource registry', () => {
  it('should list the versions of each resource', () => {
    expect(supportedVersionsFor('incidents')).toEqual(['1.0']);
    expect(supportedVersionsFor('ORDERS')).toEqual(['1.0', '2.0']);
    expect(supportedVersionsFor('health')).toBeUndefined();
  });

  it('should expose the bare and the version-prefixed route', () => {
    expect(versionedPaths('orders')).toEqual(['orders', 'v:apiVersion/orders']);
  });
});
