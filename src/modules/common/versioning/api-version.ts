/**
 * API version parsing and resolution
 *
 * Two signals may carry a version: a leading `/v{N}[.{M}]/` path segment and
 * the X-Version header. Both are parsed leniently ("2", "2.0", "v2") and
 * normalized to major.minor before they are compared with the registry.
 */

export const API_VERSION_HEADER = 'X-Version';
export const SUPPORTED_VERSIONS_HEADER = 'api-supported-versions';

export type VersionPrecedence = 'header-first' | 'path-first';
export type VersionSource = 'path' | 'header' | 'default';

export interface VersionSignals {
  path?: string;
  header?: string;
}

export type VersionResolution =
  | { ok: true; version: string; source: VersionSource }
  | { ok: false; reason: string };

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?$/i;

/**
 * Normalize a version literal to "major.minor", or null when it is not one
 *
 * @example
 * parseApiVersion('2')    // '2.0'
 * parseApiVersion('v1.5') // '1.5'
 * parseApiVersion('two')  // null
 */
export function parseApiVersion(raw: string): string | null {
  const match = VERSION_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const major = Number(match[1]);
  const minor = match[2] === undefined ? 0 : Number(match[2]);
  return `${major}.${minor}`;
}

/**
 * Split a request path into its version segment (if any) and resource name
 *
 * @example
 * splitVersionedPath('/v2/orders/42') // { version: '2', resource: 'orders' }
 * splitVersionedPath('/incidents')    // { version: undefined, resource: 'incidents' }
 */
export function splitVersionedPath(path: string): { version?: string; resource: string } {
  const segments = path.split('?')[0].split('/').filter((segment) => segment.length > 0);

  const [first = '', second = ''] = segments;
  if (/^v\d+(?:\.\d+)?$/i.test(first)) {
    return { version: first.substring(1), resource: second.toLowerCase() };
  }

  return { version: undefined, resource: first.toLowerCase() };
}

/**
 * Select exactly one version for a request
 *
 * Present signals are walked in precedence order; the first whose normalized
 * value is supported wins. An unparseable signal fails immediately. When
 * signals are present but none is supported, resolution fails; when none is
 * present the default version applies.
 */
export function resolveApiVersion(
  signals: VersionSignals,
  supported: readonly string[],
  defaultVersion: string,
  precedence: VersionPrecedence,
): VersionResolution {
  const ordered: Array<[Exclude<VersionSource, 'default'>, string | undefined]> =
    precedence === 'header-first'
      ? [
          ['header', signals.header],
          ['path', signals.path],
        ]
      : [
          ['path', signals.path],
          ['header', signals.header],
        ];

  const present = ordered.filter(
    (entry): entry is [Exclude<VersionSource, 'default'>, string] =>
      entry[1] !== undefined && entry[1].trim().length > 0,
  );

  for (const [source, raw] of present) {
    const version = parseApiVersion(raw);
    if (version === null) {
      return { ok: false, reason: `The API version '${raw}' is not a valid version.` };
    }
    if (supported.includes(version)) {
      return { ok: true, version, source };
    }
  }

  if (present.length > 0) {
    const requested = present.map(([, raw]) => raw).join("', '");
    return {
      ok: false,
      reason:
        `The requested API version '${requested}' is not supported for this resource. ` +
        `Supported versions: ${supported.join(', ')}.`,
    };
  }

  const fallback = parseApiVersion(defaultVersion);
  if (fallback !== null && supported.includes(fallback)) {
    return { ok: true, version: fallback, source: 'default' };
  }

  return {
    ok: false,
    reason:
      'An API version is required for this resource. ' +
      `Supported versions: ${supported.join(', ')}.`,
  };
}
