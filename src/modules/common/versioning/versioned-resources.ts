/**
 * Versioned resource registry
 *
 * Resource (first path segment) -> API versions served for it, in major.minor
 * form. Built once when the module loads and read-only afterwards; controllers
 * declare the single version they serve through `version:` in @Controller().
 */

export const API_VERSIONS = {
  V1: '1.0',
  V2: '2.0',
} as const;

export type ApiVersion = (typeof API_VERSIONS)[keyof typeof API_VERSIONS];

export const VERSIONED_RESOURCES: ReadonlyMap<string, readonly ApiVersion[]> = new Map<
  string,
  readonly ApiVersion[]
>([
  ['incidents', [API_VERSIONS.V1]],
  ['orders', [API_VERSIONS.V1, API_VERSIONS.V2]],
]);

export function supportedVersionsFor(resource: string): readonly string[] | undefined {
  return VERSIONED_RESOURCES.get(resource.toLowerCase());
}

/**
 * Route paths for a versioned controller: the bare resource (version from the
 * header or the default) and the `/v{N}/` prefixed form.
 */
export function versionedPaths(resource: string): string[] {
  return [resource, `v:apiVersion/${resource}`];
}
