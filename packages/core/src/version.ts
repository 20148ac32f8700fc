/**
 * forkcov version constants.
 *
 * Kept in step with packages/core/package.json (checked by a unit test).
 */

/** Full forkcov version string (e.g., "0.1.0-beta") */
export const FORKCOV_VERSION = '0.1.0';

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.2.5-beta" → "0.2.5"
 * "0.2.5" → "0.2.5"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  // Strip pre-release tag (everything after first hyphen)
  const base = version.split('-')[0];
  return base;
}
