import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the form every stored path takes.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * A platform-agnostic version of `path.dirname`.
 */
export function dirname(p: string): string {
  return normalizePath(path.dirname(p));
}

/**
 * A platform-agnostic version of `path.resolve`. The result is absolute, without
 * trailing slash or `.`/`..` segments.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * True when `candidate` is `ancestor` itself or lies below it. Matching is by whole
 * segments, so `/srv/app` does not contain `/srv/application`.
 *
 * Both arguments must be absolute and normalized.
 */
export function isDescendantOrEqual(candidate: string, ancestor: string): boolean {
  if (candidate === ancestor) return true;
  const prefix = ancestor.endsWith('/') ? ancestor : `${ancestor}/`;
  return candidate.startsWith(prefix);
}

/**
 * Orders paths by UTF-16 code units, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
