/**
 * Output Location Resolution
 *
 * Turns requested output identifiers into absolute URLs and local paths.
 * Identifiers are URI references resolved against the transaction's base
 * output location; only `file:` locations can be written.
 *
 * @module output/location
 */

import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

/**
 * Scheme classes the transaction distinguishes.
 */
export type LocationScheme = 'file' | 'other';

/**
 * Matches an absolute URI scheme. Requires two or more characters so that
 * Windows drive letters ("C:") are treated as paths.
 */
const URI_SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;

/**
 * Whether a string is an absolute URI rather than a local path.
 */
export function isAbsoluteUri(value: string): boolean {
  return URI_SCHEME_PATTERN.test(value);
}

/**
 * Normalize a base output location into an absolute URL.
 *
 * @param base - A URL, an absolute URI string, or a local path (relative paths
 *   resolve against the working directory; a trailing separator names a directory)
 * @example
 * ```typescript
 * toBaseUrl('/work/build/out.xml').href; // 'file:///work/build/out.xml'
 * toBaseUrl('file:///work/build/out.xml').href; // 'file:///work/build/out.xml'
 * toBaseUrl('/work/build/').href; // 'file:///work/build/'
 * ```
 */
export function toBaseUrl(base: string | URL): URL {
  if (base instanceof URL) {
    return new URL(base.href);
  }
  if (isAbsoluteUri(base)) {
    return new URL(base);
  }
  const resolved = path.resolve(base);
  // A trailing separator marks a directory; keep it so identifiers resolve inside it
  const isDirectory = base.endsWith('/') || base.endsWith(path.sep);
  return pathToFileURL(isDirectory ? `${resolved}${path.sep}` : resolved);
}

/**
 * Resolve an identifier against the base location.
 *
 * @throws TypeError if the identifier is not a valid URI reference
 */
export function resolveLocation(base: URL, identifier: string): URL {
  return new URL(identifier, base);
}

export function schemeOf(location: URL): LocationScheme {
  return location.protocol === 'file:' ? 'file' : 'other';
}

/**
 * Local file system path of a `file:` URL.
 *
 * @throws TypeError if the URL is not a local file URL
 */
export function toLocalPath(location: URL): string {
  return fileURLToPath(location);
}

/**
 * Whether two locations name the same resource, ignoring fragments.
 */
export function isSameLocation(a: URL, b: URL): boolean {
  return withoutFragment(a) === withoutFragment(b);
}

function withoutFragment(location: URL): string {
  const copy = new URL(location.href);
  copy.hash = '';
  return copy.href;
}
