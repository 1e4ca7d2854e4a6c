/**
 * CLI Version Information
 *
 * Synchronized with package.json version.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

/**
 * Get version information for display.
 */
export function getVersionInfo(): string {
  return `outcommit v${VERSION}`;
}
