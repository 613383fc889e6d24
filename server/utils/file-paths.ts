/**
 * File path helpers
 *
 * Resolve files that ship beside the server sources (the bundled operation
 * catalogue) independently of the process working directory.
 */

import path from 'path';

/**
 * Get the server root directory path
 *
 * This assumes the helper is located at `/server/utils/file-paths.ts`
 * (or its compiled counterpart) and returns the `/server` directory path.
 */
export function getServerDir(): string {
  return path.dirname(__dirname);
}

/**
 * Resolve a path relative to the server directory
 *
 * @example
 * ```typescript
 * const cataloguePath = resolveServerPath('catalogue', 'jira-operations.json');
 * ```
 */
export function resolveServerPath(...relativePath: string[]): string {
  return path.join(getServerDir(), ...relativePath);
}

/**
 * Resolve a user-supplied path against the working directory
 */
export function resolveUserPath(userPath: string): string {
  return path.isAbsolute(userPath) ? userPath : path.resolve(process.cwd(), userPath);
}
