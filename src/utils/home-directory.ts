/**
 * Home Directory Utilities
 *
 * Centralized module for home directory resolution and tilde handling.
 */

import { homedir } from 'os';
import { isAbsolute, join, normalize, relative, resolve, sep } from 'path';

/**
 * Get the home directory path.
 *
 * @returns Absolute path to the user's home directory
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert a path under the home directory to tilde notation for display.
 * Other paths are returned unchanged.
 */
export function normalizePathWithTilde(path: string, homeDir: string = getHomeDirectory()): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(homeDir);

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}

/**
 * Expand a leading `~` to the given home directory.
 *
 * @param path - Path that may start with `~` or `~/`
 * @param homeDir - Directory substituted for `~` (defaults to the user's home)
 */
export function expandTilde(path: string, homeDir: string = getHomeDirectory()): string {
  if (path === '~' || path === '~/') {
    return homeDir;
  }

  if (path.startsWith('~/')) {
    return join(homeDir, path.slice(2));
  }

  return path;
}

/**
 * True when `child` is `base` itself or lies underneath it.
 * Both paths are compared after resolution, so `..` segments cannot escape.
 */
export function isPathInside(child: string, base: string): boolean {
  const rel = relative(resolve(base), resolve(base, child));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}
