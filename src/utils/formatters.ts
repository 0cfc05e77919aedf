import { homedir } from 'os';
import { relative, isAbsolute, sep } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user:
 * - relative to cwd when the path is inside it
 * - tilde notation for paths under the home directory
 * - otherwise the absolute path
 *
 * @example
 * formatPathForDisplay('/work/out/bundle', '/work') // => 'out/bundle'
 * formatPathForDisplay('/home/me/.sysbundle/cache', '/work') // => '~/.sysbundle/cache'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath === '') {
    return '.';
  }
  if (!relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  const home = homedir();
  if (path === home || path.startsWith(home + sep)) {
    return '~' + path.slice(home.length);
  }

  return path;
}

/**
 * "1 release", "3 releases"
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
