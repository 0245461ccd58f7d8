import { relative, isAbsolute } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses relative paths from cwd for paths inside it
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/work/app/dist/hello.fpack', '/work/app') // => 'dist/hello.fpack'
 * formatPathForDisplay('./relative/path.txt') // => './relative/path.txt'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return path;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format a count with a singular or plural noun
 */
export function formatCount(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
