import { realpath } from 'fs/promises';
import { isAbsolute, relative, resolve, sep } from 'path';
import { FileSystemError, PathEscapeError } from './errors.js';

/**
 * Resolve a user-supplied path against `root`, follow symlinks, and reject it
 * unless it stays inside the root. The candidate must exist.
 */
export async function normalizeUnderRoot(root: string, candidate: string): Promise<string> {
  const canonicalRoot = await canonicalize(root);
  const resolved = isAbsolute(candidate) ? candidate : resolve(canonicalRoot, candidate);
  const canonical = await canonicalize(resolved);

  if (!isWithin(canonicalRoot, canonical)) {
    throw new PathEscapeError(canonicalRoot, canonical);
  }
  return canonical;
}

export function isWithin(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

async function canonicalize(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (error) {
    throw new FileSystemError(`Failed to canonicalize ${path}`, { path, error });
  }
}
