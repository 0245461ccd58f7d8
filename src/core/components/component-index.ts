/**
 * Component search-path index
 *
 * Each search root is scanned once per resolver. A directory is a component
 * candidate when it holds component.manifest.json; the root itself, its
 * children and its grandchildren (`<name>/<version>/`) are considered.
 */

import { basename, dirname, join } from 'path';
import type { ComponentManifest, JsonObject } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, isFile, listDirectories, readTextFile } from '../../utils/fs.js';
import type { ManifestInvalidError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseComponentManifest } from './component-manifest.js';

export interface IndexedComponent {
  status: 'ok';
  dir: string;
  manifestPath: string;
  manifest: ComponentManifest;
  raw: JsonObject;
}

export interface BrokenComponent {
  status: 'invalid';
  dir: string;
  manifestPath: string;
  error: ManifestInvalidError;
  claimedName?: string;
}

export type ComponentIndexEntry = IndexedComponent | BrokenComponent;

const MAX_SCAN_DEPTH = 2;

async function collectCandidateDirs(dir: string, depth: number, into: string[]): Promise<void> {
  if (await isFile(join(dir, FILE_PATTERNS.COMPONENT_MANIFEST))) {
    into.push(dir);
  }
  if (depth >= MAX_SCAN_DEPTH) {
    return;
  }
  for (const child of await listDirectories(dir)) {
    await collectCandidateDirs(join(dir, child), depth + 1, into);
  }
}

async function indexDirectory(dir: string): Promise<ComponentIndexEntry> {
  const manifestPath = join(dir, FILE_PATTERNS.COMPONENT_MANIFEST);
  const parsed = parseComponentManifest(await readTextFile(manifestPath), manifestPath);
  if (parsed.ok) {
    return { status: 'ok', dir, manifestPath, manifest: parsed.manifest, raw: parsed.raw };
  }
  logger.debug(`Skipping invalid component manifest ${manifestPath}`, { reason: parsed.error.message });
  return {
    status: 'invalid',
    dir,
    manifestPath,
    error: parsed.error,
    ...(parsed.claimedName ? { claimedName: parsed.claimedName } : {})
  };
}

/**
 * Index every component under the search path, in search-path order
 */
export async function buildComponentIndex(searchPath: readonly string[]): Promise<ComponentIndexEntry[]> {
  const entries: ComponentIndexEntry[] = [];
  for (const root of searchPath) {
    if (!(await isDirectory(root))) {
      logger.debug(`Component search root not found: ${root}`);
      continue;
    }
    const dirs: string[] = [];
    await collectCandidateDirs(root, 0, dirs);
    for (const dir of dirs) {
      entries.push(await indexDirectory(dir));
    }
  }
  logger.debug(`Indexed ${entries.length} component manifest(s)`, { searchPath });
  return entries;
}

/**
 * Whether a manifest that failed to parse plausibly belongs to `name`:
 * it claims the name, or lives in `<name>/`, `<name>@<version>/` or `<name>/<version>/`.
 */
export function brokenEntryMatches(entry: BrokenComponent, name: string): boolean {
  if (entry.claimedName !== undefined) {
    return entry.claimedName === name;
  }
  const dirName = basename(entry.dir);
  return dirName === name || dirName.startsWith(`${name}@`) || basename(dirname(entry.dir)) === name;
}
