/**
 * Component Resolver
 *
 * Resolves `name` + version requirement to a concrete component build on the
 * local search path. Resolved components live in an arena keyed by
 * `name@version` for the duration of one build; nodes refer to them by key.
 */

import { resolve } from 'path';
import type { ComponentKey, ComponentLookup, JsonObject, ResolvedComponent } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { ComponentNotFoundError, InvalidComponentRefError, ManifestInvalidError } from '../../utils/errors.js';
import { isFile, readBinaryFile, readTextFile } from '../../utils/fs.js';
import { contentHash, normalizeHashHex } from '../../utils/hash-utils.js';
import { toJsonValue } from '../../utils/canonical-json.js';
import { normalizeVersionRequirement, selectHighestSatisfying, sortVersions } from '../../utils/version-requirements.js';
import { logger } from '../../utils/logger.js';
import { brokenEntryMatches, buildComponentIndex, type ComponentIndexEntry, type IndexedComponent } from './component-index.js';

export function componentKey(name: string, version: string): ComponentKey {
  return `${name}@${version}`;
}

export class ComponentResolver implements ComponentLookup {
  private index: ComponentIndexEntry[] | null = null;
  private readonly requests = new Map<string, ComponentKey>();
  private readonly arena = new Map<ComponentKey, ResolvedComponent>();

  constructor(private readonly searchPath: readonly string[]) {}

  /**
   * Resolve the highest version of `name` satisfying `versionReq`
   */
  async resolve(name: string, versionReq = '*'): Promise<ResolvedComponent> {
    const range = normalizeVersionRequirement(versionReq);
    if (range === null) {
      throw new InvalidComponentRefError(`${name}@${versionReq}`, 'invalid version requirement');
    }

    const requestKey = `${name}@${range}`;
    const memoized = this.requests.get(requestKey);
    if (memoized) {
      return this.get(memoized);
    }

    const index = await this.loadIndex();
    const candidates = index.filter(
      (entry): entry is IndexedComponent => entry.status === 'ok' && entry.manifest.id === name
    );
    const selection = selectHighestSatisfying(candidates.map(c => c.manifest.version), range);

    if (selection.version === null) {
      const broken = index.find(entry => entry.status === 'invalid' && brokenEntryMatches(entry, name));
      if (broken && broken.status === 'invalid') {
        throw broken.error;
      }
      throw new ComponentNotFoundError(name, {
        versionReq,
        searchPath: [...this.searchPath],
        availableVersions: sortVersions(candidates.map(c => c.manifest.version))
      });
    }

    const key = componentKey(name, selection.version);
    let component = this.arena.get(key);
    if (!component) {
      // Search-path order breaks ties between identical name@version builds
      const selected = candidates.find(c => c.manifest.version === selection.version);
      if (!selected) {
        throw new ComponentNotFoundError(name, { versionReq, searchPath: [...this.searchPath] });
      }
      component = await loadComponent(key, selected);
      this.arena.set(key, component);
      logger.debug(`Resolved ${name}@${versionReq} -> ${key}`, { dir: selected.dir });
    }

    this.requests.set(requestKey, key);
    return component;
  }

  get(key: ComponentKey): ResolvedComponent {
    const component = this.arena.get(key);
    if (!component) {
      throw new Error(`Component ${key} has not been resolved in this build`);
    }
    return component;
  }

  /**
   * Resolved components in resolution order
   */
  components(): ResolvedComponent[] {
    return Array.from(this.arena.values());
  }

  private async loadIndex(): Promise<ComponentIndexEntry[]> {
    if (!this.index) {
      this.index = await buildComponentIndex(this.searchPath);
    }
    return this.index;
  }
}

async function loadSchema(entry: IndexedComponent): Promise<JsonObject | undefined> {
  const declared = entry.manifest.configSchema;
  if (declared === undefined || typeof declared !== 'string') {
    return declared;
  }

  const schemaPath = resolve(entry.dir, declared);
  if (!(await isFile(schemaPath))) {
    throw new ManifestInvalidError(entry.manifestPath, `config schema file not found: ${declared}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readTextFile(schemaPath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestInvalidError(entry.manifestPath, `config schema ${declared} is not valid JSON (${reason})`);
  }
  const schema = toJsonValue(parsed);
  if (!isJsonObject(schema)) {
    throw new ManifestInvalidError(entry.manifestPath, `config schema ${declared} must be a JSON object`);
  }
  return schema;
}

async function loadComponent(key: ComponentKey, entry: IndexedComponent): Promise<ResolvedComponent> {
  const { manifest } = entry;
  const artifactPath = resolve(entry.dir, manifest.artifactFile);
  if (!(await isFile(artifactPath))) {
    throw new ManifestInvalidError(entry.manifestPath, `artifact not found: ${manifest.artifactFile}`);
  }

  const actualHash = await contentHash(await readBinaryFile(artifactPath));
  if (manifest.declaredHash && normalizeHashHex(manifest.declaredHash) !== normalizeHashHex(actualHash)) {
    throw new ManifestInvalidError(
      entry.manifestPath,
      `artifact hash mismatch for ${manifest.artifactFile} (declared ${manifest.declaredHash}, actual ${actualHash})`
    );
  }

  const schema = await loadSchema(entry);

  return Object.freeze({
    key,
    name: manifest.id,
    version: manifest.version,
    sourceDir: entry.dir,
    artifactPath,
    manifest: entry.raw,
    operations: Object.freeze([...manifest.operations]),
    ...(schema ? { schema } : {}),
    capabilities: manifest.capabilities,
    world: manifest.world,
    contentHash: actualHash
  });
}
