/**
 * Pack metadata
 *
 * Loaded from an optional TOML descriptor; every field has a default derived
 * from the flow so that a bare `flow + components` build is possible.
 */

import * as TOML from 'smol-toml';
import * as semver from 'semver';
import type { FlowBundle, JsonObject, JsonValue, PackImport, PackKind, PackMeta } from '../../types/index.js';
import { PACK_KINDS, isJsonObject } from '../../types/index.js';
import { PACK_DEFAULTS } from '../../constants/index.js';
import { toJsonValue } from '../../utils/canonical-json.js';
import { PackMetaInvalidError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { isValidVersionRequirement } from '../../utils/version-requirements.js';
import { logger } from '../../utils/logger.js';

const KNOWN_KEYS = new Set([
  'pack_version', 'pack_id', 'version', 'name', 'kind', 'description', 'authors', 'license',
  'homepage', 'support', 'vendor', 'entry_flows', 'imports', 'annotations', 'created_at_utc',
  'distribution'
]);

class MetaReader {
  constructor(private readonly table: JsonObject, private readonly label: string) {}

  error(reason: string): PackMetaInvalidError {
    return new PackMetaInvalidError(this.label, reason);
  }

  string(key: string): string | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw this.error(`'${key}' must be a string`);
    return value;
  }

  stringList(key: string): string[] | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) throw this.error(`'${key}' must be an array of strings`);
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') throw this.error(`'${key}' must be an array of strings`);
      items.push(item);
    }
    return items;
  }

  subTable(key: string): JsonObject | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    if (!isJsonObject(value)) throw this.error(`'${key}' must be a table`);
    return value;
  }

  raw(key: string): JsonValue | undefined {
    return this.table[key];
  }
}

function isPackKind(value: string): value is PackKind {
  return (PACK_KINDS as readonly string[]).includes(value);
}

function readKind(reader: MetaReader): PackKind | undefined {
  const kind = reader.string('kind');
  if (kind === undefined) return undefined;
  if (!isPackKind(kind)) throw reader.error(`'kind' must be one of ${PACK_KINDS.join(', ')}`);
  return kind;
}

function readImports(reader: MetaReader): PackImport[] {
  const value = reader.raw('imports');
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw reader.error("'imports' must be an array of tables");

  return value.map((item, index) => {
    if (!isJsonObject(item) || typeof item.pack_id !== 'string' || typeof item.version_req !== 'string') {
      throw reader.error(`imports[${index}] must have string 'pack_id' and 'version_req'`);
    }
    if (!isValidVersionRequirement(item.version_req)) {
      throw reader.error(`imports[${index}] has invalid version_req '${item.version_req}'`);
    }
    return { packId: item.pack_id, versionReq: item.version_req };
  });
}

function readPackVersion(reader: MetaReader): number {
  const value = reader.raw('pack_version');
  if (value === undefined) return PACK_DEFAULTS.FORMAT_VERSION;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw reader.error("'pack_version' must be a positive integer");
  }
  return value;
}

/**
 * Apply defaults to a parsed descriptor table
 */
export function buildPackMeta(
  table: JsonObject,
  bundle: Pick<FlowBundle, 'id'>,
  createdAtUtc: string,
  label = 'pack metadata'
): PackMeta {
  const reader = new MetaReader(table, label);

  for (const key of Object.keys(table)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.debug(`Ignoring unknown pack metadata key '${key}' in ${label}`);
    }
  }

  const version = reader.string('version') ?? PACK_DEFAULTS.VERSION;
  if (!semver.valid(version)) {
    throw reader.error(`invalid pack version '${version}'`);
  }

  const kind = readKind(reader);
  const distribution = reader.subTable('distribution');

  return {
    packVersion: readPackVersion(reader),
    packId: reader.string('pack_id') ?? `${PACK_DEFAULTS.PACK_ID_PREFIX}${bundle.id}`,
    version,
    name: reader.string('name') ?? bundle.id,
    kind,
    description: reader.string('description'),
    authors: reader.stringList('authors') ?? [],
    license: reader.string('license'),
    homepage: reader.string('homepage'),
    support: reader.string('support'),
    vendor: reader.string('vendor'),
    entryFlows: reader.stringList('entry_flows') ?? [bundle.id],
    imports: readImports(reader),
    annotations: reader.subTable('annotations') ?? {},
    createdAtUtc: reader.string('created_at_utc') ?? createdAtUtc,
    ...(distribution ? { distribution } : {})
  };
}

export function parsePackMetaToml(content: string, label: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PackMetaInvalidError(label, reason);
  }
  // TOML datetimes become ISO strings
  const table = toJsonValue(parsed);
  if (!isJsonObject(table)) {
    throw new PackMetaInvalidError(label, 'expected a TOML table');
  }
  return table;
}

/**
 * Load metadata from `metaPath`, or synthesize defaults when no descriptor is given
 */
export async function loadPackMeta(
  metaPath: string | undefined,
  bundle: Pick<FlowBundle, 'id'>,
  createdAtUtc: string
): Promise<PackMeta> {
  if (!metaPath) {
    return buildPackMeta({}, bundle, createdAtUtc);
  }
  const table = parsePackMetaToml(await readTextFile(metaPath), metaPath);
  return buildPackMeta(table, bundle, createdAtUtc, metaPath);
}
