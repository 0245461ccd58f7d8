import { ARCHIVE_PATHS } from '../../constants/index.js';
import type { JsonObject, JsonValue } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { readBinaryFile } from '../../utils/fs.js';
import { blake3Hex } from '../../utils/hash-utils.js';
import { readPackArchive } from './pack-archive.js';

export interface PackInspection {
  path: string;
  /** blake3 hex of the archived manifest.json, or null when it is missing */
  manifestHash: string | null;
  manifest: JsonObject | null;
  /** Entry paths in archive order */
  entries: string[];
  /** Consistency problems; empty for a well-formed pack */
  problems: string[];
}

function asObjectList(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

function stringField(entry: JsonObject, key: string): string | undefined {
  const value = entry[key];
  return typeof value === 'string' ? value : undefined;
}

async function checkHashedEntry(
  entries: Map<string, Buffer>,
  label: string,
  file: string | undefined,
  expectedHash: string | undefined,
  problems: string[]
): Promise<void> {
  if (!file) {
    problems.push(`${label}: manifest does not name an archive entry`);
    return;
  }
  const content = entries.get(file);
  if (!content) {
    problems.push(`${label}: missing archive entry ${file}`);
    return;
  }
  const actual = await blake3Hex(content);
  if (expectedHash !== actual) {
    problems.push(`${label}: hash mismatch for ${file} (manifest ${expectedHash ?? 'none'}, archive ${actual})`);
  }
}

/**
 * Read a pack archive back and check it against its own manifest
 */
export async function inspectPack(path: string): Promise<PackInspection> {
  const entries = await readPackArchive(await readBinaryFile(path));
  const inspection: PackInspection = {
    path,
    manifestHash: null,
    manifest: null,
    entries: Array.from(entries.keys()),
    problems: []
  };

  const manifestBytes = entries.get(ARCHIVE_PATHS.MANIFEST);
  if (!manifestBytes) {
    inspection.problems.push(`missing ${ARCHIVE_PATHS.MANIFEST}`);
    return inspection;
  }
  inspection.manifestHash = await blake3Hex(manifestBytes);

  let parsed: unknown;
  try {
    parsed = JSON.parse(manifestBytes.toString('utf8'));
  } catch (error) {
    inspection.problems.push(`${ARCHIVE_PATHS.MANIFEST} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    return inspection;
  }
  if (!isJsonObject(parsed)) {
    inspection.problems.push(`${ARCHIVE_PATHS.MANIFEST} must contain a JSON object`);
    return inspection;
  }
  inspection.manifest = parsed;

  for (const flow of asObjectList(parsed.flows)) {
    const label = `flow ${stringField(flow, 'id') ?? '(unnamed)'}`;
    await checkHashedEntry(entries, label, stringField(flow, 'json'), stringField(flow, 'hash_blake3'), inspection.problems);
    const source = stringField(flow, 'source');
    if (source && !entries.has(source)) {
      inspection.problems.push(`${label}: missing archive entry ${source}`);
    }
  }

  for (const component of asObjectList(parsed.components)) {
    const label = `component ${stringField(component, 'name') ?? '(unnamed)'}@${stringField(component, 'version') ?? '?'}`;
    await checkHashedEntry(
      entries,
      label,
      stringField(component, 'file_wasm'),
      stringField(component, 'hash_blake3'),
      inspection.problems
    );
    for (const key of ['manifest_file', 'schema_file']) {
      const file = stringField(component, key);
      if (file && !entries.has(file)) {
        inspection.problems.push(`${label}: missing archive entry ${file}`);
      }
    }
  }

  return inspection;
}
