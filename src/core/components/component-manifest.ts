/**
 * Component manifest parsing
 *
 * component.manifest.json describes one component build: its reference name,
 * version, execution world, operations, configuration schema, capabilities,
 * and the artifact file with its content hash.
 */

import * as semver from 'semver';
import type { ComponentManifest, JsonObject, JsonValue } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { FILE_PATTERNS, HASH_SCHEME } from '../../constants/index.js';
import { toJsonValue } from '../../utils/canonical-json.js';
import { ManifestInvalidError } from '../../utils/errors.js';

export type ManifestParseResult =
  | { ok: true; manifest: ComponentManifest; raw: JsonObject }
  | { ok: false; error: ManifestInvalidError; claimedName?: string };

function optionalString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Operation names in declaration order. Entries may be `{ "name": ... }`
 * objects or bare strings.
 */
export function readOperationNames(operations: JsonValue | undefined): string[] | null {
  if (operations === undefined || operations === null) {
    return [];
  }
  if (!Array.isArray(operations)) {
    return null;
  }
  const names: string[] = [];
  for (const operation of operations) {
    const name = typeof operation === 'string'
      ? operation
      : isJsonObject(operation) ? optionalString(operation.name) : undefined;
    if (!name) {
      return null;
    }
    names.push(name);
  }
  return names;
}

/**
 * Inline schema object, schema file path, undefined when absent, null when malformed
 */
function readConfigSchema(value: JsonValue | undefined): JsonObject | string | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || isJsonObject(value)) {
    return value;
  }
  return null;
}

export function parseComponentManifest(text: string, manifestPath: string): ManifestParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ManifestInvalidError(manifestPath, `not valid JSON (${reason})`) };
  }

  const raw = toJsonValue(parsed);
  if (!isJsonObject(raw)) {
    return { ok: false, error: new ManifestInvalidError(manifestPath, 'expected a JSON object') };
  }

  const id = optionalString(raw.id) ?? optionalString(raw.name);
  const fail = (reason: string): ManifestParseResult => ({
    ok: false,
    error: new ManifestInvalidError(manifestPath, reason),
    ...(id ? { claimedName: id } : {})
  });

  if (!id) {
    return fail("missing 'id' or 'name'");
  }

  const version = optionalString(raw.version);
  if (!version || !semver.valid(version)) {
    return fail(`'version' must be a valid semver version (found ${JSON.stringify(raw.version ?? null)})`);
  }

  const world = optionalString(raw.world);
  if (!world) {
    return fail("missing 'world'");
  }

  const operations = readOperationNames(raw.operations);
  if (operations === null) {
    return fail("'operations' must be a list of operation names or { name } objects");
  }

  const configSchema = readConfigSchema(raw.config_schema);
  if (configSchema === null) {
    return fail("'config_schema' must be a JSON Schema object or a relative file path");
  }

  const artifacts = raw.artifacts;
  const artifactFile = (isJsonObject(artifacts) ? optionalString(artifacts.component_wasm) : undefined)
    ?? FILE_PATTERNS.DEFAULT_COMPONENT_ARTIFACT;

  const hashes = raw.hashes;
  const declaredHash = isJsonObject(hashes) ? optionalString(hashes.component_wasm) : undefined;
  if (declaredHash && declaredHash.includes(':') && !declaredHash.startsWith(`${HASH_SCHEME}:`)) {
    return fail(`unsupported hash scheme in '${declaredHash}' (expected ${HASH_SCHEME})`);
  }

  const displayName = optionalString(raw.name);
  const manifest: ComponentManifest = {
    id,
    ...(displayName ? { name: displayName } : {}),
    version,
    world,
    operations,
    ...(configSchema !== undefined ? { configSchema } : {}),
    capabilities: raw.capabilities ?? {},
    artifactFile,
    ...(declaredHash ? { declaredHash } : {})
  };

  return { ok: true, manifest, raw };
}
