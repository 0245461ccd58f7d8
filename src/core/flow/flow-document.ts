import * as yaml from 'js-yaml';
import type { JsonObject } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { toJsonValue } from '../../utils/canonical-json.js';
import { FlowValidationError } from '../../utils/errors.js';

/**
 * Parse flow source (YAML or JSON) into a mutable JSON document.
 *
 * The core schema keeps YAML timestamps and other extended scalars as plain
 * strings, so the document always has a JSON representation.
 */
export function parseFlowDocument(source: string, path?: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = yaml.load(source, { schema: yaml.CORE_SCHEMA, filename: path });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FlowValidationError(`failed to parse ${path ?? 'flow source'}: ${reason}`, { path });
  }

  const document = toJsonValue(parsed);
  if (!isJsonObject(document)) {
    throw new FlowValidationError(`${path ?? 'flow source'} must contain a mapping at the top level`, { path });
  }
  return document;
}

/**
 * The `nodes` mapping of a flow document, or null when absent or malformed
 */
export function getNodesMap(document: JsonObject): JsonObject | null {
  const nodes = document.nodes;
  return isJsonObject(nodes) ? nodes : null;
}
