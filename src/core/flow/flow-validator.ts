/**
 * Flow validation
 *
 * Default FlowValidator: checks the flow document structure and produces the
 * FlowBundle (identity, node references, canonical JSON and content hash)
 * the rest of the build works from.
 */

import type { FlowBundle, FlowValidator, JsonObject, JsonValue, NodeRef } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { RESERVED_NODE_KEYS } from '../../constants/index.js';
import { canonicalizeJson, stringifyCanonicalJson } from '../../utils/canonical-json.js';
import { blake3Hex } from '../../utils/hash-utils.js';
import { FlowValidationError } from '../../utils/errors.js';
import { ANY_VERSION, isValidVersionRequirement } from '../../utils/version-requirements.js';
import { logger } from '../../utils/logger.js';
import { builtinKindOf } from '../nodes/node-kind.js';
import { getNodesMap, parseFlowDocument } from './flow-document.js';

const NODE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
// Integer-like keys are enumerated before all others, which would lose document order
const INTEGER_KEY_PATTERN = /^(0|[1-9][0-9]*)$/;
const ROUTE_OUT = 'out';
const SUPPORTED_SCHEMA_VERSION = 1;

const reservedKeys: ReadonlySet<string> = new Set(RESERVED_NODE_KEYS);

export class YamlFlowValidator implements FlowValidator {
  async validate(source: string, path?: string): Promise<FlowBundle> {
    const document = parseFlowDocument(source, path);
    const label = path ?? 'flow';

    const schemaVersion = document.schema_version;
    if (schemaVersion !== undefined && schemaVersion !== SUPPORTED_SCHEMA_VERSION) {
      throw new FlowValidationError(`${label}: unsupported schema_version ${JSON.stringify(schemaVersion)}`);
    }

    const id = requireString(document, 'id', label);
    const kind = requireString(document, 'type', label);

    const nodesMap = getNodesMap(document);
    if (!nodesMap || Object.keys(nodesMap).length === 0) {
      throw new FlowValidationError(`${label}: flow must declare at least one node under 'nodes'`);
    }

    const nodeIds = Object.keys(nodesMap);
    const nodes = nodeIds.map(nodeId => toNodeRef(nodeId, nodesMap[nodeId], label));

    for (const nodeId of nodeIds) {
      validateRouting(nodeId, nodesMap[nodeId], nodesMap, label);
    }

    const start = document.start;
    if (start !== undefined && typeof start !== 'string') {
      throw new FlowValidationError(`${label}: 'start' must be a node id`);
    }
    const entry = start ?? nodeIds[0];
    if (!Object.hasOwn(nodesMap, entry)) {
      throw new FlowValidationError(`${label}: start node '${entry}' is not declared`, { entry });
    }

    const canonicalJson = canonicalizeJson(document);
    const hash = await blake3Hex(stringifyCanonicalJson(canonicalJson));

    logger.debug(`Validated flow ${id}`, { kind, entry, nodes: nodes.length, hash });

    return { id, kind, entry, nodes, canonicalJson, source, hash };
  }
}

function requireString(document: JsonObject, key: string, label: string): string {
  const value = document[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new FlowValidationError(`${label}: '${key}' must be a non-empty string`);
  }
  return value;
}

/**
 * The single non-reserved key of a node entry names its component
 */
export function findComponentKeys(entry: JsonObject): string[] {
  return Object.keys(entry).filter(key => !reservedKeys.has(key));
}

function toNodeRef(nodeId: string, entry: JsonValue, label: string): NodeRef {
  if (!NODE_ID_PATTERN.test(nodeId)) {
    throw new FlowValidationError(`${label}: invalid node id '${nodeId}'`, { nodeId });
  }
  if (INTEGER_KEY_PATTERN.test(nodeId)) {
    throw new FlowValidationError(`${label}: node id '${nodeId}' must not be a plain integer`, { nodeId });
  }
  if (!isJsonObject(entry)) {
    throw new FlowValidationError(`${label}: node '${nodeId}' must be a mapping`, { nodeId });
  }

  const componentKeys = findComponentKeys(entry);
  if (componentKeys.length !== 1) {
    throw new FlowValidationError(
      `${label}: node '${nodeId}' must reference exactly one component (found ${componentKeys.length === 0 ? 'none' : componentKeys.join(', ')})`,
      { nodeId }
    );
  }
  const name = componentKeys[0];

  const version = entry.version;
  if (version !== undefined && typeof version !== 'string') {
    throw new FlowValidationError(`${label}: node '${nodeId}' version must be a quoted string`, { nodeId });
  }
  if (version !== undefined && !isValidVersionRequirement(version)) {
    throw new FlowValidationError(`${label}: node '${nodeId}' has invalid version requirement '${version}'`, { nodeId });
  }

  const schemaId = entry.schema_id;
  if (schemaId !== undefined && typeof schemaId !== 'string') {
    throw new FlowValidationError(`${label}: node '${nodeId}' schema_id must be a string`, { nodeId });
  }

  return {
    nodeId,
    component: {
      name,
      versionReq: builtinKindOf(name) !== null ? ANY_VERSION : (version ?? ANY_VERSION)
    },
    ...(schemaId !== undefined ? { schemaId } : {})
  };
}

function validateRouting(nodeId: string, entry: JsonValue, nodesMap: JsonObject, label: string): void {
  if (!isJsonObject(entry) || entry.routing === undefined) {
    return;
  }
  const routing = entry.routing;
  if (!Array.isArray(routing)) {
    throw new FlowValidationError(`${label}: node '${nodeId}' routing must be a list`, { nodeId });
  }
  for (const route of routing) {
    if (!isJsonObject(route)) {
      throw new FlowValidationError(`${label}: node '${nodeId}' has a routing entry that is not a mapping`, { nodeId });
    }
    const target = route.to;
    if (target === undefined) continue;
    if (typeof target !== 'string' || (target !== ROUTE_OUT && !Object.hasOwn(nodesMap, target))) {
      throw new FlowValidationError(
        `${label}: node '${nodeId}' routes to unknown node ${JSON.stringify(target)}`,
        { nodeId }
      );
    }
  }
}
