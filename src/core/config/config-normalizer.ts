/**
 * Config Normalizer
 *
 * Runners expect every component node to carry an explicit operation. When a
 * node's configuration names none, the first operation declared in the
 * component manifest is backfilled under both `operation` and the legacy `op`.
 * A blank string counts as unset and is overwritten like a missing key.
 * The flow document is updated in place; resolved nodes are replaced, never
 * mutated.
 */

import type { ComponentLookup, JsonObject, JsonValue, ResolvedNode } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { BUILTIN_COMPONENTS, OPERATION_KEYS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { getNodesMap } from '../flow/flow-document.js';
import { execConfig } from '../nodes/node-resolver.js';

function isNonBlankString(value: JsonValue | undefined): boolean {
  return typeof value === 'string' && value.trim() !== '';
}

export function hasExplicitOperation(config: JsonObject): boolean {
  return isNonBlankString(config[OPERATION_KEYS.CURRENT]) || isNonBlankString(config[OPERATION_KEYS.LEGACY]);
}

/**
 * Absent, null and blank values are unset; anything else is left alone
 */
function writeIfUnset(config: JsonObject, key: string, operation: string): void {
  const current = config[key];
  if (current === undefined || current === null || (typeof current === 'string' && current.trim() === '')) {
    config[key] = operation;
  }
}

/**
 * The payload object stored for a node, created when the entry has a bare key
 */
function payloadFor(flowDoc: JsonObject, node: ResolvedNode): JsonObject | null {
  const entry = getNodesMap(flowDoc)?.[node.nodeId];
  if (!isJsonObject(entry)) {
    return null;
  }
  const payload = entry[node.configKey];
  if (payload === undefined || payload === null) {
    const created: JsonObject = {};
    entry[node.configKey] = created;
    return created;
  }
  return isJsonObject(payload) ? payload : null;
}

export function normalizeNodeOperations(
  flowDoc: JsonObject,
  nodes: readonly ResolvedNode[],
  components: ComponentLookup
): ResolvedNode[] {
  return nodes.map(node => {
    const payload = payloadFor(flowDoc, node);
    if (!payload || hasExplicitOperation(payload)) {
      return node;
    }

    const operation = components.get(node.componentKey).operations[0];
    if (operation === undefined) {
      logger.debug(`No default operation for node ${node.nodeId}: ${node.componentKey} declares none`);
      return node;
    }

    writeIfUnset(payload, OPERATION_KEYS.CURRENT, operation);
    writeIfUnset(payload, OPERATION_KEYS.LEGACY, operation);
    logger.debug(`Backfilled operation '${operation}' for node ${node.nodeId}`);

    const config = node.configKey === BUILTIN_COMPONENTS.COMPONENT_EXEC
      ? execConfig(payload)
      : structuredClone(payload);
    return { ...node, config };
  });
}
