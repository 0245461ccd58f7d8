/**
 * Node Resolver
 *
 * Walks the validated flow's nodes in order and produces one ResolvedNode per
 * node backed by a component. Built-ins are skipped, except `component.exec`,
 * whose payload names the component to run.
 */

import type { FlowBundle, JsonObject, JsonValue, ResolvedComponent, ResolvedNode } from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { BUILTIN_COMPONENTS } from '../../constants/index.js';
import { jsonPointer } from '../../utils/canonical-json.js';
import { MissingExecPayloadError, MissingFlowNodeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { getNodesMap } from '../flow/flow-document.js';
import { classifyNode } from './node-kind.js';
import { parseComponentRef } from './component-ref.js';

export interface ComponentSource {
  resolve(name: string, versionReq: string): Promise<ResolvedComponent>;
}

const EXEC_COMPONENT_FIELD = 'component';

function lookupNodeEntry(flowDoc: JsonObject, nodeId: string): JsonObject {
  const nodes = getNodesMap(flowDoc);
  const entry = nodes ? nodes[nodeId] : undefined;
  if (!isJsonObject(entry)) {
    throw new MissingFlowNodeError(nodeId);
  }
  return entry;
}

/**
 * Configuration stored under `key`; a bare key (`echo:`) means empty configuration
 */
function readConfig(entry: JsonObject, key: string): JsonValue {
  const value = entry[key];
  return value === undefined || value === null ? {} : structuredClone(value);
}

/**
 * Exec payload minus the component reference it carries
 */
export function execConfig(payload: JsonObject): JsonObject {
  const config: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key !== EXEC_COMPONENT_FIELD) {
      config[key] = structuredClone(value);
    }
  }
  return config;
}

async function resolveExecNode(
  nodeId: string,
  entry: JsonObject,
  resolver: ComponentSource
): Promise<ResolvedNode> {
  const configKey = BUILTIN_COMPONENTS.COMPONENT_EXEC;
  const payload = entry[configKey];
  if (!isJsonObject(payload)) {
    throw new MissingExecPayloadError(nodeId, 'has no payload mapping');
  }
  const reference = payload[EXEC_COMPONENT_FIELD];
  if (typeof reference !== 'string' || reference.trim() === '') {
    throw new MissingExecPayloadError(nodeId, 'requires a `component` reference in its payload');
  }

  const { name, versionReq } = parseComponentRef(reference);
  const component = await resolver.resolve(name, versionReq);
  return {
    nodeId,
    componentKey: component.key,
    pointer: jsonPointer('nodes', nodeId, configKey),
    configKey,
    config: execConfig(payload)
  };
}

export async function resolveFlowNodes(
  bundle: FlowBundle,
  flowDoc: JsonObject,
  resolver: ComponentSource
): Promise<ResolvedNode[]> {
  const resolved: ResolvedNode[] = [];

  for (const ref of bundle.nodes) {
    const classified = classifyNode(ref);

    if (classified.kind === 'builtin') {
      if (classified.builtin !== 'component-exec') {
        logger.debug(`Skipping built-in node ${ref.nodeId} (${ref.component.name})`);
        continue;
      }
      const entry = lookupNodeEntry(flowDoc, ref.nodeId);
      resolved.push(await resolveExecNode(ref.nodeId, entry, resolver));
      continue;
    }

    const entry = lookupNodeEntry(flowDoc, ref.nodeId);
    const component = await resolver.resolve(ref.component.name, ref.component.versionReq);
    resolved.push({
      nodeId: ref.nodeId,
      componentKey: component.key,
      pointer: jsonPointer('nodes', ref.nodeId, ref.component.name),
      configKey: ref.component.name,
      config: readConfig(entry, ref.component.name)
    });
  }

  logger.debug(`Resolved ${resolved.length} of ${bundle.nodes.length} flow node(s)`);
  return resolved;
}
