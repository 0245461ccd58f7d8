import type { ComponentArtifact, ComponentKey, ComponentLookup, ResolvedComponent, ResolvedNode } from '../../types/index.js';
import { normalizeHashHex } from '../../utils/hash-utils.js';

/**
 * Packaging projection of a resolved component
 */
export function toComponentArtifact(component: ResolvedComponent): ComponentArtifact {
  return {
    name: component.name,
    version: component.version,
    artifactPath: component.artifactPath,
    manifest: component.manifest,
    ...(component.schema ? { schema: component.schema } : {}),
    capabilities: component.capabilities,
    world: component.world,
    hash: normalizeHashHex(component.contentHash)
  };
}

/**
 * One artifact per unique name@version, in first-seen node order
 */
export function collectComponentArtifacts(
  nodes: readonly ResolvedNode[],
  components: ComponentLookup
): ComponentArtifact[] {
  const artifacts = new Map<ComponentKey, ComponentArtifact>();
  for (const node of nodes) {
    if (!artifacts.has(node.componentKey)) {
      artifacts.set(node.componentKey, toComponentArtifact(components.get(node.componentKey)));
    }
  }
  return Array.from(artifacts.values());
}
