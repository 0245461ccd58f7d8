/**
 * Component and resolved-node types
 */

import type { JsonObject, JsonValue } from './json.js';

/** `name@version` identity of a resolved component */
export type ComponentKey = `${string}@${string}`;

/**
 * Parsed view of component.manifest.json. Only the fields the build reads are
 * typed; the raw object is kept alongside for packaging.
 */
export interface ComponentManifest {
  /** Reference name used by flows (falls back to `name`) */
  id: string;
  name?: string;
  version: string;
  world: string;
  operations: string[];
  /** Inline JSON Schema or a path relative to the component directory */
  configSchema?: JsonObject | string;
  capabilities: JsonValue;
  artifactFile: string;
  declaredHash?: string;
}

/**
 * A concrete component build. One instance per name@version, shared by key
 * across every node that references it.
 */
export interface ResolvedComponent {
  readonly key: ComponentKey;
  readonly name: string;
  readonly version: string;
  readonly sourceDir: string;
  readonly artifactPath: string;
  readonly manifest: JsonObject;
  readonly operations: readonly string[];
  readonly schema?: JsonObject;
  readonly capabilities: JsonValue;
  readonly world: string;
  /** `blake3:<hex>` digest of the artifact bytes */
  readonly contentHash: string;
}

export interface ResolvedNode {
  readonly nodeId: string;
  readonly componentKey: ComponentKey;
  /** JSON pointer to the node's configuration inside the flow document */
  readonly pointer: string;
  /** Key under the node entry holding the payload (component name or built-in wrapper) */
  readonly configKey: string;
  readonly config: JsonValue;
}

export interface NodeSchemaError {
  readonly nodeId: string;
  readonly component: string;
  readonly pointer: string;
  readonly message: string;
}

export interface ComponentArtifact {
  readonly name: string;
  readonly version: string;
  readonly artifactPath: string;
  readonly manifest: JsonObject;
  readonly schema?: JsonObject;
  readonly capabilities: JsonValue;
  readonly world: string;
  /** Lower-case hex digest without a scheme prefix */
  readonly hash: string;
}

/**
 * Read access to the components resolved during one build.
 */
export interface ComponentLookup {
  get(key: ComponentKey): ResolvedComponent;
}
