/**
 * Flow bundle types
 *
 * A flow is a declarative graph of nodes; each node invokes a component and
 * routes to other nodes. The flow validator turns a flow source into a
 * FlowBundle, which stays immutable for the rest of the build.
 */

import type { JsonValue } from './json.js';

/**
 * Component reference pinned on a flow node: a component name plus a semver
 * requirement ("*" when the flow did not pin one).
 */
export interface ComponentPin {
  readonly name: string;
  readonly versionReq: string;
}

export interface NodeRef {
  readonly nodeId: string;
  readonly component: ComponentPin;
  readonly schemaId?: string;
}

export interface FlowBundle {
  /** Flow identifier (`id` in the flow document) */
  readonly id: string;
  /** Flow kind (`type` in the flow document), e.g. "messaging" */
  readonly kind: string;
  /** Entry node id */
  readonly entry: string;
  /** Nodes in document order */
  readonly nodes: readonly NodeRef[];
  /** Canonical (key-sorted) JSON form of the flow document */
  readonly canonicalJson: JsonValue;
  /** Flow source text as read from disk */
  readonly source: string;
  /** blake3 hex digest of the canonical JSON serialization */
  readonly hash: string;
}

/**
 * Flow bundle handed to the archive assembler. Built from the normalized
 * flow document, so `canonicalJson` and `hash` can differ from the validated
 * bundle when operations were backfilled.
 */
export interface PackFlowBundle {
  readonly id: string;
  readonly kind: string;
  readonly entry: string;
  readonly source: string;
  readonly canonicalJson: JsonValue;
  readonly hash: string;
  readonly nodes: readonly NodeRef[];
}

/**
 * Service that parses and validates a flow source into a FlowBundle.
 */
export interface FlowValidator {
  validate(source: string, path?: string): Promise<FlowBundle>;
}
