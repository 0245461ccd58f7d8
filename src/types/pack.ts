/**
 * Pack metadata, provenance and build configuration types
 */

import type { ComponentArtifact } from './components.js';
import type { PackFlowBundle } from './flows.js';
import type { JsonObject } from './json.js';

export type PackSigning = 'dev' | 'none';

export const PACK_KINDS = ['application', 'provider', 'infrastructure', 'library'] as const;
export type PackKind = (typeof PACK_KINDS)[number];

export interface PackImport {
  packId: string;
  versionReq: string;
}

export interface PackMeta {
  /** Archive format version */
  packVersion: number;
  packId: string;
  version: string;
  name: string;
  kind?: PackKind;
  description?: string;
  authors: string[];
  license?: string;
  homepage?: string;
  support?: string;
  vendor?: string;
  entryFlows: string[];
  imports: PackImport[];
  annotations: JsonObject;
  createdAtUtc: string;
  distribution?: JsonObject;
}

export interface Provenance {
  builder: string;
  gitCommit?: string;
  gitRepo?: string;
  builtAtUtc: string;
  host?: string;
  notes?: string;
}

/**
 * Inputs of one pack build. Everything the pipeline needs is passed in here;
 * core modules never consult process.env.
 */
export interface PackBuildConfig {
  /** Absolute workspace root; flow, metadata and component paths must stay inside it */
  workspaceRoot: string;
  flowPath: string;
  outputPath: string;
  signing: PackSigning;
  metaPath?: string;
  /** Component search directory; defaults to the workspace search path */
  componentDir?: string;
  /** Resolved-config snapshot directory; defaults to .flowpack/resolved_config */
  diagnosticsDir?: string;
  /** Rebuild into a scratch location and byte-compare the archives */
  strictDeterminism: boolean;
  /** Build timestamp; defaults to the current time */
  buildTime?: Date;
  host?: string;
}

export interface ArchiveAssemblyRequest {
  meta: PackMeta;
  flow: PackFlowBundle;
  signing: PackSigning;
  provenance: Provenance;
  components: readonly ComponentArtifact[];
  outputPath: string;
}

export interface ArchiveAssemblyResult {
  outPath: string;
  /** blake3 hex digest of the archive's manifest.json */
  manifestHash: string;
}

/**
 * Service that writes a pack archive. Implementations must only make the
 * archive visible at `outputPath` once it is complete.
 */
export interface ArchiveAssembler {
  assemble(request: ArchiveAssemblyRequest): Promise<ArchiveAssemblyResult>;
}

export type PackBuildStage =
  | 'start'
  | 'flow-validated'
  | 'nodes-resolved'
  | 'config-normalized'
  | 'schema-checked'
  | 'artifacts-collected'
  | 'assembled'
  | 'determinism-verified'
  | 'done'
  | 'failed';

export interface PackBuildSummary {
  outPath: string;
  manifestHash: string;
  flowId: string;
  flowHash: string;
  nodeCount: number;
  components: string[];
  diagnosticsDir: string;
  determinismVerified: boolean;
  stages: PackBuildStage[];
}
