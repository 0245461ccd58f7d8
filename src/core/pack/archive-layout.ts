/**
 * Archive layout and manifest
 *
 * A pack archive is a gzip'd tar with a fixed layout:
 *
 *   manifest.json
 *   flows/<flowId>/flow.ygtc
 *   flows/<flowId>/flow.json
 *   components/<name>@<version>/component.wasm
 *   components/<name>@<version>/manifest.json
 *   components/<name>@<version>/schema.json      (when the component has one)
 *
 * manifest.json indexes everything else and is what the manifest hash covers.
 */

import { ARCHIVE_PATHS } from '../../constants/index.js';
import type {
  ArchiveAssemblyRequest,
  ComponentArtifact,
  JsonObject,
  PackFlowBundle,
  PackMeta,
  Provenance
} from '../../types/index.js';
import { isJsonObject } from '../../types/index.js';
import { toJsonValue } from '../../utils/canonical-json.js';

/**
 * Make an identifier safe to use as a single archive path segment
 */
export function archiveSegment(value: string): string {
  const segment = value.replace(/[^A-Za-z0-9_.@+-]/g, '_');
  return segment === '.' || segment === '..' ? segment.replace(/\./g, '_') : segment;
}

export function flowEntryDir(flowId: string): string {
  return `${ARCHIVE_PATHS.FLOWS_DIR}/${archiveSegment(flowId)}`;
}

export function componentEntryDir(name: string, version: string): string {
  return `${ARCHIVE_PATHS.COMPONENTS_DIR}/${archiveSegment(`${name}@${version}`)}`;
}

function metaSection(meta: PackMeta): unknown {
  return {
    format_version: meta.packVersion,
    pack_id: meta.packId,
    version: meta.version,
    name: meta.name,
    kind: meta.kind,
    description: meta.description,
    authors: meta.authors,
    license: meta.license,
    homepage: meta.homepage,
    support: meta.support,
    vendor: meta.vendor,
    entry_flows: meta.entryFlows,
    imports: meta.imports.map(entry => ({ pack_id: entry.packId, version_req: entry.versionReq })),
    annotations: meta.annotations,
    created_at_utc: meta.createdAtUtc,
    distribution: meta.distribution
  };
}

function flowSection(flow: PackFlowBundle): unknown {
  const dir = flowEntryDir(flow.id);
  return {
    id: flow.id,
    kind: flow.kind,
    entry: flow.entry,
    source: `${dir}/${ARCHIVE_PATHS.FLOW_SOURCE}`,
    json: `${dir}/${ARCHIVE_PATHS.FLOW_JSON}`,
    hash_blake3: flow.hash,
    nodes: flow.nodes.map(node => ({
      node_id: node.nodeId,
      component: { name: node.component.name, version_req: node.component.versionReq },
      schema_id: node.schemaId
    }))
  };
}

function componentSection(component: ComponentArtifact): unknown {
  const dir = componentEntryDir(component.name, component.version);
  return {
    name: component.name,
    version: component.version,
    world: component.world,
    file_wasm: `${dir}/${ARCHIVE_PATHS.COMPONENT_ARTIFACT}`,
    manifest_file: `${dir}/${ARCHIVE_PATHS.COMPONENT_MANIFEST}`,
    schema_file: component.schema ? `${dir}/${ARCHIVE_PATHS.COMPONENT_SCHEMA}` : undefined,
    hash_blake3: component.hash,
    capabilities: component.capabilities
  };
}

function provenanceSection(provenance: Provenance): unknown {
  return {
    builder: provenance.builder,
    git_commit: provenance.gitCommit,
    git_repo: provenance.gitRepo,
    built_at_utc: provenance.builtAtUtc,
    host: provenance.host,
    notes: provenance.notes
  };
}

/**
 * The archive's manifest.json document. Absent optional fields are omitted
 * rather than written as null.
 */
export function buildArchiveManifest(request: Omit<ArchiveAssemblyRequest, 'outputPath'>): JsonObject {
  const manifest = toJsonValue({
    format_version: request.meta.packVersion,
    meta: metaSection(request.meta),
    flows: [flowSection(request.flow)],
    components: request.components.map(componentSection),
    signing: request.signing,
    provenance: provenanceSection(request.provenance)
  });
  if (!isJsonObject(manifest)) {
    throw new TypeError('Archive manifest must serialize to a JSON object');
  }
  return manifest;
}
