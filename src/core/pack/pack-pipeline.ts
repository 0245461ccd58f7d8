import { mkdtemp, realpath } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';

import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import type {
  ArchiveAssembler,
  CommandResult,
  FlowValidator,
  JsonObject,
  PackBuildConfig,
  PackBuildStage,
  PackBuildSummary,
  PackFlowBundle,
  PackSigning,
  Provenance
} from '../../types/index.js';
import { canonicalizeJson, stringifyCanonicalJson } from '../../utils/canonical-json.js';
import { handleError, NonDeterministicBuildError, SchemaValidationFailedError } from '../../utils/errors.js';
import { readBinaryFile, readTextFile, remove } from '../../utils/fs.js';
import { blake3Hex } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { normalizeUnderRoot } from '../../utils/path-safety.js';
import { ComponentResolver } from '../components/component-resolver.js';
import { normalizeNodeOperations } from '../config/config-normalizer.js';
import { parseFlowDocument } from '../flow/flow-document.js';
import { YamlFlowValidator } from '../flow/flow-validator.js';
import { resolveFlowNodes } from '../nodes/node-resolver.js';
import { consoleOutput } from '../ports/console-output.js';
import type { OutputPort } from '../ports/output.js';
import { SchemaValidator } from '../schema/schema-validator.js';
import { collectComponentArtifacts } from './artifact-collector.js';
import { TarPackAssembler } from './pack-archive.js';
import { loadPackMeta } from './pack-meta.js';
import { collectProvenance } from './provenance.js';
import { writeResolvedConfigs } from './resolved-config.js';

/**
 * Records the stage history of one build. `failed` is terminal.
 */
export class PackBuildTracker {
  private readonly history: PackBuildStage[] = ['start'];

  get stage(): PackBuildStage {
    return this.history[this.history.length - 1];
  }

  get stages(): PackBuildStage[] {
    return [...this.history];
  }

  advance(stage: PackBuildStage): void {
    if (this.stage === 'failed' || this.stage === 'done') {
      throw new Error(`Pack build already finished (${this.stage}); cannot move to ${stage}`);
    }
    logger.debug(`Pack build stage: ${this.stage} -> ${stage}`);
    this.history.push(stage);
  }

  fail(error: unknown): void {
    if (this.stage === 'failed') {
      return;
    }
    logger.debug(`Pack build failed after stage ${this.stage}`, error);
    this.history.push('failed');
  }
}

export interface PackBuildServices {
  flowValidator: FlowValidator;
  assembler: ArchiveAssembler;
  output: OutputPort;
  tracker: PackBuildTracker;
}

/**
 * Inputs of a single pipeline pass. Everything nondeterministic (timestamps,
 * provenance) is fixed here so that a rerun sees exactly the same values.
 */
interface PipelineInputs {
  flowPath: string;
  metaPath?: string;
  searchPath: string[];
  outputPath: string;
  diagnosticsDir: string;
  signing: PackSigning;
  createdAtUtc: string;
  provenance: Provenance;
}

interface PipelinePassResult {
  outPath: string;
  manifestHash: string;
  flow: PackFlowBundle;
  nodeCount: number;
  components: string[];
}

type StageListener = (stage: PackBuildStage) => void;

export function defaultComponentSearchPath(workspaceRoot: string): string[] {
  return [
    join(workspaceRoot, DIR_PATTERNS.COMPONENTS),
    join(workspaceRoot, DIR_PATTERNS.FLOWPACK, DIR_PATTERNS.COMPONENTS)
  ];
}

export function defaultDiagnosticsDir(workspaceRoot: string): string {
  return join(workspaceRoot, DIR_PATTERNS.FLOWPACK, DIR_PATTERNS.RESOLVED_CONFIG);
}

/**
 * Flow bundle for the archive, rebuilt from the normalized document
 */
async function toPackFlowBundle(
  validated: Omit<PackFlowBundle, 'canonicalJson' | 'hash'>,
  normalizedDoc: JsonObject
): Promise<PackFlowBundle> {
  const canonicalJson = canonicalizeJson(normalizedDoc);
  return {
    id: validated.id,
    kind: validated.kind,
    entry: validated.entry,
    source: validated.source,
    nodes: validated.nodes,
    canonicalJson,
    hash: await blake3Hex(stringifyCanonicalJson(canonicalJson))
  };
}

async function runPipelinePass(
  inputs: PipelineInputs,
  flowValidator: FlowValidator,
  assembler: ArchiveAssembler,
  onStage: StageListener
): Promise<PipelinePassResult> {
  const source = await readTextFile(inputs.flowPath);
  const bundle = await flowValidator.validate(source, inputs.flowPath);
  const flowDoc = parseFlowDocument(source, inputs.flowPath);
  onStage('flow-validated');

  // Fresh resolver per pass: the rerun must not reuse memoized resolutions
  const resolver = new ComponentResolver(inputs.searchPath);
  const resolved = await resolveFlowNodes(bundle, flowDoc, resolver);
  onStage('nodes-resolved');

  const nodes = normalizeNodeOperations(flowDoc, resolved, resolver);
  onStage('config-normalized');

  // Schemas describe what authors write; backfilled operation keys are not checked
  const schemaErrors = new SchemaValidator(resolver).validateNodes(resolved);
  if (schemaErrors.length > 0) {
    throw new SchemaValidationFailedError(schemaErrors);
  }
  onStage('schema-checked');

  await writeResolvedConfigs(inputs.diagnosticsDir, nodes, resolver);
  const components = collectComponentArtifacts(nodes, resolver);
  onStage('artifacts-collected');

  const meta = await loadPackMeta(inputs.metaPath, bundle, inputs.createdAtUtc);
  const flow = await toPackFlowBundle(bundle, flowDoc);
  const { outPath, manifestHash } = await assembler.assemble({
    meta,
    flow,
    signing: inputs.signing,
    provenance: inputs.provenance,
    components,
    outputPath: inputs.outputPath
  });
  onStage('assembled');

  return {
    outPath,
    manifestHash,
    flow,
    nodeCount: nodes.length,
    components: components.map(component => `${component.name}@${component.version}`)
  };
}

function firstDifference(a: Buffer, b: Buffer): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return i;
    }
  }
  return length;
}

/**
 * Rebuild into a scratch directory and byte-compare with the primary archive.
 * If the rebuild fails or differs, the primary archive is removed.
 */
async function verifyDeterminism(
  inputs: PipelineInputs,
  primaryPath: string,
  flowValidator: FlowValidator,
  assembler: ArchiveAssembler
): Promise<void> {
  const scratchDir = await mkdtemp(join(tmpdir(), 'flowpack-verify-'));
  try {
    const rebuild = await runPipelinePass(
      {
        ...inputs,
        outputPath: join(scratchDir, `rebuild${FILE_PATTERNS.ARCHIVE_EXTENSION}`),
        diagnosticsDir: join(scratchDir, DIR_PATTERNS.RESOLVED_CONFIG)
      },
      flowValidator,
      assembler,
      () => {}
    );

    const primaryBytes = await readBinaryFile(primaryPath);
    const rebuildBytes = await readBinaryFile(rebuild.outPath);
    if (!primaryBytes.equals(rebuildBytes)) {
      throw new NonDeterministicBuildError({
        primary: primaryPath,
        rebuild: rebuild.outPath,
        firstDifference: firstDifference(primaryBytes, rebuildBytes),
        primarySize: primaryBytes.length,
        rebuildSize: rebuildBytes.length
      });
    }
  } catch (error) {
    await remove(primaryPath);
    throw error;
  } finally {
    await remove(scratchDir);
  }
}

function defaultServices(): PackBuildServices {
  return {
    flowValidator: new YamlFlowValidator(),
    assembler: new TarPackAssembler(),
    output: consoleOutput,
    tracker: new PackBuildTracker()
  };
}

/**
 * Validate a flow, resolve and check its components, and write the pack archive
 */
export async function buildPack(
  config: PackBuildConfig,
  services: Partial<PackBuildServices> = {}
): Promise<PackBuildSummary> {
  const { flowValidator, assembler, output, tracker } = { ...defaultServices(), ...services };

  try {
    const workspaceRoot = await realpath(config.workspaceRoot);
    const flowPath = await normalizeUnderRoot(workspaceRoot, config.flowPath);
    const metaPath = config.metaPath ? await normalizeUnderRoot(workspaceRoot, config.metaPath) : undefined;
    const searchPath = config.componentDir
      ? [await normalizeUnderRoot(workspaceRoot, config.componentDir)]
      : defaultComponentSearchPath(workspaceRoot);
    const diagnosticsDir = config.diagnosticsDir
      ? resolve(workspaceRoot, config.diagnosticsDir)
      : defaultDiagnosticsDir(workspaceRoot);

    const buildTime = config.buildTime ?? new Date();
    const inputs: PipelineInputs = {
      flowPath,
      metaPath,
      searchPath,
      outputPath: resolve(workspaceRoot, config.outputPath),
      diagnosticsDir,
      signing: config.signing,
      createdAtUtc: buildTime.toISOString(),
      provenance: await collectProvenance({ workspaceRoot, buildTime, host: config.host })
    };

    output.step(`Building pack from ${flowPath}`);
    const result = await runPipelinePass(inputs, flowValidator, assembler, stage => tracker.advance(stage));

    if (config.strictDeterminism) {
      output.step('Verifying deterministic output');
      await verifyDeterminism(inputs, result.outPath, flowValidator, assembler);
      tracker.advance('determinism-verified');
    }
    tracker.advance('done');

    output.success(`Pack written to ${result.outPath}`);
    output.info(`manifest hash: ${result.manifestHash}`);

    return {
      outPath: result.outPath,
      manifestHash: result.manifestHash,
      flowId: result.flow.id,
      flowHash: result.flow.hash,
      nodeCount: result.nodeCount,
      components: result.components,
      diagnosticsDir,
      determinismVerified: config.strictDeterminism,
      stages: tracker.stages
    };
  } catch (error) {
    tracker.fail(error);
    throw error;
  }
}

export async function runPackBuildPipeline(
  config: PackBuildConfig,
  services: Partial<PackBuildServices> = {}
): Promise<CommandResult<PackBuildSummary>> {
  try {
    const summary = await buildPack(config, services);
    return { success: true, data: summary };
  } catch (error) {
    return { success: false, error: handleError(error).error };
  }
}
