import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { PackBuildTracker, buildPack, runPackBuildPipeline } from '../../../src/core/pack/pack-pipeline.js';
import { inspectPack } from '../../../src/core/pack/pack-inspect.js';
import { TarPackAssembler, readPackArchive } from '../../../src/core/pack/pack-archive.js';
import { silentOutput } from '../../../src/core/ports/console-output.js';
import type { ArchiveAssembler, PackBuildConfig } from '../../../src/types/index.js';
import { isJsonObject } from '../../../src/types/index.js';
import {
  ComponentNotFoundError,
  MissingExecPayloadError,
  NonDeterministicBuildError,
  PathEscapeError,
  SchemaValidationFailedError
} from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { cleanup, createRecordingOutput, createTempDir, writeComponent, writeFlow, writeWorkspaceFile } from '../../test-helpers.js';

const ECHO_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    operation: { type: 'string' }
  },
  required: ['message'],
  additionalProperties: false
};

const TWO_ECHO_NODES = [
  'id: hello',
  'type: messaging',
  'nodes:',
  '  first:',
  '    echo:',
  '      message: hi',
  '    version: "1.0.0"',
  '    routing:',
  '      - to: second',
  '  second:',
  '    echo:',
  '      message: there',
  '    routing:',
  '      - to: out'
];

describe('buildPack', () => {
  let root: string;
  let config: PackBuildConfig;

  beforeEach(async () => {
    root = await createTempDir('flowpack-pipeline-');
    await writeComponent(root, {
      id: 'echo',
      version: '1.0.0',
      operations: ['echo', 'reverse'],
      configSchema: ECHO_SCHEMA
    });
    config = {
      workspaceRoot: root,
      flowPath: 'flows/hello.ygtc',
      outputPath: 'dist/hello.fpack',
      signing: 'dev',
      strictDeterminism: false,
      buildTime: new Date('2024-01-01T00:00:00.000Z'),
      host: 'test-host'
    };
  });

  afterEach(async () => {
    await cleanup([root]);
  });

  it('should pack two nodes of one component with one artifact and two snapshots', async () => {
    await writeFlow(root, TWO_ECHO_NODES);

    const summary = await buildPack(config, { output: silentOutput });

    assert.equal(summary.outPath, join(root, 'dist', 'hello.fpack'));
    assert.equal(summary.flowId, 'hello');
    assert.equal(summary.nodeCount, 2);
    assert.deepEqual(summary.components, ['echo@1.0.0']);
    assert.equal(summary.determinismVerified, false);
    assert.deepEqual(summary.stages, [
      'start',
      'flow-validated',
      'nodes-resolved',
      'config-normalized',
      'schema-checked',
      'artifacts-collected',
      'assembled',
      'done'
    ]);

    const diagnosticsDir = join(root, '.flowpack', 'resolved_config');
    assert.equal(summary.diagnosticsDir, diagnosticsDir);
    assert.deepEqual((await readdir(diagnosticsDir)).sort(), ['first.json', 'second.json']);
  });

  it('should snapshot the normalized configuration of each node', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    await buildPack(config, { output: silentOutput });

    const snapshot: unknown = JSON.parse(await readFile(join(root, '.flowpack', 'resolved_config', 'first.json'), 'utf8'));
    assert.deepEqual(snapshot, {
      node_id: 'first',
      component: 'echo',
      version: '1.0.0',
      config: { message: 'hi', operation: 'echo', op: 'echo' }
    });
  });

  it('should pack the normalized flow and verify against its own manifest', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    const summary = await buildPack(config, { output: silentOutput });

    const inspection = await inspectPack(summary.outPath);
    assert.deepEqual(inspection.problems, []);
    assert.equal(inspection.manifestHash, summary.manifestHash);

    const entries = await readPackArchive(await readFile(summary.outPath));
    const flow: unknown = JSON.parse(entries.get('flows/hello/flow.json')?.toString('utf8') ?? 'null');
    assert.ok(isJsonObject(flow));
    assert.deepEqual(flow.nodes, {
      first: {
        echo: { message: 'hi', operation: 'echo', op: 'echo' },
        version: '1.0.0',
        routing: [{ to: 'second' }]
      },
      second: {
        echo: { message: 'there', operation: 'echo', op: 'echo' },
        routing: [{ to: 'out' }]
      }
    });
  });

  it('should default pack metadata from the flow', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    const summary = await buildPack(config, { output: silentOutput });

    const inspection = await inspectPack(summary.outPath);
    const meta = inspection.manifest?.meta;
    assert.ok(isJsonObject(meta));
    assert.equal(meta.pack_id, 'dev.local.hello');
    assert.equal(meta.version, '0.1.0');
    assert.equal(meta.created_at_utc, '2024-01-01T00:00:00.000Z');
  });

  it('should read pack metadata from a descriptor', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    await writeWorkspaceFile(root, 'pack.toml', 'pack_id = "com.example.hello"\nversion = "2.0.0"\n');

    const summary = await buildPack({ ...config, metaPath: 'pack.toml' }, { output: silentOutput });

    const meta = (await inspectPack(summary.outPath)).manifest?.meta;
    assert.ok(isJsonObject(meta));
    assert.equal(meta.pack_id, 'com.example.hello');
    assert.equal(meta.version, '2.0.0');
  });

  it('should verify determinism in strict mode', async () => {
    await writeFlow(root, TWO_ECHO_NODES);

    const summary = await buildPack({ ...config, strictDeterminism: true }, { output: silentOutput });

    assert.equal(summary.determinismVerified, true);
    assert.deepEqual(summary.stages.slice(-3), ['assembled', 'determinism-verified', 'done']);
    assert.equal(await exists(summary.outPath), true);
  });

  it('should remove the archive when a rebuild differs', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    let builds = 0;
    const unstable: ArchiveAssembler = {
      async assemble(request) {
        builds += 1;
        await mkdir(dirname(request.outputPath), { recursive: true });
        await writeFile(request.outputPath, `build ${builds}`);
        return { outPath: request.outputPath, manifestHash: 'unused' };
      }
    };

    await assert.rejects(
      buildPack({ ...config, strictDeterminism: true }, { output: silentOutput, assembler: unstable }),
      (error: unknown) => {
        assert.ok(error instanceof NonDeterministicBuildError);
        assert.equal(error.details?.firstDifference, 6);
        return true;
      }
    );
    assert.equal(builds, 2);
    assert.equal(await exists(join(root, 'dist', 'hello.fpack')), false);
  });

  it('should not reject operation keys the build fills in', async () => {
    await writeFlow(root, ['id: hello', 'type: messaging', 'nodes:', '  a:', '    echo:', '      message: hi']);

    const summary = await buildPack(config, { output: silentOutput });

    const entries = await readPackArchive(await readFile(summary.outPath));
    const flow: unknown = JSON.parse(entries.get('flows/hello/flow.json')?.toString('utf8') ?? 'null');
    assert.ok(isJsonObject(flow));
    assert.deepEqual(flow.nodes, { a: { echo: { message: 'hi', operation: 'echo', op: 'echo' } } });
  });

  it('should remove the archive when the verification rebuild fails', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    const tar = new TarPackAssembler();
    let builds = 0;
    const failsOnRebuild: ArchiveAssembler = {
      async assemble(request) {
        builds += 1;
        if (builds > 1) {
          throw new Error('rebuild failed');
        }
        return tar.assemble(request);
      }
    };
    const tracker = new PackBuildTracker();

    await assert.rejects(
      buildPack({ ...config, strictDeterminism: true }, { output: silentOutput, assembler: failsOnRebuild, tracker }),
      /rebuild failed/
    );
    assert.equal(builds, 2);
    assert.equal(tracker.stage, 'failed');
    assert.equal(await exists(join(root, 'dist', 'hello.fpack')), false);
  });

  it('should aggregate schema errors and write nothing', async () => {
    await writeFlow(root, [
      'id: hello',
      'type: messaging',
      'nodes:',
      '  first:',
      '    echo:',
      '      extra: 1',
      '  second:',
      '    echo:',
      '      message: 5'
    ]);
    const tracker = new PackBuildTracker();

    await assert.rejects(buildPack(config, { output: silentOutput, tracker }), (error: unknown) => {
      assert.ok(error instanceof SchemaValidationFailedError);
      assert.equal(error.errors.length, 3);
      assert.deepEqual(
        error.errors.map(e => e.pointer),
        ['/nodes/first/echo', '/nodes/first/echo', '/nodes/second/echo/message']
      );
      return true;
    });

    assert.deepEqual(tracker.stages.slice(-2), ['config-normalized', 'failed']);
    assert.equal(await exists(join(root, 'dist', 'hello.fpack')), false);
    assert.equal(await exists(join(root, '.flowpack', 'resolved_config')), false);
  });

  it('should reject exec nodes without a component reference', async () => {
    await writeFlow(root, [
      'id: hello',
      'type: messaging',
      'nodes:',
      '  run:',
      '    component.exec:',
      '      message: hi'
    ]);
    await assert.rejects(buildPack(config, { output: silentOutput }), MissingExecPayloadError);
  });

  it('should resolve components referenced through component.exec', async () => {
    await writeFlow(root, [
      'id: hello',
      'type: messaging',
      'nodes:',
      '  run:',
      '    component.exec:',
      '      component: "echo@^1"',
      '      message: hi',
      '  done:',
      '    emit.response: {}'
    ]);
    const summary = await buildPack(config, { output: silentOutput });
    assert.deepEqual(summary.components, ['echo@1.0.0']);
    assert.equal(summary.nodeCount, 1);
  });

  it('should fail on components that cannot be found', async () => {
    await writeFlow(root, ['id: hello', 'type: messaging', 'nodes:', '  a:', '    upper: {}']);
    await assert.rejects(buildPack(config, { output: silentOutput }), ComponentNotFoundError);
  });

  it('should search a custom component directory', async () => {
    await writeComponent(root, { id: 'upper', version: '0.2.0', dir: 'vendor/upper' });
    await writeFlow(root, ['id: hello', 'type: messaging', 'nodes:', '  a:', '    upper: {}']);

    const summary = await buildPack({ ...config, componentDir: 'vendor' }, { output: silentOutput });
    assert.deepEqual(summary.components, ['upper@0.2.0']);
  });

  it('should write snapshots to a custom diagnostics directory', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    const summary = await buildPack({ ...config, diagnosticsDir: 'out/diag' }, { output: silentOutput });

    assert.equal(summary.diagnosticsDir, join(root, 'out', 'diag'));
    assert.deepEqual((await readdir(join(root, 'out', 'diag'))).sort(), ['first.json', 'second.json']);
  });

  it('should refuse flows outside the workspace', async () => {
    const outside = await createTempDir('flowpack-outside-');
    try {
      const flowPath = await writeFlow(outside, TWO_ECHO_NODES);
      await assert.rejects(buildPack({ ...config, flowPath }, { output: silentOutput }), PathEscapeError);
    } finally {
      await cleanup([outside]);
    }
  });

  it('should report progress through the output port', async () => {
    await writeFlow(root, TWO_ECHO_NODES);
    const output = createRecordingOutput();
    const summary = await buildPack(config, { output });

    assert.deepEqual(output.lines, [
      `step: Building pack from ${join(root, 'flows', 'hello.ygtc')}`,
      `success: Pack written to ${summary.outPath}`,
      `info: manifest hash: ${summary.manifestHash}`
    ]);
  });
});

describe('runPackBuildPipeline', () => {
  it('should turn failures into a command result', async () => {
    const root = await createTempDir('flowpack-pipeline-');
    try {
      await writeFlow(root, ['id: hello', 'type: messaging', 'nodes:', '  a:', '    upper: {}']);
      const result = await runPackBuildPipeline(
        {
          workspaceRoot: root,
          flowPath: 'flows/hello.ygtc',
          outputPath: 'dist/hello.fpack',
          signing: 'none',
          strictDeterminism: false
        },
        { output: silentOutput }
      );

      assert.equal(result.success, false);
      assert.equal(result.data, undefined);
      assert.match(result.error ?? '', /^No component 'upper' satisfies '\*'/);
    } finally {
      await cleanup([root]);
    }
  });
});
