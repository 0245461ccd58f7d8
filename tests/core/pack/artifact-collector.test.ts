import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { collectComponentArtifacts, toComponentArtifact } from '../../../src/core/pack/artifact-collector.js';
import type { ResolvedNode } from '../../../src/types/index.js';
import { createLookup, fakeComponent } from '../../test-helpers.js';

const echo = fakeComponent('echo', '1.0.0', {
  contentHash: 'BLAKE3:ABCDEF',
  schema: { type: 'object' },
  capabilities: { http: false }
});
const upper = fakeComponent('upper', '2.0.0', { contentHash: 'blake3:0123' });
const components = createLookup([echo, upper]);

function node(nodeId: string, componentKey: ResolvedNode['componentKey']): ResolvedNode {
  return { nodeId, componentKey, pointer: `/nodes/${nodeId}/x`, configKey: 'x', config: {} };
}

describe('collectComponentArtifacts', () => {
  it('should emit one artifact per component build in first-seen order', () => {
    const artifacts = collectComponentArtifacts(
      [node('a', 'upper@2.0.0'), node('b', 'echo@1.0.0'), node('c', 'upper@2.0.0'), node('d', 'echo@1.0.0')],
      components
    );
    assert.deepEqual(artifacts.map(a => `${a.name}@${a.version}`), ['upper@2.0.0', 'echo@1.0.0']);
  });

  it('should return nothing for a flow without component nodes', () => {
    assert.deepEqual(collectComponentArtifacts([], components), []);
  });
});

describe('toComponentArtifact', () => {
  it('should strip the hash scheme and lower-case the digest', () => {
    assert.deepEqual(toComponentArtifact(echo), {
      name: 'echo',
      version: '1.0.0',
      artifactPath: echo.artifactPath,
      manifest: echo.manifest,
      schema: { type: 'object' },
      capabilities: { http: false },
      world: echo.world,
      hash: 'abcdef'
    });
  });

  it('should omit the schema when the component has none', () => {
    const artifact = toComponentArtifact(upper);
    assert.equal('schema' in artifact, false);
    assert.equal(artifact.hash, '0123');
  });
});
