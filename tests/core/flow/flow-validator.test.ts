import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { YamlFlowValidator } from '../../../src/core/flow/flow-validator.js';
import { parseFlowDocument } from '../../../src/core/flow/flow-document.js';
import { stringifyCanonicalJson } from '../../../src/utils/canonical-json.js';
import { FlowValidationError } from '../../../src/utils/errors.js';
import { blake3Hex } from '../../../src/utils/hash-utils.js';

const HELLO_FLOW = [
  'id: hello',
  'type: messaging',
  'nodes:',
  '  greet:',
  '    echo:',
  '      message: hi',
  '    version: "1.0.0"',
  '    routing:',
  '      - to: shout',
  '  shout:',
  '    component.exec:',
  '      component: "upper@^1"',
  '    routing:',
  '      - to: done',
  '  done:',
  '    emit.response: {}',
  '    routing:',
  '      - to: out',
  ''
].join('\n');

function flowWith(nodeLines: string[], header: string[] = ['id: hello', 'type: messaging']): string {
  return [...header, 'nodes:', ...nodeLines, ''].join('\n');
}

describe('YamlFlowValidator', () => {
  const validator = new YamlFlowValidator();

  it('should describe every node with its component pin', async () => {
    const bundle = await validator.validate(HELLO_FLOW, 'flows/hello.ygtc');

    assert.equal(bundle.id, 'hello');
    assert.equal(bundle.kind, 'messaging');
    assert.equal(bundle.entry, 'greet');
    assert.equal(bundle.source, HELLO_FLOW);
    assert.deepEqual(bundle.nodes, [
      { nodeId: 'greet', component: { name: 'echo', versionReq: '1.0.0' } },
      { nodeId: 'shout', component: { name: 'component.exec', versionReq: '*' } },
      { nodeId: 'done', component: { name: 'emit.response', versionReq: '*' } }
    ]);
  });

  it('should hash the canonical JSON form', async () => {
    const bundle = await validator.validate(HELLO_FLOW);
    assert.equal(bundle.hash, await blake3Hex(stringifyCanonicalJson(bundle.canonicalJson)));
    assert.match(bundle.hash, /^[0-9a-f]{64}$/);
  });

  it('should hash documents independently of key order', async () => {
    const reordered = [
      'type: messaging',
      'id: hello',
      'nodes:',
      '  greet:',
      '    echo:',
      '      message: hi',
      ''
    ].join('\n');
    const original = flowWith(['  greet:', '    echo:', '      message: hi']);
    const [a, b] = await Promise.all([validator.validate(reordered), validator.validate(original)]);
    assert.equal(a.hash, b.hash);
  });

  it('should honour an explicit start node', async () => {
    const source = flowWith(['  a:', '    echo: {}', '  b:', '    echo: {}'], ['id: hello', 'type: messaging', 'start: b']);
    const bundle = await validator.validate(source);
    assert.equal(bundle.entry, 'b');
  });

  it('should record schema ids', async () => {
    const bundle = await validator.validate(flowWith(['  a:', '    echo: {}', '    schema_id: greeting.v1']));
    assert.deepEqual(bundle.nodes[0], { nodeId: 'a', component: { name: 'echo', versionReq: '*' }, schemaId: 'greeting.v1' });
  });

  it('should reject a start node that is not declared', async () => {
    const source = flowWith(['  a:', '    echo: {}'], ['id: hello', 'type: messaging', 'start: toString']);
    await assert.rejects(validator.validate(source), /start node 'toString' is not declared/);
  });

  it('should reject routes to unknown nodes', async () => {
    const source = flowWith(['  a:', '    echo: {}', '    routing:', '      - to: nowhere']);
    await assert.rejects(validator.validate(source), /routes to unknown node "nowhere"/);
  });

  it('should require exactly one component per node', async () => {
    await assert.rejects(
      validator.validate(flowWith(['  a:', '    echo: {}', '    upper: {}'])),
      /node 'a' must reference exactly one component \(found echo, upper\)/
    );
    await assert.rejects(
      validator.validate(flowWith(['  a:', '    title: Nothing here'])),
      /node 'a' must reference exactly one component \(found none\)/
    );
  });

  it('should reject malformed node ids', async () => {
    await assert.rejects(validator.validate(flowWith(['  "-bad":', '    echo: {}'])), /invalid node id '-bad'/);
  });

  it('should reject plain integer node ids', async () => {
    await assert.rejects(
      validator.validate(flowWith(['  start:', '    echo: {}', '  "10":', '    echo: {}'])),
      (error: unknown) => {
        assert.ok(error instanceof FlowValidationError);
        assert.equal(error.message, "Flow validation failed: flow: node id '10' must not be a plain integer");
        return true;
      }
    );
  });

  it('should keep document order for ids with leading zeros', async () => {
    const bundle = await validator.validate(flowWith(['  start:', '    echo: {}', '  "010":', '    echo: {}']));
    assert.equal(bundle.entry, 'start');
    assert.deepEqual(bundle.nodes.map(node => node.nodeId), ['start', '010']);
  });

  it('should require version requirements to be quoted strings', async () => {
    await assert.rejects(
      validator.validate(flowWith(['  a:', '    echo: {}', '    version: 1.0'])),
      /version must be a quoted string/
    );
    await assert.rejects(
      validator.validate(flowWith(['  a:', '    echo: {}', '    version: "banana"'])),
      /invalid version requirement 'banana'/
    );
  });

  it('should require id, type and nodes', async () => {
    await assert.rejects(validator.validate(flowWith(['  a:', '    echo: {}'], ['type: messaging'])), /'id' must be a non-empty string/);
    await assert.rejects(validator.validate('id: hello\ntype: messaging\n'), /at least one node/);
  });

  it('should reject unsupported schema versions', async () => {
    const source = flowWith(['  a:', '    echo: {}'], ['schema_version: 2', 'id: hello', 'type: messaging']);
    await assert.rejects(validator.validate(source), /unsupported schema_version 2/);
  });

  it('should surface YAML syntax errors as flow validation errors', async () => {
    await assert.rejects(validator.validate('id: [unterminated\n'), FlowValidationError);
  });
});

describe('parseFlowDocument', () => {
  it('should keep timestamps as strings', () => {
    const document = parseFlowDocument('id: hello\ncreated: 2024-01-01T00:00:00Z\n');
    assert.equal(document.created, '2024-01-01T00:00:00Z');
  });

  it('should reject documents that are not mappings', () => {
    assert.throws(() => parseFlowDocument('- a\n- b\n'), FlowValidationError);
  });
});
