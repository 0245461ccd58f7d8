import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  canonicalizeJson,
  escapePointerToken,
  jsonPointer,
  stringifyCanonicalJson,
  toJsonValue
} from '../../src/utils/canonical-json.js';

describe('canonical JSON', () => {
  it('should sort keys at every depth', () => {
    const value = { b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } };
    assert.equal(stringifyCanonicalJson(value), '{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}');
  });

  it('should sort integer-like keys as strings', () => {
    const value = { a: 1, 9: 'nine', 10: 'ten' };
    assert.equal(stringifyCanonicalJson(value), '{"10":"ten","9":"nine","a":1}');
  });

  it('should give the same text regardless of insertion order', () => {
    const left = { id: 'hello', nodes: { a: { echo: {} } }, type: 'messaging' };
    const right = { type: 'messaging', nodes: { a: { echo: {} } }, id: 'hello' };
    assert.equal(stringifyCanonicalJson(left), stringifyCanonicalJson(right));
  });

  it('should copy objects with keys in sorted order', () => {
    const source = { b: 1, a: { y: true, x: false } };
    const result = canonicalizeJson(source);
    assert.deepEqual(result, source);
    assert.notEqual(result, source);
    assert.deepEqual(Object.keys(result ?? {}), ['a', 'b']);
  });

  it('should convert parsed values into plain JSON', () => {
    const value = toJsonValue({ a: undefined, b: new Date(0), c: Number.NaN, d: [1, undefined] });
    assert.deepEqual(value, { b: '1970-01-01T00:00:00.000Z', c: null, d: [1, null] });
  });
});

describe('JSON pointers', () => {
  it('should escape reference tokens', () => {
    assert.equal(escapePointerToken('a/b~c'), 'a~1b~0c');
  });

  it('should join tokens into a pointer', () => {
    assert.equal(jsonPointer('nodes', 'greet', 'component.exec'), '/nodes/greet/component.exec');
    assert.equal(jsonPointer('nodes', 'a/b'), '/nodes/a~1b');
  });
});
