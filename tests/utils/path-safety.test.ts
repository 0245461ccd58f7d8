import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { isWithin, normalizeUnderRoot } from '../../src/utils/path-safety.js';
import { FileSystemError, PathEscapeError } from '../../src/utils/errors.js';
import { cleanup, createTempDir } from '../test-helpers.js';

describe('normalizeUnderRoot', () => {
  let root: string;
  let outside: string;

  before(async () => {
    root = await createTempDir('flowpack-root-');
    outside = await createTempDir('flowpack-outside-');
    await mkdir(join(root, 'flows'), { recursive: true });
    await writeFile(join(root, 'flows', 'hello.ygtc'), 'id: hello\n', 'utf8');
    await writeFile(join(outside, 'secret.ygtc'), 'id: secret\n', 'utf8');
    await symlink(outside, join(root, 'linked'));
  });

  after(async () => {
    await cleanup([root, outside]);
  });

  it('should resolve relative paths against the root', async () => {
    assert.equal(await normalizeUnderRoot(root, 'flows/hello.ygtc'), join(root, 'flows', 'hello.ygtc'));
  });

  it('should accept absolute paths inside the root', async () => {
    const absolute = join(root, 'flows', 'hello.ygtc');
    assert.equal(await normalizeUnderRoot(root, absolute), absolute);
  });

  it('should reject paths outside the root', async () => {
    await assert.rejects(normalizeUnderRoot(root, join(outside, 'secret.ygtc')), PathEscapeError);
  });

  it('should reject symlinks that lead outside the root', async () => {
    await assert.rejects(normalizeUnderRoot(root, 'linked/secret.ygtc'), PathEscapeError);
  });

  it('should fail for paths that do not exist', async () => {
    await assert.rejects(normalizeUnderRoot(root, 'flows/missing.ygtc'), FileSystemError);
  });
});

describe('isWithin', () => {
  it('should accept the root itself and its descendants', () => {
    assert.equal(isWithin('/work/app', '/work/app'), true);
    assert.equal(isWithin('/work/app', '/work/app/flows/a.ygtc'), true);
  });

  it('should reject siblings that share a prefix', () => {
    assert.equal(isWithin('/work/app', '/work/application'), false);
    assert.equal(isWithin('/work/app', '/work'), false);
  });
});
