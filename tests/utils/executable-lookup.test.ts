import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { findExecutable, pathWithout } from '../../src/utils/executable-lookup.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('findExecutable', () => {
  let first: string;
  let second: string;

  before(async () => {
    first = await makeTempDir('path-a');
    second = await makeTempDir('path-b');
    await writeFile(join(first, 'plain'), 'data', { mode: 0o644 });
    await mkdir(join(first, 'conda-dir'));
    await writeFile(join(second, 'conda'), '#!/bin/sh\n', { mode: 0o755 });
  });

  after(async () => {
    await removeTempDir(first);
    await removeTempDir(second);
  });

  it('should find an executable in a later PATH segment', async () => {
    const found = await findExecutable('conda', `${first}:${second}`);
    assert.strictEqual(found, join(second, 'conda'));
  });

  it('should skip files without execute permission', async () => {
    assert.strictEqual(await findExecutable('plain', first), null);
  });

  it('should skip directories', async () => {
    assert.strictEqual(await findExecutable('conda-dir', first), null);
  });

  it('should return null for an empty PATH', async () => {
    assert.strictEqual(await findExecutable('conda', ''), null);
  });
});

describe('pathWithout', () => {
  it('should drop entries at or below the directory', () => {
    assert.strictEqual(
      pathWithout('/usr/local/bin:/usr/bin:/usr/local:/usr/local/sbin/:/bin', '/usr/local'),
      '/usr/bin:/bin'
    );
  });

  it('should keep siblings that only share a name prefix', () => {
    assert.strictEqual(pathWithout('/usr/local-tools/bin:/usr/localbin', '/usr/local'), '/usr/local-tools/bin:/usr/localbin');
  });
});
