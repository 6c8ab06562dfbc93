import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { acceleratorVersion, buildPins, mergeLines, pinSetPath, updatePinSet } from '../../../src/core/rebind/pin-set.js';
import { makeTempDir, removeTempDir } from '../../test-helpers.js';

const PINS = ['python 3.10.*', 'python_abi 3.10.* *cp310*', 'cudatoolkit 11.2.*'];

describe('acceleratorVersion', () => {
  it('should truncate a full version to major.minor', () => {
    assert.strictEqual(acceleratorVersion('11.2.152'), '11.2');
  });

  it('should accept a two-part version', () => {
    assert.strictEqual(acceleratorVersion('12.1'), '12.1');
  });

  it('should keep a one-part version as it is', () => {
    assert.strictEqual(acceleratorVersion('11'), '11');
    assert.strictEqual(buildPins({ major: 3, minor: 10 }, acceleratorVersion('11'))[2], 'cudatoolkit 11.*');
  });

  it('should fall back to the wildcard when absent or unparsable', () => {
    assert.strictEqual(acceleratorVersion(undefined), '*.*');
    assert.strictEqual(acceleratorVersion(''), '*.*');
    assert.strictEqual(acceleratorVersion('none'), '*.*');
    assert.strictEqual(acceleratorVersion('11.x'), '*.*');
  });
});

describe('buildPins', () => {
  it('should pin interpreter version, ABI tag and accelerator version', () => {
    assert.deepStrictEqual(buildPins({ major: 3, minor: 10 }, '11.2'), PINS);
  });

  it('should produce a wildcard accelerator pin', () => {
    assert.strictEqual(buildPins({ major: 3, minor: 7 }, '*.*')[2], 'cudatoolkit *.*.*');
  });
});

describe('mergeLines', () => {
  it('should append new lines after existing ones', () => {
    assert.strictEqual(
      mergeLines('numpy 1.21.*\n', PINS),
      'numpy 1.21.*\npython 3.10.*\npython_abi 3.10.* *cp310*\ncudatoolkit 11.2.*\n'
    );
  });

  it('should not duplicate lines that are already present', () => {
    const once = mergeLines('', PINS);
    assert.strictEqual(mergeLines(once, PINS), once);
  });

  it('should return an empty document when there is nothing to write', () => {
    assert.strictEqual(mergeLines('\n\n', []), '');
  });
});

describe('updatePinSet', () => {
  let prefix: string;

  beforeEach(async () => {
    prefix = await makeTempDir('pins');
  });

  afterEach(async () => {
    await removeTempDir(prefix);
  });

  it('should create conda-meta/pinned when absent', async () => {
    const path = await updatePinSet(prefix, PINS);
    assert.strictEqual(path, join(prefix, 'conda-meta', 'pinned'));
    assert.strictEqual(await readFile(path, 'utf8'), `${PINS.join('\n')}\n`);
  });

  it('should hold exactly one copy of each pin after repeated runs', async () => {
    for (let run = 0; run < 3; run++) {
      await updatePinSet(prefix, PINS);
    }
    const lines = (await readFile(pinSetPath(prefix), 'utf8')).trim().split('\n');
    for (const pin of PINS) {
      assert.strictEqual(lines.filter((line) => line === pin).length, 1);
    }
    assert.strictEqual(lines.length, 3);
  });

  it('should keep pins written by someone else', async () => {
    await mkdir(join(prefix, 'conda-meta'));
    await writeFile(pinSetPath(prefix), 'numpy 1.21.*');
    await updatePinSet(prefix, PINS);
    const lines = (await readFile(pinSetPath(prefix), 'utf8')).trim().split('\n');
    assert.deepStrictEqual(lines, ['numpy 1.21.*', ...PINS]);
  });
});
