import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_PRESET, getPreset, isPresetName, listPresets } from '../../../src/core/install/presets.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('installer presets', () => {
  it('should default to mambaforge', () => {
    assert.strictEqual(DEFAULT_PRESET, 'mambaforge');
    assert.strictEqual(getPreset().name, 'mambaforge');
  });

  it('should expose four presets that differ only by URL', () => {
    const presets = listPresets();
    assert.deepStrictEqual(presets.map((p) => p.name), ['mambaforge', 'miniforge', 'miniconda', 'anaconda']);
    assert.strictEqual(new Set(presets.map((p) => p.url)).size, 4);
  });

  it('should resolve the frozen legacy installers', () => {
    assert.strictEqual(getPreset('miniconda').url, 'https://repo.anaconda.com/miniconda/Miniconda3-4.5.4-Linux-x86_64.sh');
    assert.strictEqual(getPreset('anaconda').url, 'https://repo.anaconda.com/archive/Anaconda3-5.2.0-Linux-x86_64.sh');
  });

  it('should reject unknown names and list the valid ones', () => {
    assert.throws(() => getPreset('micromamba'), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.strictEqual(
        error.message,
        "Validation error: Unknown installer preset 'micromamba'. Valid presets: mambaforge, miniforge, miniconda, anaconda"
      );
      return true;
    });
  });

  it('should not treat inherited object keys as presets', () => {
    assert.strictEqual(isPresetName('toString'), false);
  });
});
