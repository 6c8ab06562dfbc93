import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { rebindEnvironment, type RebindOptions } from '../../../src/core/rebind/environment-rebinder.js';
import { readBindingRecord } from '../../../src/core/rebind/binding-record.js';
import { FileSystemError } from '../../../src/utils/errors.js';
import {
  createFakeProbe,
  createRecordingOutput,
  FakeKernelController,
  makeTempDir,
  removeTempDir
} from '../../test-helpers.js';

const ORIGINAL = Buffer.from('\x7fELF original interpreter', 'latin1');

describe('rebindEnvironment', () => {
  let dir: string;
  let prefix: string;
  let interpreter: string;
  let startupScript: string;

  beforeEach(async () => {
    dir = await makeTempDir('rebind');
    prefix = join(dir, 'env');
    interpreter = join(dir, 'bin', 'python3');
    startupScript = join(dir, 'ipython', 'ipython_config.py');
    await mkdir(prefix);
    await mkdir(join(dir, 'bin'));
    await writeFile(interpreter, ORIGINAL, { mode: 0o755 });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function options(overrides: Partial<Omit<RebindOptions, 'kernel' | 'probe'>> = {}): RebindOptions & { kernel: FakeKernelController; probe: ReturnType<typeof createFakeProbe> } {
    return {
      prefix,
      interpreter,
      startupScript,
      kernel: new FakeKernelController(),
      env: { FOO: 'bar' },
      acceleratorVersion: '11.2.152',
      probe: createFakeProbe({
        version: { major: 3, minor: 10 },
        searchPath: ['', '/usr/lib/python3.10'],
        libraryPath: ''
      }),
      ...overrides
    };
  }

  it('should pin, configure, patch and restart in order', async () => {
    const output = createRecordingOutput();
    const opts = options();
    const sitePackages = join(prefix, 'lib', 'python3.10', 'site-packages');

    const result = await rebindEnvironment(opts, { sourceCwd: dir, output });

    assert.deepStrictEqual(result.pins, ['python 3.10.*', 'python_abi 3.10.* *cp310*', 'cudatoolkit 11.2.*']);
    assert.strictEqual(
      await readFile(join(prefix, 'conda-meta', 'pinned'), 'utf8'),
      'python 3.10.*\npython_abi 3.10.* *cp310*\ncudatoolkit 11.2.*\n'
    );
    assert.strictEqual(await readFile(join(prefix, '.condarc'), 'utf8'), 'always_yes: true\n');
    assert.ok((await readFile(startupScript, 'utf8')).includes(`sp = \\"${sitePackages}\\"`));
    assert.strictEqual(result.sitePackages, sitePackages);
    assert.deepStrictEqual(result.resolver.searchPath, [sitePackages, '', '/usr/lib/python3.10']);
    assert.deepStrictEqual(result.env, { FOO: 'bar', LD_LIBRARY_PATH: `"${prefix}/lib:$LD_LIBRARY_PATH"` });

    const shim = await readFile(interpreter, 'utf8');
    assert.strictEqual(
      shim.split('\n')[2],
      `exec env FOO=bar LD_LIBRARY_PATH="${prefix}/lib:$LD_LIBRARY_PATH" "${prefix}/bin/python" -x "$@"`
    );
    assert.deepStrictEqual(await readFile(`${interpreter}.real`), ORIGINAL);
    assert.strictEqual(result.bindingRecordPath, join(prefix, '.condabind.json'));
    assert.deepStrictEqual(await readBindingRecord(prefix), { interpreter });

    assert.deepStrictEqual(opts.probe.calls, [interpreter]);
    assert.strictEqual(opts.kernel.restarts, 1);
    assert.strictEqual(result.restartRequested, true);
    assert.deepStrictEqual(output.lines, [
      'step: 📌 Adjusting configuration...',
      'step: 🩹 Patching environment...',
      'step: 🔁 Restarting kernel...'
    ]);
  });

  it('should probe the preserved original and keep documents stable on a second run', async () => {
    await rebindEnvironment(options(), { sourceCwd: dir, output: createRecordingOutput() });
    const firstPins = await readFile(join(prefix, 'conda-meta', 'pinned'), 'utf8');
    const firstScript = await readFile(startupScript, 'utf8');

    const output = createRecordingOutput();
    const opts = options();
    const result = await rebindEnvironment(opts, { sourceCwd: dir, output });

    assert.deepStrictEqual(opts.probe.calls, [`${interpreter}.real`]);
    assert.strictEqual(result.shim.preservedOriginal, false);
    assert.deepStrictEqual(await readFile(`${interpreter}.real`), ORIGINAL);
    assert.strictEqual(await readFile(join(prefix, 'conda-meta', 'pinned'), 'utf8'), firstPins);
    assert.strictEqual(await readFile(startupScript, 'utf8'), firstScript);
    assert.strictEqual(await readFile(join(prefix, '.condarc'), 'utf8'), 'always_yes: true\n');
    assert.ok(output.lines.includes(`info: Original interpreter was already preserved at ${interpreter}.real`));
  });

  it('should skip the restart when asked to', async () => {
    const output = createRecordingOutput();
    const opts = options({ restart: false });
    const result = await rebindEnvironment(opts, { sourceCwd: dir, output });

    assert.strictEqual(result.restartRequested, false);
    assert.strictEqual(opts.kernel.restarts, 0);
    assert.deepStrictEqual(output.lines, [
      'step: 📌 Adjusting configuration...',
      'step: 🩹 Patching environment...'
    ]);
  });

  it('should use a wildcard accelerator pin when no version is known', async () => {
    const result = await rebindEnvironment(options({ acceleratorVersion: '' }), {
      sourceCwd: dir,
      output: createRecordingOutput()
    });
    assert.strictEqual(result.pins[2], 'cudatoolkit *.*.*');
  });

  it('should fail before touching anything when the prefix is missing', async () => {
    const opts = options({ prefix: join(dir, 'missing') });
    await assert.rejects(rebindEnvironment(opts, { sourceCwd: dir, output: createRecordingOutput() }), FileSystemError);
    assert.deepStrictEqual(opts.probe.calls, []);
    assert.deepStrictEqual(await readFile(interpreter), ORIGINAL);
  });
});
