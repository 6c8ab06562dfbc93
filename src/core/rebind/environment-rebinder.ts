/**
 * Environment Rebinder
 *
 * Points the host interpreter at a freshly installed prefix: pins, run-control,
 * start-up script, resolver config and executable shim, then asks the host
 * to restart the kernel.
 */

import { promises as fs } from 'fs';

import type { EnvOverrides, ExecutionContext, InterpreterVersion } from '../../types/index.js';
import { ENV_VARS } from '../../constants/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveOutput } from '../ports/resolve.js';
import { probeInterpreter, sitePackagesPath, type InterpreterProbe } from './interpreter.js';
import { acceleratorVersion, buildPins, updatePinSet } from './pin-set.js';
import { enableAlwaysYes } from './run-control.js';
import { patchStartupScript } from './startup-script.js';
import { createResolverConfig, prependSearchPath, type ResolverConfig } from './search-path.js';
import { buildShimEnvironment, installShim, isShim, realPathFor, renderShim, type ShimInstallResult } from './shim.js';
import type { KernelController } from './kernel-controller.js';
import { writeBindingRecord } from './binding-record.js';

export interface RebindOptions {
  prefix: string;
  /** Path of the host interpreter executable to take over */
  interpreter: string;
  startupScript: string;
  kernel: KernelController;
  env?: EnvOverrides;
  /** Skip the restart request (default: request it) */
  restart?: boolean;
  probe?: InterpreterProbe;
  /** Raw accelerator-library version; defaults to $CUDA_VERSION */
  acceleratorVersion?: string;
}

export interface RebindResult {
  version: InterpreterVersion;
  pins: string[];
  pinSetPath: string;
  runControlPath: string;
  sitePackages: string;
  resolver: ResolverConfig;
  env: EnvOverrides;
  shim: ShimInstallResult;
  bindingRecordPath: string;
  restartRequested: boolean;
}

async function assertPrefix(prefix: string): Promise<void> {
  let isDir = false;
  try {
    isDir = (await fs.stat(prefix)).isDirectory();
  } catch (error) {
    throw new FileSystemError(`Install prefix does not exist: ${prefix}`, { prefix, error });
  }
  if (!isDir) {
    throw new FileSystemError(`Install prefix is not a directory: ${prefix}`, { prefix });
  }
}

/**
 * The binary to ask about the host: the preserved original once a shim is in place
 */
async function probeTarget(interpreter: string): Promise<string> {
  const realPath = realPathFor(interpreter);
  if ((await isShim(interpreter)) && (await isFile(realPath))) {
    return realPath;
  }
  return interpreter;
}

export async function rebindEnvironment(options: RebindOptions, ctx?: ExecutionContext): Promise<RebindResult> {
  const out = resolveOutput(ctx);
  const { prefix, interpreter, startupScript, kernel, probe = probeInterpreter } = options;
  await assertPrefix(prefix);

  out.step('📌 Adjusting configuration...');
  const snapshot = await probe(await probeTarget(interpreter));
  const { version } = snapshot;
  const accelerator = acceleratorVersion(options.acceleratorVersion ?? process.env[ENV_VARS.ACCELERATOR_VERSION]);

  const pins = buildPins(version, accelerator);
  const pinSetPath = await updatePinSet(prefix, pins);
  const runControlPath = await enableAlwaysYes(prefix);

  const sitePackages = sitePackagesPath(prefix, version);
  await patchStartupScript(startupScript, sitePackages);
  const resolver = prependSearchPath(createResolverConfig(snapshot.searchPath), sitePackages);

  out.step('🩹 Patching environment...');
  const env = buildShimEnvironment(prefix, options.env);
  const shim = await installShim(interpreter, renderShim(prefix, env));
  if (!shim.preservedOriginal) {
    out.info(`Original interpreter was already preserved at ${shim.realPath}`);
  }
  const bindingRecordPath = await writeBindingRecord(prefix, interpreter);

  const restartRequested = options.restart ?? true;
  if (restartRequested) {
    out.step('🔁 Restarting kernel...');
    await kernel.requestRestart();
  }

  logger.debug('Rebind complete', { prefix, interpreter, sitePackages, pins });

  return {
    version,
    pins,
    pinSetPath,
    runControlPath,
    sitePackages,
    resolver,
    env,
    shim,
    bindingRecordPath,
    restartRequested
  };
}
