/**
 * Bootstrap sequence: fetch → install → patch on-disk config → patch
 * interpreter → request restart. Linear; the first failure stops it.
 */

import type { EnvOverrides, ExecutionContext, InstallerFailurePolicy } from '../types/index.js';
import { InstallerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ProcessResult } from '../utils/process.js';
import { resolveOutput } from './ports/resolve.js';
import { getPreset } from './install/presets.js';
import { runInstaller, type DownloadFn } from './install/installer-runner.js';
import { rebindEnvironment, type RebindResult } from './rebind/environment-rebinder.js';
import type { InterpreterProbe } from './rebind/interpreter.js';
import type { KernelController } from './rebind/kernel-controller.js';

export interface BootstrapOptions {
  prefix: string;
  interpreter: string;
  startupScript: string;
  kernel: KernelController;
  env?: EnvOverrides;
  installerFailure?: InstallerFailurePolicy;
  restart?: boolean;
  download?: DownloadFn;
  probe?: InterpreterProbe;
  acceleratorVersion?: string;
}

export interface BootstrapResult {
  installerUrl: string;
  installer: ProcessResult;
  rebind: RebindResult;
}

/**
 * Apply the installer-failure policy. Aborting is the default.
 */
export function applyInstallerPolicy(result: ProcessResult, policy: InstallerFailurePolicy, ctx?: ExecutionContext): void {
  if (result.kind === 'success') return;

  if (policy === 'abort') {
    throw new InstallerError(result.code, result.output);
  }

  const out = resolveOutput(ctx);
  out.warn(`Installer exited with code ${result.code ?? 'unknown'}; continuing as requested`);
  logger.warn('Continuing after installer failure', { code: result.code, output: result.output });
}

export async function installFromUrl(installerUrl: string, options: BootstrapOptions, ctx?: ExecutionContext): Promise<BootstrapResult> {
  const installer = await runInstaller({ installerUrl, prefix: options.prefix, download: options.download }, ctx);
  applyInstallerPolicy(installer, options.installerFailure ?? 'abort', ctx);

  const rebind = await rebindEnvironment(
    {
      prefix: options.prefix,
      interpreter: options.interpreter,
      startupScript: options.startupScript,
      kernel: options.kernel,
      env: options.env,
      restart: options.restart,
      probe: options.probe,
      acceleratorVersion: options.acceleratorVersion
    },
    ctx
  );

  return { installerUrl, installer, rebind };
}

export async function installPreset(name: string | undefined, options: BootstrapOptions, ctx?: ExecutionContext): Promise<BootstrapResult> {
  const preset = getPreset(name);
  logger.debug(`Using preset ${preset.name}`, { url: preset.url });
  return await installFromUrl(preset.url, options, ctx);
}
