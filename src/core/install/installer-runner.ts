/**
 * Installer Runner
 *
 * Fetches a constructor-style installer, runs it in batch mode against the
 * prefix, and removes the artifact whatever happened.
 */

import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import type { ExecutionContext } from '../../types/index.js';
import { FILE_PATTERNS, INSTALLER_FLAGS } from '../../constants/index.js';
import { downloadToFile } from '../../utils/download.js';
import { ValidationError } from '../../utils/errors.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runProcess, type ProcessResult } from '../../utils/process.js';
import { resolveOutput } from '../ports/resolve.js';

export type DownloadFn = (url: string, destPath: string) => Promise<void>;

export interface RunInstallerOptions {
  installerUrl: string;
  prefix: string;
  /** Defaults to an HTTP GET streamed to disk */
  download?: DownloadFn;
}

export function assertInstallerUrl(installerUrl: string): URL {
  if (!installerUrl || installerUrl.trim().length === 0) {
    throw new ValidationError('Installer URL must not be empty');
  }
  let parsed: URL;
  try {
    parsed = new URL(installerUrl);
  } catch {
    throw new ValidationError(`Installer URL is not a valid URL: ${installerUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Installer URL must use http or https: ${installerUrl}`);
  }
  return parsed;
}

/**
 * Download and execute the installer. The process outcome is returned,
 * not thrown: the caller decides what a failed install means.
 */
export async function runInstaller(options: RunInstallerOptions, ctx?: ExecutionContext): Promise<ProcessResult> {
  const out = resolveOutput(ctx);
  const { installerUrl, prefix, download = downloadToFile } = options;
  assertInstallerUrl(installerUrl);

  const workDir = await mkdtemp(join(tmpdir(), 'condabind-installer-'));
  const artifact = join(workDir, FILE_PATTERNS.INSTALLER);

  try {
    out.step(`⏬ Downloading ${installerUrl}...`);
    await download(installerUrl, artifact);
    logger.debug('Installer artifact ready', { artifact });

    out.step('📦 Installing...');
    const spinner = out.spinner();
    spinner.start(`Running installer into ${prefix}`);
    const result = await runProcess('bash', [artifact, INSTALLER_FLAGS, prefix]);
    spinner.stop(result.kind === 'success' ? `Installed into ${prefix}` : 'Installer failed');
    if (result.kind === 'failure' && result.output.trim()) {
      out.note(result.output.trimEnd(), 'Installer output');
    }
    return result;
  } finally {
    await remove(workDir);
  }
}
