import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';

import type { CommandResult, EnvOverrides, ExecutionContext, InstallOptions, ResolvedConfig } from '../types/index.js';
import { DEFAULTS } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { configManager } from '../core/config.js';
import { installFromUrl, installPreset, type BootstrapOptions, type BootstrapResult } from '../core/bootstrap.js';
import { DEFAULT_PRESET } from '../core/install/presets.js';
import { createKernelController } from '../core/rebind/kernel-controller.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { UserCancellationError, ValidationError, withErrorHandling } from '../utils/errors.js';
import { findExecutable, pathWithout } from '../utils/executable-lookup.js';
import { readBindingRecord } from '../core/rebind/binding-record.js';
import { logger } from '../utils/logger.js';

interface InstallCommandOptions extends InstallOptions {
  url?: string;
}

/**
 * Commander collector for repeated --env KEY=VALUE flags
 */
export function collectEnvAssignment(assignment: string, previous: EnvOverrides = {}): EnvOverrides {
  const index = assignment.indexOf('=');
  if (index <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got '${assignment}'.`);
  }
  return { ...previous, [assignment.slice(0, index)]: assignment.slice(index + 1) };
}

export interface ResolveInterpreterOptions {
  flag?: string;
  config: ResolvedConfig;
  cwd: string;
  prefix: string;
  pathValue?: string;
}

/**
 * Resolve the host interpreter: flag, then config, then the interpreter the
 * prefix was last bound to, then python3 on PATH outside the prefix
 */
export async function resolveInterpreter(options: ResolveInterpreterOptions): Promise<string> {
  const { flag, config, cwd, prefix, pathValue = process.env.PATH ?? '' } = options;
  const explicit = flag ?? config.interpreter;
  if (explicit) {
    return resolve(cwd, explicit);
  }

  const record = await readBindingRecord(prefix);
  if (record) {
    logger.debug(`Using interpreter recorded in ${prefix}`, record);
    return record.interpreter;
  }

  const found = await findExecutable(DEFAULTS.INTERPRETER_NAME, pathWithout(pathValue, prefix));
  if (!found) {
    throw new ValidationError(`No ${DEFAULTS.INTERPRETER_NAME} on PATH outside ${prefix}; pass --python <path>`);
  }
  return found;
}

async function installCommand(
  preset: string | undefined,
  options: InstallCommandOptions,
  ctx: ExecutionContext
): Promise<CommandResult<BootstrapResult>> {
  const out = resolveOutput(ctx);
  const config = await configManager.load();

  if (preset && options.url) {
    throw new ValidationError('Pass either a preset name or --url, not both');
  }

  const prefix = resolve(ctx.sourceCwd, options.prefix ?? config.prefix);
  const interpreter = await resolveInterpreter({ flag: options.python, config, cwd: ctx.sourceCwd, prefix });
  const startupScript = resolve(ctx.sourceCwd, options.startupScript ?? config.startupScript);
  logger.info('Install command executed', { preset, url: options.url, prefix, interpreter });

  if (!options.yes) {
    const confirmed = await out.confirm(
      `Install into ${prefix} and replace ${interpreter} with a shim? The kernel will restart.`,
      { initial: true }
    );
    if (!confirmed) {
      throw new UserCancellationError('Installation cancelled');
    }
  }

  const bootstrapOptions: BootstrapOptions = {
    prefix,
    interpreter,
    startupScript,
    env: options.env,
    kernel: createKernelController(config.kernel, out),
    installerFailure: options.continueOnInstallerFailure ? 'continue' : config.installerFailure,
    restart: options.restart
  };

  const result = options.url
    ? await installFromUrl(options.url, bootstrapOptions, ctx)
    : await installPreset(preset, bootstrapOptions, ctx);

  out.success(`Environment at ${prefix} bound to ${interpreter}`);
  if (!result.rebind.restartRequested) {
    out.info('Kernel restart skipped (--no-restart); restart it yourself to finish.');
  }
  return { success: true, data: result };
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('[preset]', `installer preset (default: ${DEFAULT_PRESET}); see 'condabind presets'`)
    .description('Install a conda distribution and rebind the notebook interpreter to it')
    .option('--url <url>', 'install from a constructor-style installer URL instead of a preset')
    .option('--prefix <dir>', `install prefix (default: ${DEFAULTS.PREFIX})`)
    .option('--python <path>', 'host interpreter executable to rebind (default: the recorded one, else python3 on PATH outside the prefix)')
    .option('--env <KEY=VALUE>', 'extra variable for every future interpreter start (repeatable, not quoted)', collectEnvAssignment)
    .option('--startup-script <path>', `interpreter start-up script to patch (default: ${DEFAULTS.STARTUP_SCRIPT})`)
    .option('--continue-on-installer-failure', 'keep going when the installer exits non-zero')
    .option('--no-restart', 'do not ask the host to restart the kernel')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(withErrorHandling(async (preset: string | undefined, options: InstallCommandOptions) => {
      const ctx = createCliExecutionContext();
      const result = await installCommand(preset, options, ctx);
      if (!result.success) {
        throw new Error(result.error || 'Install failed');
      }
    }));
}
