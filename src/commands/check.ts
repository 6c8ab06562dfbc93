import { Command } from 'commander';
import { resolve } from 'path';

import type { CheckOptions } from '../types/index.js';
import { DEFAULTS } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { configManager } from '../core/config.js';
import { verifyInstallation } from '../core/check/post-install-check.js';
import { withErrorHandling } from '../utils/errors.js';
import { resolveInterpreter } from './install.js';

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Verify the rebound environment after the kernel restarted')
    .option('--prefix <dir>', `install prefix (default: ${DEFAULTS.PREFIX})`)
    .option('--python <path>', 'interpreter path the kernel starts (default: the one recorded at install)')
    .action(withErrorHandling(async (options: CheckOptions) => {
      const ctx = createCliExecutionContext();
      const config = await configManager.load();
      const prefix = resolve(ctx.sourceCwd, options.prefix ?? config.prefix);
      const interpreter = await resolveInterpreter({ flag: options.python, config, cwd: ctx.sourceCwd, prefix });
      await verifyInstallation({ prefix, interpreter }, ctx);
    }));
}
