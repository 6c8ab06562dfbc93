#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupInstallCommand } from './commands/install.js';
import { setupCheckCommand } from './commands/check.js';
import { setupPresetsCommand } from './commands/presets.js';

/**
 * condabind CLI - Main entry point
 *
 * Installs a conda distribution on a notebook host and rebinds the
 * host interpreter to it.
 */

const program = new Command();

program
  .name('condabind')
  .description('Bootstrap a conda environment on a notebook host and rebind its interpreter')
  .version(getVersion())
  .option('--verbose', 'print debug logs')
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupCheckCommand(program);
setupPresetsCommand(program);

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Unexpected error', error);
  process.exitCode = 1;
});
