/**
 * Execution Context Module
 *
 * Creates the ExecutionContext threaded through core operations.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { logger } from '../utils/logger.js';

export function createExecutionContext(options: ExecutionOptions = {}): ExecutionContext {
  const context: ExecutionContext = {
    sourceCwd: process.cwd(),
    interactive: options.interactive
  };

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    interactive: context.interactive
  });

  return context;
}
