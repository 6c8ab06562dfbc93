/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output adapter injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly so the port matches the terminal they run in.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function createCliExecutionContext(options: ExecutionOptions = {}): ExecutionContext {
  const interactive = detectInteractive(options.interactive);
  const ctx = createExecutionContext({ ...options, interactive });
  ctx.output = getCliOutput(interactive);
  return ctx;
}
