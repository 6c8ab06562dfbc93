/**
 * Execution Context Types
 *
 * Carries the port interfaces core logic talks through, so the same
 * bootstrap sequence can be driven from the CLI, a test, or an embedding host.
 */

import type { OutputPort } from '../core/ports/output.js';

export interface ExecutionContext {
  /**
   * Absolute path to the working directory the command was started from.
   * Relative --prefix / --python arguments resolve against it.
   */
  sourceCwd: string;

  /**
   * True when a person is at the terminal (TTY, not CI).
   */
  interactive?: boolean;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

export interface ExecutionOptions {
  /**
   * Override interactive mode detection
   */
  interactive?: boolean;
}
