import { spawn } from 'child_process';
import { logger } from './logger.js';

/**
 * Outcome of an external process. Callers branch on `kind`; a non-zero exit
 * never throws.
 */
export type ProcessResult =
  | { kind: 'success'; output: string }
  | { kind: 'failure'; code: number | null; output: string };

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion, capturing stdout and stderr interleaved.
 * A process that cannot be spawned at all is a failure with a null code.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  logger.debug(`Running ${command} ${args.join(' ')}`, { cwd: options.cwd });

  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const settle = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      logger.debug(`${command} finished`, { kind: result.kind, code: result.kind === 'failure' ? result.code : 0 });
      resolve(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

    child.on('error', (error) => {
      chunks.push(Buffer.from(error.message));
      settle({ kind: 'failure', code: null, output: Buffer.concat(chunks).toString('utf8') });
    });

    child.on('close', (code) => {
      const output = Buffer.concat(chunks).toString('utf8');
      if (code === 0) {
        settle({ kind: 'success', output });
      } else {
        settle({ kind: 'failure', code, output });
      }
    });
  });
}
