/**
 * Which host interpreter a prefix was bound to.
 *
 * Written into the prefix after the shim is in place, so later `check` and
 * `install` runs default to the shimmed path instead of whatever `python3`
 * comes first on PATH (usually the environment's own, under `<prefix>/bin`).
 */

import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { exists, readJsoncFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface BindingRecord {
  interpreter: string;
}

export function bindingRecordPath(prefix: string): string {
  return join(prefix, FILE_PATTERNS.BINDING);
}

export async function writeBindingRecord(prefix: string, interpreter: string): Promise<string> {
  const path = bindingRecordPath(prefix);
  const record: BindingRecord = { interpreter };
  await writeTextFile(path, `${JSON.stringify(record, null, 2)}\n`);
  logger.debug(`Recorded binding in ${path}`, record);
  return path;
}

/**
 * The recorded interpreter, or undefined when the prefix was never bound
 */
export async function readBindingRecord(prefix: string): Promise<BindingRecord | undefined> {
  const path = bindingRecordPath(prefix);
  if (!(await exists(path))) {
    return undefined;
  }

  const raw = await readJsoncFile(path);
  const interpreter = typeof raw === 'object' && raw !== null && 'interpreter' in raw ? raw.interpreter : undefined;
  if (typeof interpreter !== 'string' || interpreter.length === 0) {
    throw new ConfigError(`${path}: 'interpreter' must be a non-empty string`);
  }
  return { interpreter };
}
