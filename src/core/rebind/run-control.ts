import { join } from 'path';
import * as yaml from 'js-yaml';
import { FILE_PATTERNS, RUN_CONTROL_KEYS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { readTextFileOrEmpty, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export function runControlPath(prefix: string): string {
  return join(prefix, FILE_PATTERNS.CONDARC);
}

/**
 * Set keys on a .condarc document, keeping everything else.
 * An empty document counts as an empty mapping.
 */
export function setRunControlKeys(content: string, updates: Record<string, unknown>, source: string = FILE_PATTERNS.CONDARC): string {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    parsed = {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${source} must contain a mapping of settings`);
  }

  return yaml.dump({ ...parsed, ...updates }, { lineWidth: -1 });
}

/**
 * Make the package manager stop asking for confirmation
 */
export async function enableAlwaysYes(prefix: string): Promise<string> {
  const path = runControlPath(prefix);
  const current = await readTextFileOrEmpty(path);
  await writeTextFile(path, setRunControlKeys(current, { [RUN_CONTROL_KEYS.ALWAYS_YES]: true }, path));
  logger.debug(`Updated ${path}`);
  return path;
}
