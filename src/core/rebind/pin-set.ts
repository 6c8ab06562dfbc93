import { join } from 'path';
import type { InterpreterVersion } from '../../types/index.js';
import { ACCELERATOR_WILDCARD, DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { ensureDir, readTextFileOrEmpty, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { formatVersion } from './interpreter.js';

export function pinSetPath(prefix: string): string {
  return join(prefix, DIR_PATTERNS.CONDA_META, FILE_PATTERNS.PINNED);
}

const NUMERIC_PART = /^\d+$/;

/**
 * Keep the first two components of an accelerator-library version:
 * "11.2.152" gives "11.2", "11" stays "11". Absent or non-numeric values
 * become the wildcard.
 */
export function acceleratorVersion(raw: string | undefined): string {
  const parts = (raw ?? '').trim().split('.').slice(0, 2);
  if (!parts.every((part) => NUMERIC_PART.test(part))) {
    return ACCELERATOR_WILDCARD;
  }
  return parts.join('.');
}

export function buildPins(version: InterpreterVersion, accelerator: string): string[] {
  const v = formatVersion(version);
  return [
    `python ${v}.*`,
    `python_abi ${v}.* *cp${version.major}${version.minor}*`,
    `cudatoolkit ${accelerator}.*`
  ];
}

/**
 * Union `additions` into a line-oriented document. Existing lines keep
 * their order, blank lines are dropped, and the result ends with a newline.
 */
export function mergeLines(content: string, additions: readonly string[]): string {
  const lines: string[] = [];
  const seen = new Set<string>();
  for (const raw of [...content.split('\n'), ...additions]) {
    const line = raw.trim();
    if (!line || seen.has(line)) continue;
    seen.add(line);
    lines.push(line);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Write the pins into <prefix>/conda-meta/pinned, creating it when absent
 */
export async function updatePinSet(prefix: string, pins: readonly string[]): Promise<string> {
  const path = pinSetPath(prefix);
  await ensureDir(join(prefix, DIR_PATTERNS.CONDA_META));
  const current = await readTextFileOrEmpty(path);
  await writeTextFile(path, mergeLines(current, pins));
  logger.debug(`Pinned ${pins.length} specs in ${path}`, { pins });
  return path;
}
