/**
 * Executable shim.
 *
 * The host interpreter's path is taken over by a small bash script that
 * execs the new environment's interpreter with extra variables. The real
 * binary is kept beside it as `<path>.real`.
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { basename, dirname, join } from 'path';

import type { EnvOverrides } from '../../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS, SHIM_MARKER } from '../../constants/index.js';
import { FileSystemError, ValidationError } from '../../utils/errors.js';
import { copyFile, isFile, remove, renameFile } from '../../utils/fs.js';
import { filesMatch } from '../../utils/hash.js';
import { logger } from '../../utils/logger.js';
import { libraryDir } from './interpreter.js';

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const HEAD_BYTES = 512;

export interface ShimInstallResult {
  executable: string;
  realPath: string;
  /** False when an earlier run already preserved the original */
  preservedOriginal: boolean;
}

export function realPathFor(executable: string): string {
  return `${executable}${FILE_PATTERNS.REAL_SUFFIX}`;
}

/**
 * Escape `value` for use inside a double-quoted bash word
 */
export function escapeDoubleQuoted(value: string): string {
  return value.replace(/[\\"$`]/g, (char) => `\\${char}`);
}

/**
 * Merge caller overrides with the forced library search path.
 * Caller values are kept verbatim; a caller value for the library path key is replaced.
 * The forced value is double-quoted so the prefix and the inherited value stay one word.
 */
export function buildShimEnvironment(prefix: string, env: EnvOverrides = {}): EnvOverrides {
  const merged: EnvOverrides = {};
  for (const [key, value] of Object.entries(env)) {
    if (!ENV_KEY_PATTERN.test(key)) {
      throw new ValidationError(`Invalid environment variable name: '${key}'`, { key });
    }
    if (key === ENV_VARS.LIBRARY_PATH) {
      logger.debug(`Ignoring caller value for ${key}`, { value });
      continue;
    }
    merged[key] = value;
  }
  merged[ENV_VARS.LIBRARY_PATH] = `"${escapeDoubleQuoted(libraryDir(prefix))}:$${ENV_VARS.LIBRARY_PATH}"`;
  return merged;
}

export function renderShim(prefix: string, env: EnvOverrides): string {
  const assignments = Object.entries(env).map(([key, value]) => `${key}=${value}`);
  const target = join(prefix, DIR_PATTERNS.BIN, 'python');
  return [
    '#!/bin/bash',
    SHIM_MARKER,
    `exec env ${assignments.join(' ')} "${escapeDoubleQuoted(target)}" -x "$@"`,
    ''
  ].join('\n');
}

async function readHead(path: string): Promise<string> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(path, 'r');
    const buffer = Buffer.alloc(HEAD_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEAD_BYTES, 0);
    return buffer.subarray(0, bytesRead).toString('latin1');
  } catch (error) {
    throw new FileSystemError(`Failed to read executable: ${path}`, { path, error });
  } finally {
    await handle?.close();
  }
}

export async function isShim(executable: string): Promise<boolean> {
  const head = await readHead(executable);
  return head.startsWith('#!') && head.includes(SHIM_MARKER);
}

/**
 * Keep a verified copy of the original interpreter at `<path>.real`.
 * If `executable` is already a shim the existing copy is left alone.
 */
export async function preserveOriginal(executable: string): Promise<{ realPath: string; preservedOriginal: boolean }> {
  const realPath = realPathFor(executable);

  if (await isShim(executable)) {
    if (!(await isFile(realPath))) {
      throw new FileSystemError(
        `${executable} is already a shim but ${realPath} is missing; the original interpreter cannot be recovered`,
        { executable, realPath }
      );
    }
    logger.debug(`Original interpreter already preserved at ${realPath}`);
    return { realPath, preservedOriginal: false };
  }

  await copyFile(executable, realPath);
  if (!(await filesMatch(executable, realPath))) {
    await remove(realPath);
    throw new FileSystemError(`Checksum mismatch after copying ${executable} to ${realPath}`, { executable, realPath });
  }
  return { realPath, preservedOriginal: true };
}

/**
 * Replace `executable` with `content` in one rename
 */
export async function replaceExecutable(executable: string, content: string): Promise<void> {
  const staging = join(dirname(executable), `.${basename(executable)}.${process.pid}.shim`);
  try {
    await fs.writeFile(staging, content, { encoding: 'utf8', mode: 0o755 });
    await fs.chmod(staging, 0o755);
  } catch (error) {
    await remove(staging);
    throw new FileSystemError(`Failed to stage shim at ${staging}`, { staging, error });
  }

  try {
    await renameFile(staging, executable);
  } catch (error) {
    await remove(staging);
    throw error;
  }
}

export async function installShim(executable: string, content: string): Promise<ShimInstallResult> {
  const { realPath, preservedOriginal } = await preserveOriginal(executable);
  await replaceExecutable(executable, content);
  logger.debug(`Installed shim at ${executable}`, { realPath, preservedOriginal });
  return { executable, realPath, preservedOriginal };
}
