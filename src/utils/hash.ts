/**
 * Content hashing for files that must survive a copy unchanged
 */

import { promises as fs } from 'fs';
import { xxhash3 } from 'hash-wasm';
import { FileSystemError } from './errors.js';

/**
 * Hash a file's bytes with xxhash3
 */
export async function calculateFileChecksum(path: string): Promise<string> {
  let content: Buffer;
  try {
    content = await fs.readFile(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read file for hashing: ${path}`, { path, error });
  }
  return await xxhash3(content);
}

/**
 * True when both files hold the same bytes
 */
export async function filesMatch(a: string, b: string): Promise<boolean> {
  const [hashA, hashB] = await Promise.all([calculateFileChecksum(a), calculateFileChecksum(b)]);
  return hashA === hashB;
}
