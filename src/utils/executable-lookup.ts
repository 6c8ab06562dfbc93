import { promises as fs, constants as fsConstants } from 'fs';
import { delimiter, isAbsolute, join, relative, resolve, sep } from 'path';

/**
 * Resolve an executable name against a PATH string, like `which`.
 * Returns the first executable match or null.
 */
export async function findExecutable(name: string, pathValue: string = process.env.PATH ?? ''): Promise<string | null> {
  const segments = pathValue
    .split(delimiter)
    .map((segment) => segment.trim())
    .filter(Boolean);

  for (const segment of segments) {
    const candidate = join(segment, name);
    try {
      const stats = await fs.stat(candidate);
      if (!stats.isFile()) continue;
      await fs.access(candidate, fsConstants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

function isWithin(dir: string, entry: string): boolean {
  const rel = relative(resolve(dir), resolve(entry));
  return rel === '' || (!isAbsolute(rel) && rel.split(sep)[0] !== '..');
}

/**
 * Drop the PATH entries that live under `dir`
 */
export function pathWithout(pathValue: string, dir: string): string {
  return pathValue
    .split(delimiter)
    .filter((segment) => segment.trim() && !isWithin(dir, segment.trim()))
    .join(delimiter);
}
