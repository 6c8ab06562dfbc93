import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'condabind';

/**
 * Version from the nearest package.json named condabind, walking up from
 * this module. Works from both src/ and dist/.
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (
        typeof parsed === 'object' && parsed !== null &&
        'name' in parsed && parsed.name === PACKAGE_NAME &&
        'version' in parsed && typeof parsed.version === 'string'
      ) {
        return parsed.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}
