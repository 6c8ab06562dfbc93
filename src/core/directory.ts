import * as os from 'os';
import * as path from 'path';
import { CondaBindDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Directory resolution using the dotfile convention (~/.condabind)
 */
export function getCondaBindDirectories(homeDir: string = os.homedir()): CondaBindDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.CONDABIND)
  };
}
