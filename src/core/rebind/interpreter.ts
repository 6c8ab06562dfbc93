import { join } from 'path';
import type { InterpreterVersion } from '../../types/index.js';
import { DIR_PATTERNS, ENV_VARS } from '../../constants/index.js';
import { InterpreterError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { runProcess } from '../../utils/process.js';

/**
 * What the host interpreter reports about itself
 */
export interface InterpreterSnapshot {
  version: InterpreterVersion;
  searchPath: string[];
  /** Value of the dynamic-library search path inside the interpreter */
  libraryPath: string;
}

export type InterpreterProbe = (executable: string) => Promise<InterpreterSnapshot>;

const PROBE_SCRIPT = [
  'import json, os, sys',
  `print(json.dumps({"version": list(sys.version_info[:2]), "path": sys.path, "library_path": os.environ.get("${ENV_VARS.LIBRARY_PATH}", "")}))`
].join('\n');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isVersionPair(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && value.every((item) => Number.isInteger(item) && item >= 0);
}

/**
 * Parse the probe's JSON line into a snapshot
 */
export function parseProbeOutput(executable: string, output: string): InterpreterSnapshot {
  const line = output.trim().split('\n').pop() ?? '';
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new InterpreterError(executable, 'probe did not print JSON', { output });
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new InterpreterError(executable, 'probe output is not an object', { output });
  }
  const version = 'version' in parsed ? parsed.version : undefined;
  const searchPath = 'path' in parsed ? parsed.path : undefined;
  const libraryPath = 'library_path' in parsed ? parsed.library_path : undefined;

  if (!isVersionPair(version)) {
    throw new InterpreterError(executable, 'probe reported no usable version', { output });
  }
  if (!isStringArray(searchPath)) {
    throw new InterpreterError(executable, 'probe reported no module search path', { output });
  }

  return {
    version: { major: version[0], minor: version[1] },
    searchPath,
    libraryPath: typeof libraryPath === 'string' ? libraryPath : ''
  };
}

/**
 * Ask an interpreter binary for its version, module search path and library path
 */
export const probeInterpreter: InterpreterProbe = async (executable) => {
  const result = await runProcess(executable, ['-c', PROBE_SCRIPT]);
  if (result.kind === 'failure') {
    throw new InterpreterError(
      executable,
      result.code === null ? 'could not be started' : `exited with code ${result.code}`,
      { output: result.output }
    );
  }
  const snapshot = parseProbeOutput(executable, result.output);
  logger.debug(`Probed ${executable}`, snapshot);
  return snapshot;
};

export function formatVersion(version: InterpreterVersion): string {
  return `${version.major}.${version.minor}`;
}

export function sitePackagesPath(prefix: string, version: InterpreterVersion): string {
  return join(prefix, DIR_PATTERNS.LIB, `python${formatVersion(version)}`, 'site-packages');
}

export function libraryDir(prefix: string): string {
  return join(prefix, DIR_PATTERNS.LIB);
}
