import type { ExecutionContext } from '../../types/index.js';
import { ENV_VARS, PACKAGE_MANAGER_EXECUTABLE } from '../../constants/index.js';
import { VerificationError } from '../../utils/errors.js';
import { findExecutable as findOnPath } from '../../utils/executable-lookup.js';
import { resolveOutput } from '../ports/resolve.js';
import { libraryDir, probeInterpreter, sitePackagesPath, type InterpreterProbe, type InterpreterSnapshot } from '../rebind/interpreter.js';

export interface CheckEnvironmentOptions {
  prefix: string;
  findExecutable?: (name: string) => Promise<string | null>;
}

/**
 * Assert the three conditions of a working rebind, stopping at the first failure
 */
export async function checkEnvironment(snapshot: InterpreterSnapshot, options: CheckEnvironmentOptions): Promise<void> {
  const { prefix, findExecutable = findOnPath } = options;

  const managerPath = await findExecutable(PACKAGE_MANAGER_EXECUTABLE);
  if (!managerPath) {
    throw new VerificationError(
      'package-manager',
      `${PACKAGE_MANAGER_EXECUTABLE} was not found on PATH`
    );
  }

  const sitePackages = sitePackagesPath(prefix, snapshot.version);
  if (!snapshot.searchPath.includes(sitePackages)) {
    throw new VerificationError(
      'search-path',
      `Module search path does not contain ${sitePackages}. Value: ${JSON.stringify(snapshot.searchPath)}`,
      { sitePackages, searchPath: snapshot.searchPath }
    );
  }

  const libDir = libraryDir(prefix);
  if (!snapshot.libraryPath.split(':').includes(libDir)) {
    throw new VerificationError(
      'library-path',
      `${ENV_VARS.LIBRARY_PATH} does not contain ${libDir}. Value: ${snapshot.libraryPath || '(unset)'}`,
      { libDir, libraryPath: snapshot.libraryPath }
    );
  }
}

export interface VerifyInstallationOptions extends CheckEnvironmentOptions {
  /** Public interpreter path; after a rebind this is the shim */
  interpreter: string;
  probe?: InterpreterProbe;
}

/**
 * Probe the interpreter as the restarted kernel would start it, then check it
 */
export async function verifyInstallation(options: VerifyInstallationOptions, ctx?: ExecutionContext): Promise<InterpreterSnapshot> {
  const out = resolveOutput(ctx);
  const { interpreter, probe = probeInterpreter } = options;
  const snapshot = await probe(interpreter);
  await checkEnvironment(snapshot, options);
  out.success('✨🍰✨ Everything looks OK!');
  return snapshot;
}
