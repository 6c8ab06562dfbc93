/**
 * Shared constants for the condabind CLI application
 * Single source of truth for default locations, file names and
 * environment variable names used throughout the application.
 */

export const DIR_PATTERNS = {
  CONDABIND: '.condabind',
  CONDA_META: 'conda-meta',
  LIB: 'lib',
  BIN: 'bin'
} as const;

export const FILE_PATTERNS = {
  PINNED: 'pinned',
  CONDARC: '.condarc',
  INSTALLER: '__installer__.sh',
  REAL_SUFFIX: '.real',
  BINDING: '.condabind.json',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json'
} as const;

export const DEFAULTS = {
  PREFIX: '/usr/local',
  STARTUP_SCRIPT: '/etc/ipython/ipython_config.py',
  INTERPRETER_NAME: 'python3',
  INSTALLER_FAILURE: 'abort'
} as const;

export const ENV_VARS = {
  LIBRARY_PATH: 'LD_LIBRARY_PATH',
  ACCELERATOR_VERSION: 'CUDA_VERSION',
  VERBOSE: 'CONDABIND_VERBOSE',
  JUPYTER_URL: 'JUPYTER_SERVER_URL',
  JUPYTER_TOKEN: 'JUPYTER_TOKEN',
  JUPYTER_KERNEL_ID: 'JUPYTER_KERNEL_ID'
} as const;

/**
 * Executable the post-install check expects on PATH
 */
export const PACKAGE_MANAGER_EXECUTABLE = 'conda';

/**
 * Flags passed to constructor-style installers: batch mode, force, prefix
 */
export const INSTALLER_FLAGS = '-bfp';

export const ACCELERATOR_WILDCARD = '*.*';

export const SHIM_MARKER = '# condabind shim';

export const STARTUP_MARKERS = {
  BEGIN: '# >>> condabind >>>',
  END: '# <<< condabind <<<'
} as const;

export const RUN_CONTROL_KEYS = {
  ALWAYS_YES: 'always_yes'
} as const;
