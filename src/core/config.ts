import { join } from 'path';
import { CondaBindConfig, InstallerFailurePolicy, KernelConfig, ResolvedConfig } from '../types/index.js';
import { readJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, FileSystemError } from '../utils/errors.js';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { getCondaBindDirectories } from './directory.js';

/**
 * Configuration management for the condabind CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const STRING_KEYS = ['prefix', 'interpreter', 'startupScript'] as const;
const KERNEL_KEYS = ['url', 'token', 'id'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFailurePolicy(value: unknown): value is InstallerFailurePolicy {
  return value === 'abort' || value === 'continue';
}

/**
 * Check the shape of a parsed config document
 */
export function validateConfig(raw: unknown, source: string): CondaBindConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be an object`);
  }

  const config: CondaBindConfig = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`${source}: '${key}' must be a non-empty string`);
    }
    config[key] = value;
  }

  if (raw.installerFailure !== undefined) {
    if (!isFailurePolicy(raw.installerFailure)) {
      throw new ConfigError(`${source}: 'installerFailure' must be "abort" or "continue"`);
    }
    config.installerFailure = raw.installerFailure;
  }

  if (raw.kernel !== undefined) {
    const kernelRaw = raw.kernel;
    if (!isRecord(kernelRaw)) {
      throw new ConfigError(`${source}: 'kernel' must be an object`);
    }
    const kernel: KernelConfig = {};
    for (const key of KERNEL_KEYS) {
      const value = kernelRaw[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new ConfigError(`${source}: 'kernel.${key}' must be a string`);
      }
      kernel[key] = value;
    }
    config.kernel = kernel;
  }

  return config;
}

/** An empty variable counts as unset */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value ? value : undefined;
}

export class ConfigManager {
  private config: ResolvedConfig | null = null;
  private configDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(configDir: string = getCondaBindDirectories().config, env: NodeJS.ProcessEnv = process.env) {
    this.configDir = configDir;
    this.env = env;
  }

  /**
   * Find the existing config file, or null if none exists
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load the config file (if any) and apply defaults and environment overrides
   */
  async load(): Promise<ResolvedConfig> {
    if (this.config) {
      return this.config;
    }

    let fileConfig: CondaBindConfig = {};
    const configPath = await this.findConfigFile();

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      try {
        fileConfig = validateConfig(await readJsoncFile(configPath), configPath);
      } catch (error) {
        if (error instanceof FileSystemError) {
          throw new ConfigError(`Failed to load configuration: ${error.message}`, { configPath });
        }
        throw error;
      }
    } else {
      logger.debug('Config file not found, using defaults');
    }

    const kernel: KernelConfig = {
      url: envValue(this.env, ENV_VARS.JUPYTER_URL) ?? fileConfig.kernel?.url,
      token: envValue(this.env, ENV_VARS.JUPYTER_TOKEN) ?? fileConfig.kernel?.token,
      id: envValue(this.env, ENV_VARS.JUPYTER_KERNEL_ID) ?? fileConfig.kernel?.id
    };

    this.config = {
      prefix: fileConfig.prefix ?? DEFAULTS.PREFIX,
      interpreter: fileConfig.interpreter,
      startupScript: fileConfig.startupScript ?? DEFAULTS.STARTUP_SCRIPT,
      installerFailure: fileConfig.installerFailure ?? DEFAULTS.INSTALLER_FAILURE,
      kernel
    };

    return this.config;
  }
}

export const configManager = new ConfigManager();
