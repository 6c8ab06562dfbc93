/**
 * Common types and interfaces for the condabind CLI application
 */

export * from './execution-context.js';

// Core application types
export interface CondaBindDirectories {
  config: string;
}

export type InstallerFailurePolicy = 'abort' | 'continue';

export interface KernelConfig {
  /** Base URL of the Jupyter server hosting the kernel */
  url?: string;
  token?: string;
  /** Kernel id as listed by GET /api/kernels */
  id?: string;
}

export interface CondaBindConfig {
  prefix?: string;
  interpreter?: string;
  startupScript?: string;
  installerFailure?: InstallerFailurePolicy;
  kernel?: KernelConfig;
}

/**
 * Configuration with every default applied
 */
export interface ResolvedConfig {
  prefix: string;
  interpreter?: string;
  startupScript: string;
  installerFailure: InstallerFailurePolicy;
  kernel: KernelConfig;
}

/**
 * Environment-variable overrides injected into every future interpreter start.
 * Values are written verbatim into the shim, so quoting is the caller's job.
 */
export type EnvOverrides = Record<string, string>;

export interface InterpreterVersion {
  major: number;
  minor: number;
}

// Command option types

export interface InstallOptions {
  prefix?: string;
  python?: string;
  env?: EnvOverrides;
  startupScript?: string;
  continueOnInstallerFailure?: boolean;
  restart?: boolean;
  yes?: boolean;
}

export interface CheckOptions {
  prefix?: string;
  python?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class CondaBindError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'CondaBindError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  INSTALLER_FAILED = 'INSTALLER_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  INTERPRETER_ERROR = 'INTERPRETER_ERROR',
  KERNEL_RESTART_FAILED = 'KERNEL_RESTART_FAILED',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
