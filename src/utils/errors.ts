import { CondaBindError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure points of the bootstrap sequence
 */

export class DownloadError extends CondaBindError {
  constructor(url: string, reason: string, details?: unknown) {
    super(`Failed to download ${url}: ${reason}`, ErrorCodes.DOWNLOAD_FAILED, details);
    this.name = 'DownloadError';
  }
}

export class InstallerError extends CondaBindError {
  public exitCode: number | null;
  public output: string;

  constructor(exitCode: number | null, output: string) {
    const status = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`;
    super(`Installer ${status}`, ErrorCodes.INSTALLER_FAILED, { exitCode, output });
    this.name = 'InstallerError';
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class FileSystemError extends CondaBindError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends CondaBindError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends CondaBindError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class InterpreterError extends CondaBindError {
  constructor(interpreter: string, reason: string, details?: unknown) {
    super(`Could not inspect interpreter ${interpreter}: ${reason}`, ErrorCodes.INTERPRETER_ERROR, details);
    this.name = 'InterpreterError';
  }
}

export class KernelRestartError extends CondaBindError {
  constructor(reason: string, details?: unknown) {
    super(`Kernel restart request failed: ${reason}`, ErrorCodes.KERNEL_RESTART_FAILED, details);
    this.name = 'KernelRestartError';
  }
}

export type VerificationCondition = 'package-manager' | 'search-path' | 'library-path';

export class VerificationError extends CondaBindError {
  public condition: VerificationCondition;

  constructor(condition: VerificationCondition, message: string, details?: unknown) {
    super(message, ErrorCodes.VERIFICATION_FAILED, details);
    this.name = 'VerificationError';
    this.condition = condition;
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof CondaBindError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
