import { HostformError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the hostform CLI
 */

export type IncludeErrorKind = 'NotFound' | 'InvalidDirective' | 'UnresolvedGlob';

/**
 * Fatal: the desired configuration would be incomplete.
 */
export class IncludeError extends HostformError {
  public readonly kind: IncludeErrorKind;

  constructor(kind: IncludeErrorKind, message: string, details?: Record<string, unknown>) {
    super(`Include error (${kind}): ${message}`, ErrorCodes.INCLUDE_ERROR, { kind, ...details });
    this.name = 'IncludeError';
    this.kind = kind;
  }
}

export class ConfigError extends HostformError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends HostformError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends HostformError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

/**
 * Never escapes the cache layer; callers see a miss instead.
 */
export class CacheError extends HostformError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CACHE_ERROR, details);
    this.name = 'CacheError';
  }
}

/**
 * Never escapes the state store; callers see an empty state instead.
 */
export class StateLoadError extends HostformError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.STATE_LOAD_ERROR, details);
    this.name = 'StateLoadError';
  }
}

export type SafetyViolationReason =
  | 'type-mismatch'
  | 'system-target'
  | 'possibly-modified'
  | 'not-regular-file'
  | 'not-executable';

/**
 * Per-resource refusal to remove something that may hold user data.
 */
export class SafetyViolationError extends HostformError {
  public readonly reason: SafetyViolationReason;

  constructor(reason: SafetyViolationReason, message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.SAFETY_VIOLATION, { reason, ...details });
    this.name = 'SafetyViolationError';
    this.reason = reason;
  }
}

export class PackageManagerError extends HostformError {
  constructor(manager: string, message: string, details?: Record<string, unknown>) {
    super(`${manager}: ${message}`, ErrorCodes.PACKAGE_MANAGER_ERROR, { manager, ...details });
    this.name = 'PackageManagerError';
  }
}

export class DeploymentError extends HostformError {
  constructor(name: string, message: string, details?: Record<string, unknown>) {
    super(`Failed to deploy '${name}': ${message}`, ErrorCodes.DEPLOYMENT_ERROR, { name, ...details });
    this.name = 'DeploymentError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof HostformError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
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
      // Handle user cancellation gracefully - just exit without error message
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
