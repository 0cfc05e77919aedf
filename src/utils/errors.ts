import { BundleError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failures a bundling run can end with
 */

export type NotFoundKind = 'system' | 'release';

/**
 * A system or release the catalog does not know. Both kinds share one message format.
 */
export class ObjectNotFoundError extends BundleError {
  public readonly kind: NotFoundKind;
  public readonly objectName: string;

  constructor(kind: NotFoundKind, objectName: string, code: ErrorCodes) {
    const label = kind === 'system' ? 'System' : 'Release';
    super(`${label} '${objectName}' not found`, code, { kind, name: objectName });
    this.name = 'ObjectNotFoundError';
    this.kind = kind;
    this.objectName = objectName;
  }
}

export class SystemNotFoundError extends ObjectNotFoundError {
  constructor(systemName: string) {
    super('system', systemName, ErrorCodes.SYSTEM_NOT_FOUND);
    this.name = 'SystemNotFoundError';
  }
}

export class ReleaseNotFoundError extends ObjectNotFoundError {
  constructor(releaseName: string) {
    super('release', releaseName, ErrorCodes.RELEASE_NOT_FOUND);
    this.name = 'ReleaseNotFoundError';
  }
}

export class ArchiveError extends BundleError {
  public readonly releaseName: string;

  constructor(releaseName: string, reason: string, details?: Record<string, unknown>) {
    super(`Archive error for release '${releaseName}': ${reason}`, ErrorCodes.ARCHIVE_ERROR, {
      releaseName,
      ...details
    });
    this.name = 'ArchiveError';
    this.releaseName = releaseName;
  }
}

export class FileSystemError extends BundleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class CatalogError extends BundleError {
  constructor(catalogPath: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid catalog ${catalogPath}: ${reason}`, ErrorCodes.CATALOG_ERROR, {
      catalogPath,
      ...details
    });
    this.name = 'CatalogError';
  }
}

export class ConfigError extends BundleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class BundleDirectoryExistsError extends BundleError {
  constructor(directory: string) {
    super(
      `Bundle directory ${directory} already exists and is not empty (pass --overwrite to reuse it)`,
      ErrorCodes.BUNDLE_DIRECTORY_EXISTS,
      { directory }
    );
    this.name = 'BundleDirectoryExistsError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError<T = unknown>(error: unknown): CommandResult<T> {
  if (error instanceof BundleError) {
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
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
