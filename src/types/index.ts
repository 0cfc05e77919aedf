/**
 * Core types for the sysbundle CLI
 */

export interface SysbundleDirectories {
  config: string;
  cache: string;
}

export interface SysbundleConfig {
  /** Default catalog file used when no --catalog flag is given */
  catalog?: string;
  /** Archive cache root; defaults to <home>/cache */
  cacheDir?: string;
  /** Allow materializing into a non-empty target directory */
  overwrite?: boolean;
}

// Catalog records, as the catalog adapter hands them out
export interface CatalogSystem {
  name: string;
  release: string;
  sourceFiles: string[];
  dependencies: string[];
}

export interface CatalogRelease {
  name: string;
  /** Remote URL, file: URL or absolute local path of the release archive */
  archive: string;
  /** Top-level directory inside the archive and under software/ */
  prefix: string;
  systems: CatalogSystem[];
  size?: number;
  md5?: string;
}

// Bundle entities (immutable once registered)
export interface BundleSystem {
  readonly name: string;
  readonly release: string;
  readonly sourceFiles: readonly string[];
  readonly dependencies: readonly string[];
}

export interface BundleRelease {
  readonly name: string;
  readonly archive: string;
  readonly prefix: string;
  readonly systems: readonly string[];
  readonly size?: number;
  readonly md5?: string;
}

export interface BundleOptions {
  /** Target directory of the bundle */
  to: string;
  catalog?: string;
  cacheDir?: string;
  overwrite?: boolean;
}

export interface ClosureOptions {
  catalog?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export enum ErrorCodes {
  SYSTEM_NOT_FOUND = 'SYSTEM_NOT_FOUND',
  RELEASE_NOT_FOUND = 'RELEASE_NOT_FOUND',
  ARCHIVE_ERROR = 'ARCHIVE_ERROR',
  CATALOG_ERROR = 'CATALOG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  BUNDLE_DIRECTORY_EXISTS = 'BUNDLE_DIRECTORY_EXISTS'
}

export class BundleError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BundleError';
    this.code = code;
    this.details = details;
  }
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
