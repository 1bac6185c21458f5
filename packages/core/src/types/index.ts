/**
 * Shared types for the package graph core.
 */

/**
 * How a package's sources are obtained. This dictates how the package should
 * be watched for changes.
 *
 * - `git`: version-control checkout
 * - `path`: local filesystem path
 * - `hosted`: registry download, treated as immutable
 * - `sdk`: bundled with the toolchain
 */
export type DependencyType = 'git' | 'path' | 'hosted' | 'sdk';

export type SourceMutability = 'mutable' | 'immutable';

export interface RootManifestInfo {
  name: string;
  dependencies: string[];
}

/** File names looked up inside a package directory. */
export interface GraphFileNames {
  manifest: string;
  lockfile: string;
  locationIndex: string;
}

export interface GraphConfig {
  /** Absolute location of the toolchain; `undefined` when unknown. */
  sdkPath?: string;
  files: GraphFileNames;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export enum ErrorCodes {
  MISSING_MANIFEST = 'MISSING_MANIFEST',
  MISSING_LOCATION_INDEX = 'MISSING_LOCATION_INDEX',
  MISSING_LOCKFILE = 'MISSING_LOCKFILE',
  UNKNOWN_SOURCE_TAG = 'UNKNOWN_SOURCE_TAG',
  MISSING_DEPENDENCY_TYPE = 'MISSING_DEPENDENCY_TYPE',
  DANGLING_DEPENDENCY = 'DANGLING_DEPENDENCY',
  INVALID_ROOT = 'INVALID_ROOT',
  DUPLICATE_ROOT = 'DUPLICATE_ROOT',
  DUPLICATE_PACKAGE_NAME = 'DUPLICATE_PACKAGE_NAME',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  INVALID_LOCKFILE = 'INVALID_LOCKFILE',
  MALFORMED_LOCATION_INDEX = 'MALFORMED_LOCATION_INDEX',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

export class PackageGraphError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PackageGraphError';
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
