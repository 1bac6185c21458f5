import { PackageGraphError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for every way a package graph build can fail.
 * All of them abort the build; none is retried.
 */

const NOT_INSTALLED_HINT =
  'Run the package install step first; the graph is built from an already resolved package tree.';

export class MissingManifestError extends PackageGraphError {
  constructor(manifestPath: string) {
    super(
      `Unable to generate package graph, no manifest found at '${manifestPath}'. ${NOT_INSTALLED_HINT}`,
      ErrorCodes.MISSING_MANIFEST,
      { path: manifestPath }
    );
    this.name = 'MissingManifestError';
  }
}

export class MissingLocationIndexError extends PackageGraphError {
  constructor(indexPath: string) {
    super(
      `Unable to generate package graph, no location index found at '${indexPath}'. ${NOT_INSTALLED_HINT}`,
      ErrorCodes.MISSING_LOCATION_INDEX,
      { path: indexPath }
    );
    this.name = 'MissingLocationIndexError';
  }
}

export class MissingLockfileError extends PackageGraphError {
  constructor(lockfilePath: string) {
    super(
      `Unable to generate package graph, no lock file found at '${lockfilePath}'. ${NOT_INSTALLED_HINT}`,
      ErrorCodes.MISSING_LOCKFILE,
      { path: lockfilePath }
    );
    this.name = 'MissingLockfileError';
  }
}

export class UnknownSourceTagError extends PackageGraphError {
  constructor(packageName: string, source: unknown, lockfilePath: string) {
    super(
      `Unable to determine dependency type of '${packageName}': unknown source '${String(source)}'`,
      ErrorCodes.UNKNOWN_SOURCE_TAG,
      { packageName, source, path: lockfilePath }
    );
    this.name = 'UnknownSourceTagError';
  }
}

export class MissingDependencyTypeError extends PackageGraphError {
  constructor(packageName: string, location: string) {
    super(
      `Package '${packageName}' has a location but no lock file entry`,
      ErrorCodes.MISSING_DEPENDENCY_TYPE,
      { packageName, path: location }
    );
    this.name = 'MissingDependencyTypeError';
  }
}

export class DanglingDependencyError extends PackageGraphError {
  constructor(packageName: string, dependencyName: string) {
    super(
      `Package '${packageName}' depends on '${dependencyName}', which is not a resolved package`,
      ErrorCodes.DANGLING_DEPENDENCY,
      { packageName, dependencyName }
    );
    this.name = 'DanglingDependencyError';
  }
}

export class InvalidRootError extends PackageGraphError {
  constructor(packageName: string) {
    super(
      `Root node '${packageName}' must indicate isRoot`,
      ErrorCodes.INVALID_ROOT,
      { packageName }
    );
    this.name = 'InvalidRootError';
  }
}

export class DuplicateRootError extends PackageGraphError {
  constructor(rootName: string, packageNames: string[]) {
    super(
      `No nodes other than the root '${rootName}' may indicate isRoot: ${packageNames.join(', ')}`,
      ErrorCodes.DUPLICATE_ROOT,
      { packageName: rootName, packageNames }
    );
    this.name = 'DuplicateRootError';
  }
}

export class DuplicatePackageNameError extends PackageGraphError {
  constructor(packageName: string, dependentName: string, paths: Array<string | undefined>) {
    super(
      `Package '${dependentName}' depends on a second, distinct node named '${packageName}'`,
      ErrorCodes.DUPLICATE_PACKAGE_NAME,
      { packageName, dependentName, paths }
    );
    this.name = 'DuplicatePackageNameError';
  }
}

export class InvalidManifestError extends PackageGraphError {
  constructor(manifestPath: string, reason: string) {
    super(`Invalid manifest '${manifestPath}': ${reason}`, ErrorCodes.INVALID_MANIFEST, {
      path: manifestPath
    });
    this.name = 'InvalidManifestError';
  }
}

export class InvalidLockfileError extends PackageGraphError {
  constructor(lockfilePath: string, reason: string) {
    super(`Invalid lock file '${lockfilePath}': ${reason}`, ErrorCodes.INVALID_LOCKFILE, {
      path: lockfilePath
    });
    this.name = 'InvalidLockfileError';
  }
}

export class MalformedLocationIndexError extends PackageGraphError {
  constructor(indexPath: string, lineNumber: number, reason: string) {
    super(
      `Malformed location index '${indexPath}' at line ${lineNumber}: ${reason}`,
      ErrorCodes.MALFORMED_LOCATION_INDEX,
      { path: indexPath, line: lineNumber }
    );
    this.name = 'MalformedLocationIndexError';
  }
}

export class PackageNotFoundError extends PackageGraphError {
  constructor(packageName: string, rootName: string) {
    super(
      `Package '${packageName}' is not part of the dependency graph of '${rootName}'`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName, rootName }
    );
    this.name = 'PackageNotFoundError';
  }
}

export class FileSystemError extends PackageGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends PackageGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Maps any thrown value to a CommandResult, logging details in verbose mode
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PackageGraphError) {
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
