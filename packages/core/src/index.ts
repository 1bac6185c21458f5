/**
 * @package-graph/core
 *
 * Builds an in-memory dependency graph of an installed package tree from
 * its manifest, lock file and location index. No terminal or process-level
 * concerns live here; the CLI package owns those.
 */

// ============================================================================
// Graph
// ============================================================================

export {
  PackageNode,
  PackageGraph,
  buildFromPath,
  buildFromRoot,
  buildForCurrentPackage,
  collectReachable,
  createSdkNode,
  formatPackageNode,
  formatPackageGraph,
  getSourceMutability,
  isMutableSource,
  getWatchablePackages,
  type PackageNodeOptions,
  type DependencyCycle,
  type BuildFromPathOptions,
  type BuildFromRootOptions
} from './core/graph/index.js';

// ============================================================================
// Metadata
// ============================================================================

export {
  readRootManifest,
  readManifestDependencies,
  readPackageLocations,
  readDependencyTypes,
  extractDependencyNames,
  parsePackageLocations,
  parseDependencyTypes,
  dependencyTypeFromSource
} from './core/metadata/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  loadGraphConfig,
  createGraphConfig,
  parseConfigFile,
  defaultSdkPath,
  DEFAULT_FILE_NAMES,
  type GraphConfigOverrides
} from './core/config.js';

// ============================================================================
// Errors, logging, types
// ============================================================================

export * from './utils/errors.js';
export { logger, ConsoleLogger, levelFromEnv } from './utils/logger.js';
export { SDK_PACKAGE_NAME, FILE_PATTERNS, ENV_VARS } from './constants/index.js';
export {
  PackageGraphError,
  ErrorCodes,
  LogLevel,
  type DependencyType,
  type SourceMutability,
  type GraphConfig,
  type GraphFileNames,
  type RootManifestInfo,
  type CommandResult,
  type Logger
} from './types/index.js';
