/**
 * Shared constants for the package graph.
 * Single source of truth for file names, manifest keys and source tags.
 */

export const FILE_PATTERNS = {
  MANIFEST: 'manifest.yaml',
  LOCKFILE: 'manifest.lock',
  LOCATION_INDEX: '.packages',
  CONFIG_JSONC: 'package-graph.jsonc'
} as const;

/** Manifest sections whose keys are folded into a package's dependency set. */
export const DEPENDENCY_SECTIONS = {
  DEPENDENCIES: 'dependencies',
  DEV_DEPENDENCIES: 'dev_dependencies',
  DEPENDENCY_OVERRIDES: 'dependency_overrides'
} as const;

/** Reserved table key of the synthetic toolchain package. */
export const SDK_PACKAGE_NAME = '$sdk';

/** Every location index value ends with this marker. */
export const LOCATION_LIB_SUFFIX = 'lib/';

export const SOURCE_TAGS = {
  GIT: 'git',
  HOSTED: 'hosted',
  PATH: 'path',
  SDK: 'sdk'
} as const;

export const ENV_VARS = {
  SDK_PATH: 'PKG_GRAPH_SDK_PATH',
  VERBOSE: 'PKG_GRAPH_VERBOSE'
} as const;

export type DependencySection = typeof DEPENDENCY_SECTIONS[keyof typeof DEPENDENCY_SECTIONS];
export type SourceTag = typeof SOURCE_TAGS[keyof typeof SOURCE_TAGS];
