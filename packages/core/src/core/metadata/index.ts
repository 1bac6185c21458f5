/**
 * Metadata reading: turns the on-disk manifest, lock file and location index
 * into plain lookup tables. No graph reasoning happens here.
 */

export {
  getManifestPath,
  readManifestDocument,
  extractDependencyNames,
  readRootManifest,
  readManifestDependencies
} from './manifest-reader.js';
export { readPackageLocations, parsePackageLocations } from './location-index-reader.js';
export { readDependencyTypes, parseDependencyTypes, dependencyTypeFromSource } from './lockfile-reader.js';
