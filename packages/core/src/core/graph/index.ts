export { PackageNode, type PackageNodeOptions } from './package-node.js';
export { PackageGraph, type DependencyCycle } from './package-graph.js';
export {
  buildFromPath,
  buildFromRoot,
  buildForCurrentPackage,
  collectReachable,
  createSdkNode,
  type BuildFromPathOptions,
  type BuildFromRootOptions
} from './graph-builder.js';
export { formatPackageNode, formatPackageGraph } from './graph-printer.js';
export { getSourceMutability, isMutableSource, getWatchablePackages } from './source-mutability.js';
