import type { DependencyType, SourceMutability } from '../../types/index.js';
import type { PackageGraph } from './package-graph.js';
import type { PackageNode } from './package-node.js';

/**
 * Whether a package's sources can change on disk after install.
 * Version-control checkouts and path dependencies can; registry downloads
 * and toolchain libraries cannot.
 */
export function getSourceMutability(dependencyType: DependencyType): SourceMutability {
  switch (dependencyType) {
    case 'git':
    case 'path':
      return 'mutable';
    case 'hosted':
    case 'sdk':
      return 'immutable';
  }
}

export function isMutableSource(node: PackageNode): boolean {
  return getSourceMutability(node.dependencyType) === 'mutable';
}

/**
 * Packages a file watcher should monitor, in table order.
 */
export function getWatchablePackages(graph: PackageGraph): PackageNode[] {
  return [...graph.allPackages.values()].filter((node) => node.path !== undefined && isMutableSource(node));
}
