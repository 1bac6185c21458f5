import { SDK_PACKAGE_NAME } from '../../constants/index.js';
import {
  DanglingDependencyError,
  DuplicatePackageNameError,
  DuplicateRootError,
  InvalidRootError
} from '../../utils/errors.js';
import { formatPackageGraph } from './graph-printer.js';
import type { PackageNode } from './package-node.js';

/** Names along a dependency cycle; the first name is repeated at the end. */
export type DependencyCycle = readonly string[];

/**
 * A graph of the package dependencies for an application.
 *
 * Instances come from the graph builder and are immutable: the table is
 * read-only and every node's edge list is frozen on construction.
 */
export class PackageGraph {
  /** The root application package. */
  readonly root: PackageNode;

  /** All nodes indexed by package name. */
  readonly allPackages: ReadonlyMap<string, PackageNode>;

  /** Dependency cycles seen while computing the reachable closure. */
  readonly cycles: readonly DependencyCycle[];

  /** The synthetic toolchain package. */
  readonly sdk: PackageNode;

  constructor(root: PackageNode, allPackages: Map<string, PackageNode>, cycles: DependencyCycle[] = []) {
    validateGraph(root, allPackages);
    const sdk = allPackages.get(SDK_PACKAGE_NAME);
    if (!sdk) {
      throw new DanglingDependencyError(root.name, SDK_PACKAGE_NAME);
    }
    this.root = root;
    this.sdk = sdk;
    this.allPackages = new Map(allPackages);
    this.cycles = Object.freeze(cycles.map((cycle) => Object.freeze([...cycle])));
    for (const node of this.allPackages.values()) {
      Object.freeze(node.dependencies);
    }
  }

  /** Shorthand to get a package by name. */
  get(packageName: string): PackageNode | undefined {
    return this.allPackages.get(packageName);
  }

  has(packageName: string): boolean {
    return this.allPackages.has(packageName);
  }

  toString(): string {
    return formatPackageGraph(this);
  }
}

function validateGraph(root: PackageNode, allPackages: Map<string, PackageNode>): void {
  if (!root.isRoot) {
    throw new InvalidRootError(root.name);
  }
  if (allPackages.get(root.name) !== root) {
    throw new InvalidRootError(root.name);
  }

  const otherRoots = [...allPackages.values()]
    .filter((node) => node !== root && node.isRoot)
    .map((node) => node.name);
  if (otherRoots.length > 0) {
    throw new DuplicateRootError(root.name, otherRoots);
  }

  for (const node of allPackages.values()) {
    for (const dependency of node.dependencies) {
      const target = allPackages.get(dependency.name);
      if (!target) {
        throw new DanglingDependencyError(node.name, dependency.name);
      }
      if (target !== dependency) {
        throw new DuplicatePackageNameError(dependency.name, node.name, [target.path, dependency.path]);
      }
    }
  }
}
