import type { DependencyType } from '../../types/index.js';
import { canonicalizePath } from '../../utils/path-resolution.js';
import { formatPackageNode } from './graph-printer.js';

export interface PackageNodeOptions {
  isRoot?: boolean;
}

/**
 * A node in a PackageGraph.
 */
export class PackageNode {
  /** The name of the package as listed in its manifest. */
  readonly name: string;

  /** How this package's sources are obtained. */
  readonly dependencyType: DependencyType;

  /**
   * Packages this package directly depends on, in declaration order.
   * Edges only; the graph's table owns the nodes. Frozen once the graph
   * is constructed.
   */
  readonly dependencies: PackageNode[] = [];

  /** Canonical absolute path of the package sources. */
  readonly path: string | undefined;

  /** Whether this node is the graph's root. */
  readonly isRoot: boolean;

  constructor(
    name: string,
    path: string | undefined,
    dependencyType: DependencyType,
    options: PackageNodeOptions = {}
  ) {
    this.name = name;
    this.path = path === undefined ? undefined : canonicalizePath(path);
    this.dependencyType = dependencyType;
    this.isRoot = options.isRoot ?? false;
  }

  /** Appends edges, skipping targets already present. */
  addDependencies(nodes: Iterable<PackageNode>): this {
    for (const node of nodes) {
      if (!this.dependencies.some((existing) => existing.name === node.name)) {
        this.dependencies.push(node);
      }
    }
    return this;
  }

  toString(): string {
    return formatPackageNode(this);
  }
}
