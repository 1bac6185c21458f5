/**
 * Package graph builder.
 *
 * Reads the root manifest, the location index and the lock file, allocates
 * one node per package, wires edges from every package's own manifest and
 * keeps what is reachable from the root.
 */

import type { GraphConfig } from '../../types/index.js';
import { SDK_PACKAGE_NAME } from '../../constants/index.js';
import { DanglingDependencyError, MissingDependencyTypeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { canonicalizePath } from '../../utils/path-resolution.js';
import { createGraphConfig, loadGraphConfig } from '../config.js';
import { readManifestDependencies, readRootManifest } from '../metadata/manifest-reader.js';
import { readPackageLocations } from '../metadata/location-index-reader.js';
import { readDependencyTypes } from '../metadata/lockfile-reader.js';
import { PackageGraph, type DependencyCycle } from './package-graph.js';
import { PackageNode } from './package-node.js';

export interface BuildFromPathOptions {
  /** Defaults to loadGraphConfig(rootDirectory). */
  config?: GraphConfig;
}

export interface BuildFromRootOptions {
  /**
   * Location of the synthetic toolchain node when the caller did not supply
   * one. When omitted, falls back to createGraphConfig()'s default: two
   * directories above `process.execPath`. Neither PKG_GRAPH_SDK_PATH nor a
   * config file is read here.
   */
  sdkPath?: string;
}

export function createSdkNode(sdkPath: string | undefined): PackageNode {
  return new PackageNode(SDK_PACKAGE_NAME, sdkPath, 'sdk');
}

/**
 * Depth-first closure over dependency edges. Each name is visited once and
 * the first node discovered under a name wins. A dependency that is still
 * on the traversal stack is recorded as a cycle instead of being descended
 * into.
 */
export function collectReachable(root: PackageNode): {
  allPackages: Map<string, PackageNode>;
  cycles: DependencyCycle[];
} {
  const allPackages = new Map<string, PackageNode>([[root.name, root]]);
  const cycles: DependencyCycle[] = [];
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (node: PackageNode): void => {
    stack.push(node.name);
    onStack.add(node.name);

    for (const dependency of node.dependencies) {
      if (onStack.has(dependency.name)) {
        const start = stack.indexOf(dependency.name);
        cycles.push([...stack.slice(start), dependency.name]);
        continue;
      }
      if (allPackages.has(dependency.name)) continue;
      allPackages.set(dependency.name, dependency);
      visit(dependency);
    }

    stack.pop();
    onStack.delete(node.name);
  };

  visit(root);
  return { allPackages, cycles };
}

function finishGraph(root: PackageNode, sdkNode: PackageNode): PackageGraph {
  const { allPackages, cycles } = collectReachable(root);
  if (!allPackages.has(SDK_PACKAGE_NAME)) {
    allPackages.set(SDK_PACKAGE_NAME, sdkNode);
  }
  if (cycles.length > 0) {
    logger.debug(`Found ${cycles.length} dependency cycle(s)`, {
      cycles: cycles.map((cycle) => cycle.join(' -> '))
    });
  }
  return new PackageGraph(root, allPackages, cycles);
}

/**
 * Creates a PackageGraph from a fully populated root node whose edges the
 * caller has already attached.
 */
export function buildFromRoot(root: PackageNode, options: BuildFromRootOptions = {}): PackageGraph {
  const sdkPath = options.sdkPath ?? createGraphConfig().sdkPath;
  return finishGraph(root, createSdkNode(sdkPath));
}

/**
 * Creates a PackageGraph for the package whose top level directory lives at
 * `rootDirectory`. The package tree must already be installed.
 */
export async function buildFromPath(
  rootDirectory: string,
  options: BuildFromPathOptions = {}
): Promise<PackageGraph> {
  const rootPath = canonicalizePath(rootDirectory);
  const config = options.config ?? (await loadGraphConfig(rootPath));
  const { files } = config;

  const rootManifest = await readRootManifest(rootPath, files.manifest);
  const packageLocations = await readPackageLocations(rootPath, files.locationIndex);
  packageLocations.delete(rootManifest.name);
  const dependencyTypes = await readDependencyTypes(rootPath, files.lockfile);

  const nodes = new Map<string, PackageNode>();
  const rootNode = new PackageNode(rootManifest.name, rootPath, 'path', { isRoot: true });
  nodes.set(rootNode.name, rootNode);

  for (const [packageName, location] of packageLocations) {
    const dependencyType = dependencyTypes.get(packageName);
    if (dependencyType === undefined) {
      throw new MissingDependencyTypeError(packageName, location);
    }
    nodes.set(packageName, new PackageNode(packageName, location, dependencyType));
  }

  const sdkNode = nodes.get(SDK_PACKAGE_NAME) ?? createSdkNode(config.sdkPath);
  nodes.set(SDK_PACKAGE_NAME, sdkNode);

  const resolve = (owner: string, names: string[]): PackageNode[] =>
    names.map((name) => {
      const node = nodes.get(name);
      if (!node) {
        throw new DanglingDependencyError(owner, name);
      }
      return node;
    });

  rootNode.addDependencies(resolve(rootNode.name, rootManifest.dependencies));

  for (const [packageName, location] of packageLocations) {
    // The toolchain package never carries edges.
    if (packageName === SDK_PACKAGE_NAME) continue;
    const dependencyNames = await readManifestDependencies(location, files.manifest);
    const node = nodes.get(packageName);
    if (node) {
      node.addDependencies(resolve(packageName, dependencyNames));
    }
  }

  const graph = finishGraph(rootNode, sdkNode);

  const unreachable = [...packageLocations.keys()].filter((name) => !graph.has(name));
  if (unreachable.length > 0) {
    logger.debug(`Dropped ${unreachable.length} located package(s) not reachable from ${rootNode.name}`, {
      packages: unreachable
    });
  }
  logger.debug(`Built package graph for ${rootNode.name}`, { packages: graph.allPackages.size });

  return graph;
}

/**
 * Creates a PackageGraph for the package in the current working directory.
 */
export function buildForCurrentPackage(options: BuildFromPathOptions = {}): Promise<PackageGraph> {
  return buildFromPath(process.cwd(), options);
}
