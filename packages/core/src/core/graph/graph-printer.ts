import type { PackageNode } from './package-node.js';
import type { PackageGraph } from './package-graph.js';

/**
 * Human-readable diagnostics. Not a machine format; do not parse it.
 */

export function formatPackageNode(node: PackageNode): string {
  const dependencyNames = node.dependencies.map((d) => d.name).join(', ');
  return [
    `  ${node.name}:`,
    `    type: ${node.dependencyType}`,
    `    path: ${node.path ?? '(none)'}`,
    `    dependencies: [${dependencyNames}]`
  ].join('\n');
}

export function formatPackageGraph(graph: PackageGraph): string {
  let output = '';
  for (const node of graph.allPackages.values()) {
    output += `${formatPackageNode(node)}\n`;
  }
  return output;
}
