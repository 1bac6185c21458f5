/**
 * Graph commands (CLI layer).
 *
 * Each command builds a fresh graph from the working directory and returns
 * the rendered text; index.ts prints it.
 */

import {
  buildFromPath,
  formatPackageNode,
  getWatchablePackages,
  PackageNotFoundError,
  type PackageGraph
} from '@package-graph/core';

export function renderDump(graph: PackageGraph): string {
  return graph.toString();
}

export function renderShow(graph: PackageGraph, packageName: string): string {
  const node = graph.get(packageName);
  if (!node) {
    throw new PackageNotFoundError(packageName, graph.root.name);
  }
  return `${formatPackageNode(node)}\n`;
}

export function renderWatchlist(graph: PackageGraph): string {
  return getWatchablePackages(graph)
    .map((node) => `${node.name}\t${node.path}\n`)
    .join('');
}

export async function dumpCommand(cwd: string): Promise<string> {
  return renderDump(await buildFromPath(cwd));
}

export async function showCommand(cwd: string, packageName: string): Promise<string> {
  return renderShow(await buildFromPath(cwd), packageName);
}

export async function watchlistCommand(cwd: string): Promise<string> {
  return renderWatchlist(await buildFromPath(cwd));
}
