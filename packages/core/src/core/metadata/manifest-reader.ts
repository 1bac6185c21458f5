/**
 * Manifest reading.
 *
 * A package's dependency set is the union of its `dependencies`,
 * `dev_dependencies` and `dependency_overrides` keys. This applies to every
 * package, not just the root: dev-only sources still have to be watched.
 */

import { join } from 'path';
import { DEPENDENCY_SECTIONS, FILE_PATTERNS } from '../../constants/index.js';
import type { RootManifestInfo } from '../../types/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { InvalidManifestError, MissingManifestError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { mappingKeys, parseYamlMapping, type YamlMapping } from '../../utils/yaml-document.js';

const UNION_SECTIONS = [
  DEPENDENCY_SECTIONS.DEPENDENCIES,
  DEPENDENCY_SECTIONS.DEV_DEPENDENCIES,
  DEPENDENCY_SECTIONS.DEPENDENCY_OVERRIDES
] as const;

export function getManifestPath(packagePath: string, manifestFile: string = FILE_PATTERNS.MANIFEST): string {
  return join(packagePath, manifestFile);
}

/**
 * Load and parse the manifest of the package at `packagePath`.
 */
export async function readManifestDocument(
  packagePath: string,
  manifestFile: string = FILE_PATTERNS.MANIFEST
): Promise<{ manifestPath: string; document: YamlMapping }> {
  const manifestPath = getManifestPath(packagePath, manifestFile);
  if (!(await exists(manifestPath))) {
    throw new MissingManifestError(manifestPath);
  }

  logger.debug(`Reading manifest: ${manifestPath}`);
  const content = await readTextFile(manifestPath);
  try {
    return { manifestPath, document: parseYamlMapping(content, manifestPath) };
  } catch (error) {
    throw new InvalidManifestError(manifestPath, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Union of the three dependency sections, de-duplicated, in the order each
 * name is first declared.
 */
export function extractDependencyNames(document: YamlMapping, manifestPath: string): string[] {
  const names = new Set<string>();
  for (const section of UNION_SECTIONS) {
    const keys = mappingKeys(document, section);
    if (!keys) {
      throw new InvalidManifestError(manifestPath, `'${section}' must be a mapping`);
    }
    for (const key of keys) {
      names.add(key);
    }
  }
  return [...names];
}

export async function readRootManifest(
  rootPath: string,
  manifestFile: string = FILE_PATTERNS.MANIFEST
): Promise<RootManifestInfo> {
  const { manifestPath, document } = await readManifestDocument(rootPath, manifestFile);
  const name = document.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidManifestError(manifestPath, "root manifest must contain a 'name' field");
  }
  return {
    name,
    dependencies: extractDependencyNames(document, manifestPath)
  };
}

export async function readManifestDependencies(
  packagePath: string,
  manifestFile: string = FILE_PATTERNS.MANIFEST
): Promise<string[]> {
  const { manifestPath, document } = await readManifestDocument(packagePath, manifestFile);
  return extractDependencyNames(document, manifestPath);
}
