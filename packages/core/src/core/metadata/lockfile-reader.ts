import { join } from 'path';
import { FILE_PATTERNS, SOURCE_TAGS } from '../../constants/index.js';
import type { DependencyType } from '../../types/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { InvalidLockfileError, MissingLockfileError, UnknownSourceTagError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isMapping, parseYamlMapping, type YamlMapping } from '../../utils/yaml-document.js';

const SOURCE_TO_DEPENDENCY_TYPE: Record<string, DependencyType> = {
  [SOURCE_TAGS.GIT]: 'git',
  [SOURCE_TAGS.HOSTED]: 'hosted',
  [SOURCE_TAGS.PATH]: 'path',
  [SOURCE_TAGS.SDK]: 'sdk'
};

export function dependencyTypeFromSource(
  packageName: string,
  source: unknown,
  lockfilePath: string
): DependencyType {
  if (typeof source === 'string' && Object.hasOwn(SOURCE_TO_DEPENDENCY_TYPE, source)) {
    return SOURCE_TO_DEPENDENCY_TYPE[source];
  }
  throw new UnknownSourceTagError(packageName, source, lockfilePath);
}

/**
 * Parse the lock file and return a Map from package name to the type of
 * dependency it was resolved as.
 */
export async function readDependencyTypes(
  rootPath: string,
  lockfileName: string = FILE_PATTERNS.LOCKFILE
): Promise<Map<string, DependencyType>> {
  const lockfilePath = join(rootPath, lockfileName);
  if (!(await exists(lockfilePath))) {
    throw new MissingLockfileError(lockfilePath);
  }

  logger.debug(`Reading lock file: ${lockfilePath}`);
  const content = await readTextFile(lockfilePath);
  return parseDependencyTypes(content, lockfilePath);
}

export function parseDependencyTypes(content: string, lockfilePath: string): Map<string, DependencyType> {
  let document: YamlMapping;
  try {
    document = parseYamlMapping(content, lockfilePath);
  } catch (error) {
    throw new InvalidLockfileError(lockfilePath, error instanceof Error ? error.message : String(error));
  }

  const packages = document.packages ?? {};
  if (!isMapping(packages)) {
    throw new InvalidLockfileError(lockfilePath, "'packages' must be a mapping");
  }

  const dependencyTypes = new Map<string, DependencyType>();
  for (const [packageName, entry] of Object.entries(packages)) {
    const source = isMapping(entry) ? entry.source : undefined;
    dependencyTypes.set(packageName, dependencyTypeFromSource(packageName, source, lockfilePath));
  }
  return dependencyTypes;
}
