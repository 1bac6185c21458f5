import { join } from 'path';
import { FILE_PATTERNS, LOCATION_LIB_SUFFIX } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { MalformedLocationIndexError, MissingLocationIndexError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { canonicalizePath, resolveLocation, type LocationResolution } from '../../utils/path-resolution.js';

/**
 * Parse the location index and return a Map from package name to the
 * absolute directory holding that package.
 *
 * Line 1 is a generated header and is always skipped. Every other non-blank
 * line is `<name>:<uri-or-path>lib/`.
 */
export async function readPackageLocations(
  rootPath: string,
  indexFile: string = FILE_PATTERNS.LOCATION_INDEX
): Promise<Map<string, string>> {
  const indexPath = join(rootPath, indexFile);
  if (!(await exists(indexPath))) {
    throw new MissingLocationIndexError(indexPath);
  }

  logger.debug(`Reading location index: ${indexPath}`);
  const content = await readTextFile(indexPath);
  return parsePackageLocations(content, canonicalizePath(rootPath), indexPath);
}

export function parsePackageLocations(
  content: string,
  rootPath: string,
  indexPath: string
): Map<string, string> {
  const locations = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;
    const lineNumber = i + 1;

    const firstColon = line.indexOf(':');
    if (firstColon <= 0) {
      throw new MalformedLocationIndexError(indexPath, lineNumber, `expected '<name>:<location>', got '${line}'`);
    }
    if (!line.endsWith(LOCATION_LIB_SUFFIX)) {
      throw new MalformedLocationIndexError(indexPath, lineNumber, `location must end with '${LOCATION_LIB_SUFFIX}'`);
    }

    const name = line.slice(0, firstColon);
    let location = line.slice(firstColon + 1, line.length - LOCATION_LIB_SUFFIX.length);
    if (location.endsWith('/')) {
      location = location.slice(0, -1);
    }
    if (location.length === 0) {
      // `name:lib/` points at the index's own directory.
      location = '.';
    }

    let resolved: LocationResolution;
    try {
      resolved = resolveLocation(location, rootPath);
    } catch (error) {
      throw new MalformedLocationIndexError(
        indexPath,
        lineNumber,
        error instanceof Error ? error.message : String(error)
      );
    }
    if (resolved.kind === 'unsupported-scheme') {
      throw new MalformedLocationIndexError(indexPath, lineNumber, `unsupported URI scheme '${resolved.scheme}'`);
    }

    locations.set(name, resolved.absolute);
  }

  logger.debug(`Located ${locations.size} packages`, { indexPath });
  return locations;
}
