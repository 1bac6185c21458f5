import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Expand leading tilde to the provided home directory.
 * Leaves non-tilde inputs unchanged.
 */
export function expandTildePath(input: string, homeDir: string = os.homedir()): string {
  if (!input.startsWith('~')) {
    return input;
  }

  if (input === '~') {
    return homeDir;
  }

  if (input.startsWith('~/')) {
    return path.join(homeDir, input.slice(2));
  }

  // ~user/project is left as-is; other users' homes are not resolved.
  return input;
}

/**
 * Canonical absolute form of a path: resolved against `baseDir` when
 * relative, normalized, without a trailing separator.
 */
export function canonicalizePath(input: string, baseDir: string = process.cwd()): string {
  return path.resolve(baseDir, input);
}

// Two or more characters so that Windows drive letters are not taken for schemes.
const URI_SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]+):/;

export type LocationResolution =
  | { kind: 'path'; absolute: string }
  | { kind: 'unsupported-scheme'; scheme: string };

/**
 * Resolve a location-index value (a `file:` URI, an absolute path or a
 * path relative to the index) to a canonical absolute path.
 */
export function resolveLocation(value: string, referenceDir: string): LocationResolution {
  const scheme = URI_SCHEME.exec(value)?.[1];
  if (scheme) {
    if (scheme.toLowerCase() !== 'file') {
      return { kind: 'unsupported-scheme', scheme };
    }
    return { kind: 'path', absolute: canonicalizePath(fileURLToPath(value)) };
  }

  const decoded = safeDecode(value);
  return { kind: 'path', absolute: canonicalizePath(decoded, referenceDir) };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // A lone '%' is a literal character in a plain path.
    return value;
  }
}
