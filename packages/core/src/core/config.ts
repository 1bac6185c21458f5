import { dirname, join } from 'path';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import type { GraphConfig, GraphFileNames } from '../types/index.js';
import { ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { canonicalizePath, expandTildePath } from '../utils/path-resolution.js';
import { isMapping } from '../utils/yaml-document.js';

/**
 * Configuration for graph builds.
 *
 * The builder never reads globals; everything it needs arrives as a
 * GraphConfig. Precedence, highest first: explicit overrides, environment,
 * `package-graph.jsonc` in the root directory, defaults.
 */

export const DEFAULT_FILE_NAMES: GraphFileNames = {
  manifest: FILE_PATTERNS.MANIFEST,
  lockfile: FILE_PATTERNS.LOCKFILE,
  locationIndex: FILE_PATTERNS.LOCATION_INDEX
};

const FILE_NAME_KEYS: ReadonlyArray<keyof GraphFileNames> = ['manifest', 'lockfile', 'locationIndex'];

export interface GraphConfigOverrides {
  sdkPath?: string;
  files?: Partial<GraphFileNames>;
}

/**
 * Toolchain location derived from the running executable:
 * `<sdk>/bin/<executable>` gives `<sdk>`.
 */
export function defaultSdkPath(execPath: string = process.execPath): string {
  return dirname(dirname(execPath));
}

export function createGraphConfig(overrides: GraphConfigOverrides = {}): GraphConfig {
  return {
    sdkPath: overrides.sdkPath !== undefined ? normalizeSdkPath(overrides.sdkPath) : defaultSdkPath(),
    files: { ...DEFAULT_FILE_NAMES, ...overrides.files }
  };
}

function normalizeSdkPath(sdkPath: string, baseDir?: string): string {
  return canonicalizePath(expandTildePath(sdkPath), baseDir);
}

/**
 * Parse the contents of a config file.
 */
export function parseConfigFile(content: string, configPath: string): GraphConfigOverrides {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(
      `Failed to parse ${configPath}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { path: configPath }
    );
  }
  if (!isMapping(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`, { path: configPath });
  }

  const overrides: GraphConfigOverrides = {};
  if (parsed.sdkPath !== undefined) {
    if (typeof parsed.sdkPath !== 'string') {
      throw new ConfigError(`${configPath}: 'sdkPath' must be a string`, { path: configPath });
    }
    overrides.sdkPath = parsed.sdkPath;
  }

  const declaredFiles = parsed.files;
  if (declaredFiles !== undefined) {
    if (!isMapping(declaredFiles)) {
      throw new ConfigError(`${configPath}: 'files' must be an object`, { path: configPath });
    }
    const files: Partial<GraphFileNames> = {};
    for (const key of FILE_NAME_KEYS) {
      const value = declaredFiles[key];
      if (value === undefined) continue;
      if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigError(`${configPath}: 'files.${key}' must be a non-empty string`, { path: configPath });
      }
      files[key] = value;
    }
    overrides.files = files;
  }

  return overrides;
}

/**
 * Resolve the configuration for a build rooted at `rootDirectory`.
 */
export async function loadGraphConfig(
  rootDirectory: string,
  overrides: GraphConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<GraphConfig> {
  const rootPath = canonicalizePath(rootDirectory);
  const configPath = join(rootPath, FILE_PATTERNS.CONFIG_JSONC);

  let fromFile: GraphConfigOverrides = {};
  if (await exists(configPath)) {
    logger.debug(`Loading config from: ${configPath}`);
    fromFile = parseConfigFile(await readTextFile(configPath), configPath);
  }

  const envSdkPath = env[ENV_VARS.SDK_PATH];
  let sdkPath: string;
  if (overrides.sdkPath !== undefined) {
    sdkPath = normalizeSdkPath(overrides.sdkPath);
  } else if (envSdkPath) {
    sdkPath = normalizeSdkPath(envSdkPath);
  } else if (fromFile.sdkPath !== undefined) {
    // Relative paths in the config file are relative to the file.
    sdkPath = normalizeSdkPath(fromFile.sdkPath, rootPath);
  } else {
    sdkPath = defaultSdkPath();
  }

  return {
    sdkPath,
    files: { ...DEFAULT_FILE_NAMES, ...fromFile.files, ...overrides.files }
  };
}
