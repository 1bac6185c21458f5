import * as yaml from 'js-yaml';

export type YamlMapping = Record<string, unknown>;

export function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a YAML document whose top level must be a mapping.
 * An empty document parses to an empty mapping.
 * Throws a plain Error describing the problem; callers wrap it with context.
 */
export function parseYamlMapping(content: string, filename: string): YamlMapping {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new Error(`not valid YAML (${reason})`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new Error('top level must be a mapping');
  }
  return parsed;
}

/**
 * Keys of an optional mapping-valued field, in document order.
 * A missing or null field yields no keys.
 */
export function mappingKeys(document: YamlMapping, field: string): string[] | undefined {
  const value = document[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!isMapping(value)) {
    return undefined;
  }
  return Object.keys(value);
}
