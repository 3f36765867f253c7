/**
 * Config Loader - Load YAML/JSON configuration files with CLI override merging
 *
 * Config-first runner pattern:
 * - Auto-detect config format (YAML/JSON) by extension
 * - Load and parse config files
 * - Deep merge CLI overrides into config
 * - Hand the merged object to a validating parser
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import { ValidationError } from '@rebalancer/utils';

export type ConfigRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

/**
 * Deep merge two objects (CLI overrides win)
 *
 * - Primitives and arrays: override value replaces base value
 * - Objects: merged recursively
 * - undefined overrides are skipped
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    if (isRecord(value) && isRecord(baseValue)) {
      result[key] = deepMerge(baseValue, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Read a YAML or JSON config file into a plain object
 *
 * @throws ValidationError when the file cannot be read, does not parse, or is not an object
 */
export async function readConfigFile(configPath: string): Promise<ConfigRecord> {
  const format = detectConfigFormat(configPath);
  let parsed: unknown;

  try {
    const fileContent = await readFile(configPath, 'utf-8');
    parsed = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath, format }
    );
  }

  // An empty YAML document is an empty config
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, { configPath, format });
  }
  return parsed;
}

/**
 * Load config from an optional file, merge CLI overrides and validate
 *
 * @param configPath - YAML or JSON file; omitted means overrides only
 * @param parse - validating parser, e.g. parseBacktestConfig
 * @param overrides - CLI values; undefined entries leave the file's value in place
 */
export async function loadConfig<T>(
  configPath: string | undefined,
  parse: (input: unknown) => T,
  overrides: ConfigRecord = {}
): Promise<T> {
  const fromFile = configPath === undefined ? {} : await readConfigFile(configPath);
  return parse(deepMerge(fromFile, overrides));
}
