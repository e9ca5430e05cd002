/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.know)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Validate the merged result, which yields the typed Config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML, { type JsonMap } from '@iarna/toml';
import type { ZodError } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (default ~/.know/config.toml) */
  configPath?: string;
  /** Write the commented template on first run */
  createIfMissing?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays and primitives are replaced, nested objects are merged.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readToml(configPath: string): PlainObject {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Validate a (possibly sparse) user config object and merge it over the defaults.
 */
export function resolveConfig(userConfig: unknown, source = 'config'): Config {
  const partial = PartialConfigSchema.safeParse(userConfig);
  if (!partial.success) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${formatIssues(partial.error)}`);
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${formatIssues(merged.error)}`);
  }
  return merged.data;
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (options.createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return resolveConfig({});
  }

  return resolveConfig(readToml(configPath), configPath);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('rag.top_k') => 5
 */
export function getConfigValue(key: string, configPath?: string): unknown {
  let current: unknown = loadConfig({ configPath });

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, comma lists (for array keys) and strings
 */
function parseValue(value: string, currentValue: unknown): unknown {
  if (Array.isArray(currentValue)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path.
 * The full config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter(Boolean);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const config: PlainObject = fs.existsSync(configPath) ? readToml(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastPart] = parseValue(value, getConfigValue(key, configPath));

  try {
    resolveConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(
        `Invalid value for '${key}':\n${error.message.split('\n').slice(1).join('\n')}`,
        'Run: know config list  to see current values and types'
      );
    }
    throw error;
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(toJsonMap(config)), 'utf-8');
}

function toJsonMap(value: PlainObject): JsonMap {
  const map: JsonMap = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isPlainObject(entry)) {
      map[key] = toJsonMap(entry);
    } else if (
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      map[key] = entry;
    } else if (Array.isArray(entry)) {
      // Every list setting is a list of strings
      map[key] = entry.map((item) => String(item));
    }
  }
  return map;
}

/**
 * List all config values in a flat format
 * Returns entries like ['rag.top_k', 5]
 */
export function listConfig(configPath?: string): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig({ configPath }));
  return entries;
}
