/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the ragent directory
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { z } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (default: <ragent home>/config.toml) */
  configPath?: string;
  /** Write the commented template on first run (default: true) */
  createIfMissing?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects are merged key by key; arrays and primitives replace.
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

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
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
 * Merge sparse user settings over the defaults and validate the result.
 * Exported for callers that build config in memory (tests, embedding apps).
 */
export function resolveConfig(userConfig: unknown, source = 'config'): Config {
  const partial = PartialConfigSchema.safeParse(userConfig);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(partial.error.issues)}`,
      'Run: ragent config list  to see valid keys and current values'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(merged.error.issues)}`,
      'Run: ragent config list  to see valid keys and current values'
    );
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
  const createIfMissing = options.createIfMissing ?? true;

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return resolveConfig({});
  }

  return resolveConfig(readToml(configPath), configPath);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'retrieval.alpha') => 0.7
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Whether a dot path names a leaf in the config schema (optional keys included)
 */
function isKnownKey(key: string): boolean {
  const [section, field, ...rest] = key.split('.');
  if (section === undefined || rest.length > 0) {
    return false;
  }

  const shape: Record<string, z.ZodTypeAny> = ConfigSchema.shape;
  const sectionSchema = shape[section];
  if (sectionSchema === undefined) {
    return false;
  }
  if (!(sectionSchema instanceof z.ZodObject)) {
    return field === undefined;
  }
  if (field === undefined) {
    return false;
  }
  const fields: Record<string, z.ZodTypeAny> = sectionSchema.shape;
  return fields[field] !== undefined;
}

/**
 * Parse a CLI string into the value type TOML would store
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path and write the file.
 * The complete merged config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }
  if (!isKnownKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const config = fs.existsSync(configPath) ? readToml(configPath) : {};

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
  current[leaf] = parseValue(value);

  resolveConfig(config, configPath);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(toJsonMap(config)), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 10]
 */
export function listConfig(config: Config): Array<[string, unknown]> {
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

  flatten(config);
  return entries;
}

/**
 * Narrow parsed config back into TOML's value model before stringifying.
 */
function toJsonMap(obj: PlainObject): TOML.JsonMap {
  const map: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPlainObject(value)) {
      map[key] = toJsonMap(value);
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      map[key] = value;
    }
  }
  return map;
}
