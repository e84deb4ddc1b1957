/**
 * Configuration loader for the user-intake server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  CorsConfig,
  ListingConfig,
  ProviderConfig,
  ServerConfig,
  StorageConfig,
} from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config as written in the file: every key optional.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  storage?: Partial<StorageConfig>;
  provider?: Partial<ProviderConfig>;
  listing?: Partial<ListingConfig>;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is ServerConfig['logLevel'] {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is PartialAppConfig['server'] {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const { port, host, logLevel, cors } = config;

  if (port !== undefined && (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, port);
  }

  if (host !== undefined && typeof host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, host);
  }

  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, logLevel);
  }

  if (cors !== undefined) {
    if (!isObject(cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, cors);
    }
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    if (
      cors.origins !== undefined &&
      (!Array.isArray(cors.origins) || !cors.origins.every(origin => typeof origin === 'string'))
    ) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, cors.origins);
    }
  }
}

/**
 * Validate storage configuration.
 */
function validateStorageConfig(config: unknown, path = 'storage'): asserts config is PartialAppConfig['storage'] {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const { databasePath } = config;
  if (databasePath !== undefined && (typeof databasePath !== 'string' || databasePath.length === 0)) {
    throw new ConfigValidationError('databasePath must be a non-empty string', `${path}.databasePath`, databasePath);
  }
}

/**
 * Validate provider configuration.
 */
function validateProviderConfig(config: unknown, path = 'provider'): asserts config is PartialAppConfig['provider'] {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const { url } = config;
  if (url === undefined) {
    return;
  }
  if (typeof url !== 'string' || !URL.canParse(url)) {
    throw new ConfigValidationError('url must be an absolute URL', `${path}.url`, url);
  }
}

/**
 * Validate listing configuration.
 */
function validateListingConfig(config: unknown, path = 'listing'): asserts config is PartialAppConfig['listing'] {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const { pageSize } = config;
  if (pageSize !== undefined && (typeof pageSize !== 'number' || !Number.isInteger(pageSize) || pageSize < 1)) {
    throw new ConfigValidationError('pageSize must be a positive integer', `${path}.pageSize`, pageSize);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }
  if (config.storage !== undefined) {
    validateStorageConfig(config.storage);
  }
  if (config.provider !== undefined) {
    validateProviderConfig(config.provider);
  }
  if (config.listing !== undefined) {
    validateListingConfig(config.listing);
  }
}

/**
 * Merge a partial config over the defaults.
 */
export function applyDefaults(partial: PartialAppConfig): AppConfig {
  const server: NonNullable<PartialAppConfig['server']> = partial.server ?? {};
  return {
    server: {
      ...DEFAULT_CONFIG.server,
      ...server,
      cors: {
        enabled: server.cors?.enabled ?? DEFAULT_CONFIG.server.cors.enabled,
        origins: [...(server.cors?.origins ?? DEFAULT_CONFIG.server.cors.origins)],
      },
    },
    storage: { ...DEFAULT_CONFIG.storage, ...partial.storage },
    provider: { ...DEFAULT_CONFIG.provider, ...partial.provider },
    listing: { ...DEFAULT_CONFIG.listing, ...partial.listing },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {});

  validateConfig(substituted);
  return applyDefaults(substituted);
}

/**
 * Resolve the database path against the application base path.
 */
export function resolveDatabasePath(config: AppConfig, basePath: string): string {
  const { databasePath } = config.storage;
  if (databasePath === ':memory:' || isAbsolute(databasePath)) {
    return databasePath;
  }
  return resolve(basePath, databasePath);
}
