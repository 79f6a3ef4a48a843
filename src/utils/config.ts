import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { LEGACY_BASE_URL } from '../api/highlights.js';
import { DEFAULT_PAGE_SIZE, DEFAULT_TRANSIENT_RETRY_DELAY_MS } from '../api/pagination.js';
import { READER_BASE_URL } from '../api/reader.js';
import type { ClientConfig } from '../types.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { DEFAULT_MAX_ATTEMPTS } from './retry.js';

export const DEFAULT_CONFIG_FILE = 'readwise.json';
export const TOKEN_ENV_VAR = 'READWISE_TOKEN';

/**
 * Returns the default client configuration. Only the token has no default.
 */
export function getDefaultConfig(): ClientConfig {
  return {
    legacyBaseUrl: LEGACY_BASE_URL,
    readerBaseUrl: READER_BASE_URL,
    pageSize: DEFAULT_PAGE_SIZE,
    maxRateLimitAttempts: DEFAULT_MAX_ATTEMPTS,
    transientRetryDelayMs: DEFAULT_TRANSIENT_RETRY_DELAY_MS,
    maxTransientRetries: null,
    verbose: false,
  };
}

/**
 * Merge configuration from multiple sources with increasing priority:
 *   defaults < fileConfig < overrides
 *
 * `undefined` values are ignored so that absent CLI flags do not clobber
 * file-based configuration; an explicit `null` does override.
 */
export function mergeConfigs(
  defaults: ClientConfig,
  fileConfig: Partial<ClientConfig>,
  overrides: Partial<ClientConfig>,
): ClientConfig {
  const merged: ClientConfig = { ...defaults };
  for (const source of [fileConfig, overrides]) {
    if (source.token !== undefined) merged.token = source.token;
    if (source.legacyBaseUrl !== undefined) merged.legacyBaseUrl = source.legacyBaseUrl;
    if (source.readerBaseUrl !== undefined) merged.readerBaseUrl = source.readerBaseUrl;
    if (source.pageSize !== undefined) merged.pageSize = source.pageSize;
    if (source.maxRateLimitAttempts !== undefined) {
      merged.maxRateLimitAttempts = source.maxRateLimitAttempts;
    }
    if (source.transientRetryDelayMs !== undefined) {
      merged.transientRetryDelayMs = source.transientRetryDelayMs;
    }
    if (source.maxTransientRetries !== undefined) {
      merged.maxTransientRetries = source.maxTransientRetries;
    }
    if (source.verbose !== undefined) merged.verbose = source.verbose;
  }
  return merged;
}

/**
 * Check the shape of a parsed config file, keeping only known keys.
 */
export function parseConfigFile(raw: unknown, source: string): Partial<ClientConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const config: Partial<ClientConfig> = {};

  const str = (key: string): string | undefined => {
    const value = entries.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw new ConfigError(`${source}: "${key}" must be a string`);
    return value;
  };
  const nonNegativeInt = (key: string): number | undefined => {
    const value = entries.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${source}: "${key}" must be a non-negative integer`);
    }
    return value;
  };

  config.token = str('token');
  config.legacyBaseUrl = str('legacyBaseUrl');
  config.readerBaseUrl = str('readerBaseUrl');
  config.pageSize = nonNegativeInt('pageSize');
  config.maxRateLimitAttempts = nonNegativeInt('maxRateLimitAttempts');
  config.transientRetryDelayMs = nonNegativeInt('transientRetryDelayMs');
  config.maxTransientRetries =
    entries.get('maxTransientRetries') === null ? null : nonNegativeInt('maxTransientRetries');

  const verbose = entries.get('verbose');
  if (typeof verbose === 'boolean') {
    config.verbose = verbose;
  } else if (verbose !== undefined) {
    throw new ConfigError(`${source}: "verbose" must be a boolean`);
  }

  if (config.pageSize === 0) {
    throw new ConfigError(`${source}: "pageSize" must be at least 1`);
  }
  if (config.maxRateLimitAttempts === 0) {
    throw new ConfigError(`${source}: "maxRateLimitAttempts" must be at least 1`);
  }

  return config;
}

/**
 * Load client configuration from a JSON file on disk.
 *
 * @param configPath - Path to the config file. Defaults to `./readwise.json`
 *                     resolved from the current working directory.
 * @returns Defaults merged with the file's values. A missing file is not
 *          an error; an unreadable or malformed one is.
 */
export async function loadConfig(configPath?: string): Promise<ClientConfig> {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_FILE);
  const defaults = getDefaultConfig();

  let raw: string;
  try {
    raw = await readFile(resolvedPath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`No config file found at ${resolvedPath}, using defaults`);
      return defaults;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config at ${resolvedPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config at ${resolvedPath} is not valid JSON: ${message}`);
  }

  logger.debug(`Loaded config from ${resolvedPath}`);
  return mergeConfigs(defaults, parseConfigFile(parsed, resolvedPath), {});
}

/**
 * The API token from the config, else from `READWISE_TOKEN`.
 */
export function resolveToken(
  config: ClientConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token = config.token ?? env[TOKEN_ENV_VAR];
  if (!token || token.trim() === '') {
    throw new ConfigError(
      `No API token configured. Pass --token, set "token" in ${DEFAULT_CONFIG_FILE}, or export ${TOKEN_ENV_VAR}.`,
    );
  }
  return token.trim();
}
