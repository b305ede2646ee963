import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { DEFAULT_CONFIG_PATH } from './config-defaults.js';
import { type Config, validateConfigSafe } from './config-schema.js';

/**
 * Load and validate a YAML configuration file
 *
 * Without an explicit path the default file is used when present; a missing
 * default file is an empty configuration.
 *
 * @param configPath - Path to config file, relative to the working directory
 * @throws ConfigError if an explicit file is missing, or the file is invalid
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const absolutePath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(absolutePath)) {
    if (configPath === undefined) {
      return {};
    }
    throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
  }

  const content = await readFile(absolutePath, 'utf-8');
  return parseConfig(content, absolutePath);
}

/**
 * Parse configuration text
 *
 * @param source - Shown in error messages
 */
export function parseConfig(content: string, source = 'configuration'): Config {
  let raw: unknown;

  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in ${source}: ${errorMessage(error)}`, { cause: error });
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvRecursive(raw);
  } catch (error) {
    throw new ConfigError(`${source}: ${errorMessage(error)}`, { cause: error });
  }

  const result = validateConfigSafe(resolved);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${result.error}`);
  }

  return result.config;
}
