import { existsSync } from 'fs';
import { resolve } from 'path';
import { ConfigLoader, DEFAULT_CONFIG_FILE } from '../config.js';
import { AutoprintError, describeError } from '../errors.js';
import type { AutoprintConfig } from '../types.js';

export const CONFIG_ENV_VAR = 'AUTOPRINT_CONFIG';

export interface LoadedConfiguration {
  config: AutoprintConfig;
  configPath: string;
}

export class ConfigurationLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationLoadError';
  }
}

/**
 * Where the config file is looked for: the explicit path, then
 * $AUTOPRINT_CONFIG, then ./autoprint.config.json.
 */
export function findConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  if (explicitPath) {
    return resolve(cwd, explicitPath);
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return resolve(cwd, fromEnv);
  }
  return resolve(cwd, DEFAULT_CONFIG_FILE);
}

/**
 * Load the configuration and turn any failure into a single-message error
 * the CLI can print as is.
 */
export function loadConfiguration(
  configPath?: string,
  overrides: { watchDirectory?: string } = {}
): LoadedConfiguration {
  const path = findConfigPath(configPath);
  try {
    const config = new ConfigLoader(path).loadConfig();
    if (overrides.watchDirectory) {
      config.watchDirectory = resolve(overrides.watchDirectory);
    }
    return { config, configPath: path };
  } catch (error) {
    if (error instanceof AutoprintError) {
      throw new ConfigurationLoadError(error.message);
    }
    throw new ConfigurationLoadError(`Failed to load configuration: ${describeError(error)}`);
  }
}

export function watchDirectoryExists(config: AutoprintConfig): boolean {
  return existsSync(config.watchDirectory);
}
