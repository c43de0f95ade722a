import chalk from 'chalk';
import { describeError } from '../errors.js';
import type { LogLevel } from '../types.js';
import { type LoadedConfiguration, loadConfiguration } from './configuration.js';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class CliExitError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'CliExitError';
  }
}

export const exitWithError = (message: string, code = 1): never => {
  console.error(chalk.red(message));
  if (process.env.VITEST) {
    throw new CliExitError(message, code);
  }
  process.exit(code);
};

export const loadConfigOrExit = (
  configPath?: string,
  overrides?: { watchDirectory?: string }
): LoadedConfiguration => {
  try {
    return loadConfiguration(configPath, overrides);
  } catch (error) {
    return exitWithError(describeError(error));
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * --verbose wins over --log-level, which wins over the config file.
 */
export const resolveLogLevel = (
  options: { verbose?: boolean; logLevel?: string },
  configured: LogLevel
): LogLevel => {
  if (options.verbose) return 'debug';
  if (options.logLevel === undefined) return configured;
  const level = options.logLevel.toLowerCase();
  if (!isLogLevel(level)) {
    return exitWithError(
      `Invalid log level "${options.logLevel}". Use one of: ${LOG_LEVELS.join(', ')}`
    );
  }
  return level;
};
