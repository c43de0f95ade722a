import type { Command } from 'commander';
import { existsSync } from 'fs';
import { DEFAULT_LOG_FILE } from '../../logger.js';
import { findConfigPath, loadConfiguration } from '../configuration.js';
import { displayLogs } from '../logging.js';
import { exitWithError } from '../shared.js';

/**
 * The log file named by the config when there is one, otherwise the
 * default location.
 */
export function resolveLogFile(configPath?: string): string {
  if (!existsSync(findConfigPath(configPath))) {
    return DEFAULT_LOG_FILE;
  }
  return loadConfiguration(configPath).config.logging.file;
}

export const registerLogsCommand = (program: Command): void => {
  program
    .command('logs')
    .description('Show the most recent log entries')
    .option('-c, --config <path>', 'Path to config file')
    .option('-n, --lines <number>', 'Number of lines to show', '50')
    .option('--json', 'Output logs in JSON format')
    .action((options: { config?: string; lines: string; json?: boolean }) => {
      const lines = Number.parseInt(options.lines, 10);
      if (!Number.isInteger(lines) || lines <= 0) {
        exitWithError(`Invalid line count: ${options.lines}`);
      }
      let logFile: string;
      try {
        logFile = resolveLogFile(options.config);
      } catch (error) {
        return exitWithError(error instanceof Error ? error.message : String(error));
      }
      displayLogs(logFile, { lines, json: options.json });
    });
};
