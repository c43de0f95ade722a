import chalk from 'chalk';
import type { Command } from 'commander';
import { describeError } from '../../errors.js';
import { createAutoprint } from '../../factories.js';
import { createLogger } from '../../logger.js';
import { watchDirectoryExists } from '../configuration.js';
import { exitWithError, loadConfigOrExit, resolveLogLevel } from '../shared.js';

interface WatchOptions {
  config?: string;
  dir?: string;
  logLevel?: string;
  verbose?: boolean;
}

export const registerWatchCommand = (program: Command): void => {
  program
    .command('watch')
    .alias('start')
    .description('Watch the folder and archive/print matching files (runs in the foreground)')
    .option('-c, --config <path>', 'Path to config file')
    .option('-d, --dir <path>', 'Folder to watch (overrides watchDirectory)')
    .option('--log-level <level>', 'Set log level (debug, info, warn, error)')
    .option('--verbose', 'Enable verbose logging (same as --log-level debug)')
    .action(async (options: WatchOptions) => {
      const { config, configPath } = loadConfigOrExit(options.config, {
        watchDirectory: options.dir,
      });
      const level = resolveLogLevel(options, config.logging.level);

      if (!watchDirectoryExists(config)) {
        exitWithError(`Watch folder does not exist: ${config.watchDirectory}`);
      }

      const logger = await createLogger({ file: config.logging.file, level });
      logger.info(`Loaded configuration from ${configPath}`);

      const autoprint = createAutoprint(config, logger);

      let stopping: Promise<void> | undefined;
      const shutdown = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        logger.info(`Received ${signal}, finishing queued files`);
        stopping = autoprint
          .stop()
          .then(() => logger.close())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error(chalk.red(`Shutdown failed: ${describeError(error)}`));
            process.exit(1);
          });
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      try {
        await autoprint.start();
      } catch (error) {
        logger.error(`Failed to start: ${describeError(error)}`);
        await logger.close();
        exitWithError(`Failed to start: ${describeError(error)}`);
      }
      console.log(chalk.green(`🖨  Watching ${config.watchDirectory} (Ctrl+C to stop)`));
    });
};
