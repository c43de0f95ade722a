// Factory functions for easier testing and initialization

import { Autoprint } from './autoprint.js';
import { ConsolePrintConfirmer } from './confirmer.js';
import type { AutoprintDependencies } from './interfaces.js';
import type { Logger } from './logger.js';
import { Messages } from './messages.js';
import { DesktopNotifier } from './notifier.js';
import { createPrintSpooler } from './spoolers/index.js';
import type { AutoprintConfig } from './types.js';
import { systemClock } from './utils/timing.js';
import { WatchmanDirectoryWatcher } from './watchman.js';

/**
 * Create an Autoprint instance with default dependencies
 */
export function createAutoprint(config: AutoprintConfig, logger: Logger): Autoprint {
  return new Autoprint(config, logger, createDefaultDependencies(config, logger));
}

/**
 * Create an Autoprint instance with custom dependencies (for testing)
 */
export function createAutoprintWithDeps(
  config: AutoprintConfig,
  deps: AutoprintDependencies,
  logger: Logger
): Autoprint {
  return new Autoprint(config, logger, deps);
}

/**
 * Create default dependencies
 */
export function createDefaultDependencies(
  config: AutoprintConfig,
  logger: Logger
): Required<AutoprintDependencies> {
  return {
    watcher: new WatchmanDirectoryWatcher(logger),
    notifier: new DesktopNotifier({ enabled: config.notifications.enabled }, logger),
    confirmer: new ConsolePrintConfirmer(new Messages(config.language), logger),
    spooler: createPrintSpooler(),
    clock: systemClock,
  };
}
