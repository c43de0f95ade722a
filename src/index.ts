/**
 * @fileoverview autoprint - archive and print downloaded files by name
 *
 * Watches one folder, files each matching download into a directory derived
 * from its name, and optionally prints it on a chosen printer.
 *
 * @example Basic Usage
 * ```typescript
 * import { createAutoprint, createLogger, loadConfig } from 'autoprint-archive';
 *
 * const config = loadConfig('autoprint.config.json');
 * const logger = await createLogger({ file: config.logging.file, level: config.logging.level });
 * const autoprint = createAutoprint(config, logger);
 *
 * await autoprint.start();
 * ```
 */

export { Autoprint } from './autoprint.js';
export {
  ConfigLoader,
  ConfigMissingError,
  ConfigurationError,
  DEFAULT_CONFIG_FILE,
  loadConfig,
} from './config.js';
export { ConsolePrintConfirmer } from './confirmer.js';
export { ArchiveMover, type MoveResult } from './core/archive-mover.js';
export { DedupGate } from './core/dedup-gate.js';
export { FileProcessor, type ProcessOutcome } from './core/file-processor.js';
export { expandDestination, matchRule, PatternMatcher } from './core/pattern-matcher.js';
export { PrintJobPoller, type PollOutcome } from './core/print-job-poller.js';
export { PrintOrchestrator, type PrintOutcome } from './core/print-orchestrator.js';
export { ReadinessWaiter, type ReadinessResult } from './core/readiness-waiter.js';
export { Reporter } from './core/reporter.js';
export { WorkQueue } from './core/work-queue.js';
export * from './errors.js';
export { createAutoprint, createAutoprintWithDeps, createDefaultDependencies } from './factories.js';
export * from './interfaces.js';
export { createLogger, createScopedLogger, type Logger, type LoggerService } from './logger.js';
export { Messages } from './messages.js';
export { DesktopNotifier } from './notifier.js';
export { createPrintSpooler, CupsPrintSpooler, WindowsPrintSpooler } from './spoolers/index.js';
export * from './types.js';
export type { Clock } from './utils/timing.js';
export { WatchmanDirectoryWatcher } from './watchman.js';
